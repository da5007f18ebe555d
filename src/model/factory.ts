/**
 * Validating constructors for the canonical model
 */

import { ValidationError } from '../errors/index.js';
import {
  ConversationSchema,
  MessageSchema,
  type Conversation,
  type ConversationInput,
  type Message,
  type MessageInput,
} from './schemas.js';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !(value instanceof Date) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Build a frozen Message
 * @throws ValidationError when a field violates the model
 */
export function createMessage(input: MessageInput): Message {
  const result = MessageSchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'Message');
  }
  return deepFreeze(result.data);
}

/**
 * Build a frozen Conversation
 * @throws ValidationError when a field violates the model
 */
export function createConversation(input: ConversationInput): Conversation {
  const result = ConversationSchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'Conversation');
  }
  return deepFreeze(result.data);
}

/**
 * Copy a message with some fields replaced
 */
export function withMessage(message: Message, changes: Partial<MessageInput>): Message {
  return createMessage({ ...message, metadata: { ...message.metadata }, ...changes });
}

/**
 * Copy a conversation with some fields replaced
 */
export function withConversation(
  conversation: Conversation,
  changes: Partial<ConversationInput>
): Conversation {
  return createConversation({
    ...conversation,
    messages: conversation.messages.map((m) => ({ ...m, metadata: { ...m.metadata } })),
    metadata: { ...conversation.metadata },
    ...changes,
  });
}

export function messageCount(conversation: Conversation): number {
  return conversation.messages.length;
}

/**
 * Exact id lookup within one conversation
 */
export function findMessage(conversation: Conversation, messageId: string): Message | undefined {
  return conversation.messages.find((m) => m.id === messageId);
}
