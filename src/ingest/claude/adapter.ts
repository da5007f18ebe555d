/**
 * Claude export adapter
 *
 * Claude exports keep a flat message history, so every message has a null
 * parentId. Bodies are arrays of typed content blocks with a plain `text`
 * field alongside.
 */

import {
  createConversation,
  type Conversation,
  type MessageInput,
  type Role,
} from '../../model/index.js';
import { ValidationError } from '../../errors/index.js';
import {
  ExportAdapter,
  describeIssues,
  isRecord,
  type ParseOutcome,
  type ProviderName,
  type RecordContext,
} from '../provider.js';
import { parseIsoTimestamp } from '../timestamps.js';
import { ChatMessageSchema, ContentBlockSchema, ConversationSchema, type ChatMessage } from './types.js';

export const UNTITLED = '(No title)';
export const EMPTY_CONVERSATION = '(Empty conversation)';

const SENDER_MAP: Readonly<Record<string, Role>> = {
  human: 'user',
  user: 'user',
  assistant: 'assistant',
};

/**
 * Join the text blocks of a message with newlines, skipping tool blocks.
 * Falls back to the plain `text` field, then to ''.
 */
export function extractContent(message: Pick<ChatMessage, 'content' | 'text'>): string {
  const texts: string[] = [];
  for (const block of message.content ?? []) {
    const parsed = ContentBlockSchema.safeParse(block);
    if (!parsed.success || parsed.data.type !== 'text') continue;
    const text = parsed.data.text;
    if (typeof text === 'string' && text.length > 0) {
      texts.push(text);
    }
  }
  if (texts.length > 0) return texts.join('\n');
  return message.text ?? '';
}

export function normalizeSender(sender: string): Role | null {
  return SENDER_MAP[sender] ?? null;
}

export class ClaudeAdapter extends ExportAdapter {
  readonly provider: ProviderName = 'claude';

  protected parseRecord(value: unknown, context: RecordContext): ParseOutcome {
    const uuid = isRecord(value) ? value.uuid : undefined;
    const identifier = typeof uuid === 'string' && uuid.length > 0 ? uuid : `#${context.index}`;

    const parsed = ConversationSchema.safeParse(value);
    if (!parsed.success) {
      return { ok: false, identifier, reason: `Schema validation failed: ${describeIssues(parsed.error.issues)}` };
    }
    const raw = parsed.data;

    const createdAt = parseIsoTimestamp(raw.created_at);
    if (!createdAt) {
      return { ok: false, identifier, reason: `Unparsable created_at: ${raw.created_at}` };
    }

    let updatedAt: Date | undefined;
    if (raw.updated_at !== undefined && raw.updated_at !== null && raw.updated_at !== '') {
      updatedAt = parseIsoTimestamp(raw.updated_at) ?? undefined;
      if (!updatedAt) {
        context.warn(identifier, `Unparsable updated_at ${JSON.stringify(raw.updated_at)}; treated as absent`);
      }
    }

    const messages: MessageInput[] = [];
    const usedIds = new Set<string>();
    (raw.chat_messages ?? []).forEach((rawMessage, position) => {
      const message = this.parseMessage(rawMessage, position, raw.uuid, createdAt, context);
      if (!message) return;
      if (usedIds.has(message.id)) {
        context.skip(`${raw.uuid}/${message.id}`, 'Duplicate message id');
        return;
      }
      usedIds.add(message.id);
      messages.push(message);
    });

    if (messages.length === 0) {
      messages.push({
        id: `${raw.uuid}-placeholder`,
        role: 'system',
        content: EMPTY_CONVERSATION,
        timestamp: createdAt,
        parentId: null,
        metadata: { is_placeholder: true },
      });
    }

    const metadata: Record<string, unknown> = {};
    if (raw.summary) metadata.summary = raw.summary;

    let conversation: Conversation;
    try {
      conversation = createConversation({
        id: raw.uuid,
        title: raw.name ? raw.name : UNTITLED,
        createdAt,
        updatedAt,
        messages,
        metadata,
      });
    } catch (err) {
      if (err instanceof ValidationError) {
        return { ok: false, identifier, reason: err.message };
      }
      throw err;
    }
    return { ok: true, conversation };
  }

  private parseMessage(
    value: unknown,
    position: number,
    conversationId: string,
    createdAt: Date,
    context: RecordContext
  ): MessageInput | null {
    const parsed = ChatMessageSchema.safeParse(value);
    if (!parsed.success) {
      context.skip(`${conversationId}/#${position}`, `Malformed message: ${describeIssues(parsed.error.issues)}`);
      return null;
    }
    const raw = parsed.data;

    const sender = raw.sender ?? 'assistant';
    let role = normalizeSender(sender);
    const metadata: Record<string, unknown> = {};
    if (role === null) {
      context.logger.debug({ conversationId, messageId: raw.uuid, sender }, 'Unknown sender, using assistant');
      metadata.original_sender = sender;
      role = 'assistant';
    }

    let timestamp = parseIsoTimestamp(raw.created_at);
    if (!timestamp) {
      context.warn(
        raw.uuid,
        `Missing or unparsable created_at ${JSON.stringify(raw.created_at ?? null)}; using conversation created_at`
      );
      timestamp = createdAt;
    }

    const attachments = (raw.attachments?.length ?? 0) + (raw.files?.length ?? 0);
    if (attachments > 0) metadata.attachment_count = attachments;

    return {
      id: raw.uuid,
      role,
      content: extractContent(raw),
      timestamp,
      parentId: null,
      metadata,
    };
  }
}
