/**
 * Claude export support
 */

export { ClaudeAdapter, extractContent, normalizeSender, UNTITLED, EMPTY_CONVERSATION } from './adapter.js';

export {
  ConversationSchema,
  ChatMessageSchema,
  ContentBlockSchema,
  type Conversation,
  type ChatMessage,
  type ContentBlock,
} from './types.js';
