/**
 * ChatGPT export support
 */

export { ChatGPTAdapter, extractContent, extractImages, normalizeRole } from './adapter.js';

export {
  ConversationSchema,
  MessageSchema,
  MappingSchema,
  MappingEntrySchema,
  ContentSchema,
  AuthorSchema,
  type Conversation,
  type Message,
  type Mapping,
  type MappingEntry,
  type Content,
  type Author,
} from './types.js';
