export {
  RoleSchema,
  ROLES,
  MetadataSchema,
  MessageSchema,
  ConversationSchema,
  type Role,
  type Metadata,
  type Message,
  type MessageInput,
  type Conversation,
  type ConversationInput,
} from './schemas.js';

export {
  createMessage,
  createConversation,
  withMessage,
  withConversation,
  messageCount,
  findMessage,
} from './factory.js';

export {
  SearchQuerySchema,
  MatchModeSchema,
  SortFieldSchema,
  SortOrderSchema,
  createSearchQuery,
  parseSearchQuery,
  hasKeywords,
  hasPhrases,
  type SearchQuery,
  type SearchQueryInput,
  type SearchResult,
  type MatchMode,
  type SortField,
  type SortOrder,
} from './search.js';

export {
  ImageRefSchema,
  IMAGES_METADATA_KEY,
  messageImages,
  type ImageRef,
  type ImageRefInput,
} from './image.js';
