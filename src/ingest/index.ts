export {
  ExportAdapter,
  isRecord,
  describeIssues,
  type ProviderAdapter,
  type ProviderName,
  type IngestOptions,
  type SearchOptions,
  type MessageLookup,
  type SkipCallback,
  type WarningCallback,
  type ParseOutcome,
  type RecordContext,
} from './provider.js';

export {
  ProgressReporter,
  DEFAULT_PROGRESS_EVERY,
  DEFAULT_PROGRESS_INTERVAL_MS,
  type ProgressCallback,
} from './progress.js';

export { matchId, BestIdMatch, MIN_PREFIX_LENGTH, type IdMatch } from './lookup.js';
export { findConversationByTitle, type TitleMatch } from './title.js';
export { parseEpochSeconds, parseIsoTimestamp } from './timestamps.js';
export { ChatGPTAdapter } from './chatgpt/index.js';
export { ClaudeAdapter } from './claude/index.js';
export {
  detectProvider,
  createAdapter,
  getAdapter,
  PROVIDERS,
  type ProviderChoice,
} from './detect.js';
