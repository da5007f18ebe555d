/**
 * Search module
 * BM25 ranking over streamed conversations
 */

export {
  rankConversations,
  passesStreamingFilters,
  allowedMessages,
  compareScored,
  type RankOptions,
} from './ranking.js';

export {
  BM25Scorer,
  BM25_K1,
  BM25_B,
  normalizeScore,
  type ScoredDocument,
  type BM25Params,
} from './bm25.js';

export { tokenize, tokenizeTerms, termFrequencies } from './tokenize.js';

export {
  phraseMatches,
  anyTermPresent,
  allTermsPresent,
  findMatchedMessages,
} from './match.js';

export {
  extractSnippet,
  extractSnippetFromMessages,
  DEFAULT_SNIPPET_LENGTH,
  FALLBACK_EMPTY,
  FALLBACK_NO_MATCH,
  type SnippetOptions,
} from './snippet.js';
