/**
 * Ranking engine
 *
 * Pass 1 streams conversations through the filters that need no corpus
 * statistics and buffers the survivors. Pass 2 scores the buffer with BM25,
 * applies the term criteria and exclusions, orders, and only then limits.
 * Top-N therefore means "N best", never "first N seen".
 */

import {
  hasKeywords,
  hasPhrases,
  type Conversation,
  type Message,
  type SearchQuery,
  type SearchResult,
} from '../model/index.js';
import { formatDate } from '../utils/index.js';
import { BM25Scorer, normalizeScore, type ScoredDocument } from './bm25.js';
import { allTermsPresent, anyTermPresent, findMatchedMessages, phraseMatches } from './match.js';
import { DEFAULT_SNIPPET_LENGTH, extractSnippetFromMessages } from './snippet.js';
import { termFrequencies, tokenize, tokenizeTerms } from './tokenize.js';

export interface RankOptions {
  snippetLength?: number;
}

/**
 * A conversation that survived pass 1
 */
interface Candidate extends ScoredDocument {
  conversation: Conversation;
  /** Messages within the role restriction */
  messages: readonly Message[];
  phraseMatch: boolean;
}

interface Scored {
  candidate: Candidate;
  raw: number;
  matchedMessageIds: string[];
}

/**
 * Filters computable from a single conversation: title, date range,
 * message count and role restriction
 */
export function passesStreamingFilters(conversation: Conversation, query: SearchQuery): boolean {
  if (query.titleFilter !== undefined) {
    if (!conversation.title.toLowerCase().includes(query.titleFilter.toLowerCase())) {
      return false;
    }
  }

  if (query.fromDate !== undefined || query.toDate !== undefined) {
    const day = formatDate(conversation.createdAt);
    if (query.fromDate !== undefined && day < query.fromDate) return false;
    if (query.toDate !== undefined && day > query.toDate) return false;
  }

  const count = conversation.messages.length;
  if (query.minMessages !== undefined && count < query.minMessages) return false;
  if (query.maxMessages !== undefined && count > query.maxMessages) return false;

  return true;
}

/**
 * Messages that take part in matching and scoring
 */
export function allowedMessages(conversation: Conversation, query: SearchQuery): readonly Message[] {
  if (query.roleFilter === undefined) return conversation.messages;
  return conversation.messages.filter((m) => m.role === query.roleFilter);
}

/**
 * Order by the requested field, then by conversation id ascending
 */
export function compareScored(
  a: { conversation: Conversation; raw: number },
  b: { conversation: Conversation; raw: number },
  query: Pick<SearchQuery, 'sortBy' | 'sortOrder'>
): number {
  let primary = 0;
  switch (query.sortBy) {
    case 'score':
      primary = a.raw - b.raw;
      break;
    case 'date': {
      const aTime = (a.conversation.updatedAt ?? a.conversation.createdAt).getTime();
      const bTime = (b.conversation.updatedAt ?? b.conversation.createdAt).getTime();
      primary = aTime - bTime;
      break;
    }
    case 'title': {
      const aTitle = a.conversation.title.toLowerCase();
      const bTitle = b.conversation.title.toLowerCase();
      primary = aTitle < bTitle ? -1 : aTitle > bTitle ? 1 : 0;
      break;
    }
    case 'messages':
      primary = a.conversation.messages.length - b.conversation.messages.length;
      break;
  }

  if (primary !== 0) {
    return query.sortOrder === 'desc' ? -primary : primary;
  }

  const aId = a.conversation.id;
  const bId = b.conversation.id;
  return aId < bId ? -1 : aId > bId ? 1 : 0;
}

/**
 * Rank a stream of conversations against a query.
 * Consumes the whole input before yielding the first result.
 */
export async function* rankConversations(
  conversations: AsyncIterable<Conversation>,
  query: SearchQuery,
  options: RankOptions = {}
): AsyncGenerator<SearchResult> {
  const snippetLength = options.snippetLength ?? DEFAULT_SNIPPET_LENGTH;
  const keywordTokens = tokenizeTerms(query.keywords);
  const excludeTokens = tokenizeTerms(query.excludeKeywords);
  // Keywords that reduce to no tokens still count: ANY then matches nothing
  const withKeywords = hasKeywords(query);
  const withPhrases = hasPhrases(query);

  // Pass 1
  const corpus: Candidate[] = [];
  for await (const conversation of conversations) {
    if (!passesStreamingFilters(conversation, query)) continue;

    const messages = allowedMessages(conversation, query);
    if (query.roleFilter !== undefined && messages.length === 0) continue;

    const text = messages.map((m) => m.content).join(' ');
    const tokens = tokenize(text);
    const terms = termFrequencies(tokens);
    const phraseMatch = withPhrases && phraseMatches(text, query.phrases);

    if (query.roleFilter !== undefined && (withKeywords || withPhrases)) {
      if (!phraseMatch && !(withKeywords && anyTermPresent(terms, keywordTokens))) continue;
    }

    corpus.push({ conversation, messages, terms, length: tokens.length, phraseMatch });
  }

  if (corpus.length === 0) return;

  // Pass 2
  const scorer = new BM25Scorer(corpus);
  const scored: Scored[] = [];

  for (const candidate of corpus) {
    let raw = 0;
    let keywordMatch = false;

    if (withKeywords) {
      keywordMatch =
        query.matchMode === 'all'
          ? allTermsPresent(candidate.terms, keywordTokens)
          : anyTermPresent(candidate.terms, keywordTokens);
      if (keywordMatch) {
        raw = scorer.score(candidate, keywordTokens);
      }
    }

    const phraseMatch = candidate.phraseMatch;
    if (phraseMatch && raw === 0) {
      raw = 1;
    }

    if (!keywordMatch && !phraseMatch) {
      if (withKeywords || withPhrases) continue;
      raw = 1;
    }

    if (excludeTokens.length > 0 && anyTermPresent(candidate.terms, excludeTokens)) continue;

    const matchedMessageIds = findMatchedMessages(
      candidate.messages,
      keywordMatch ? keywordTokens : [],
      phraseMatch ? query.phrases : []
    );

    scored.push({ candidate, raw, matchedMessageIds });
  }

  scored.sort((a, b) =>
    compareScored(
      { conversation: a.candidate.conversation, raw: a.raw },
      { conversation: b.candidate.conversation, raw: b.raw },
      query
    )
  );

  const limited = query.limit !== undefined ? scored.slice(0, query.limit) : scored;

  for (const { candidate, raw, matchedMessageIds } of limited) {
    yield {
      conversation: candidate.conversation,
      score: normalizeScore(raw),
      matchedMessageIds,
      snippet: extractSnippetFromMessages(
        candidate.messages,
        query.keywords,
        query.phrases,
        matchedMessageIds,
        snippetLength
      ),
    };
  }
}
