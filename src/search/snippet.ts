/**
 * Snippet extraction for search results
 */

import type { Message } from '../model/index.js';
import { findTokenOffset, tokenizeTerms } from './tokenize.js';

export const DEFAULT_SNIPPET_LENGTH = 100;
/** Characters of context kept before the match */
export const SNIPPET_LEAD = 20;

export const FALLBACK_EMPTY = '[Content unavailable]';
export const FALLBACK_NO_MATCH = '[No content matched]';

export interface SnippetOptions {
  maxLength?: number;
  /** Total matched messages; adds a "(+N more)" suffix when above one */
  matchCount?: number;
  /** Located as plain substrings rather than whole tokens */
  phrases?: readonly string[];
}

/**
 * Cut a window around the earliest occurrence of any term.
 * Terms are located on token boundaries, the way matching sees them.
 */
export function extractSnippet(
  content: string,
  terms: readonly string[],
  options: SnippetOptions = {}
): string {
  const maxLength = options.maxLength ?? DEFAULT_SNIPPET_LENGTH;
  const text = content.trim();
  if (text.length === 0) return FALLBACK_EMPTY;

  const lower = text.toLowerCase();
  const offsets = tokenizeTerms(terms).map((token) => findTokenOffset(text, token));
  for (const phrase of options.phrases ?? []) {
    if (phrase) offsets.push(lower.indexOf(phrase.toLowerCase()));
  }
  const found = offsets.filter((pos) => pos !== -1);
  const matchPos = found.length > 0 ? Math.min(...found) : -1;

  const start = matchPos > 0 ? Math.max(0, matchPos - SNIPPET_LEAD) : 0;
  const end = start + maxLength;

  let snippet = text.slice(start, end);
  if (end < text.length) {
    snippet = snippet.trimEnd() + '...';
  }
  if (start > 0) {
    // Start on a word boundary when one is close
    const space = snippet.indexOf(' ');
    snippet = space > 0 && space < SNIPPET_LEAD ? '...' + snippet.slice(space + 1) : '...' + snippet;
  }

  if (options.matchCount !== undefined && options.matchCount > 1) {
    snippet += ` (+${options.matchCount - 1} more)`;
  }
  return snippet;
}

/**
 * Snippet for a conversation: taken from the first matched message.
 * Without query terms, the first non-empty message is used from its start.
 */
export function extractSnippetFromMessages(
  messages: readonly Message[],
  keywords: readonly string[],
  phrases: readonly string[],
  matchedMessageIds: readonly string[],
  maxLength = DEFAULT_SNIPPET_LENGTH
): string {
  if (messages.length === 0) return FALLBACK_EMPTY;

  if (keywords.length === 0 && phrases.length === 0) {
    const first = messages.find((m) => m.content.trim().length > 0);
    return first ? extractSnippet(first.content, [], { maxLength }) : FALLBACK_EMPTY;
  }

  if (matchedMessageIds.length === 0) return FALLBACK_NO_MATCH;

  const firstId = matchedMessageIds[0];
  const first = messages.find((m) => m.id === firstId);
  if (!first) return FALLBACK_NO_MATCH;

  return extractSnippet(first.content, keywords, {
    maxLength,
    matchCount: matchedMessageIds.length,
    phrases,
  });
}
