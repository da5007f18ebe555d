/**
 * Term and phrase predicates
 */

import type { Message } from '../model/index.js';
import { tokenize } from './tokenize.js';

/**
 * True if any phrase occurs in the text (case-insensitive, no tokenization)
 */
export function phraseMatches(text: string, phrases: readonly string[]): boolean {
  if (phrases.length === 0 || text.length === 0) return false;
  const lower = text.toLowerCase();
  return phrases.some((phrase) => lower.includes(phrase.toLowerCase()));
}

export function anyTermPresent(terms: ReadonlyMap<string, number> | ReadonlySet<string>, tokens: readonly string[]): boolean {
  return tokens.some((token) => terms.has(token));
}

/**
 * Vacuously true for an empty token list
 */
export function allTermsPresent(terms: ReadonlyMap<string, number> | ReadonlySet<string>, tokens: readonly string[]): boolean {
  return tokens.every((token) => terms.has(token));
}

/**
 * Ids of the messages that contain a query token or phrase, in message order
 */
export function findMatchedMessages(
  messages: readonly Message[],
  tokens: readonly string[],
  phrases: readonly string[]
): string[] {
  const matched: string[] = [];
  for (const message of messages) {
    if (message.content.length === 0) continue;
    const hasToken = tokens.length > 0 && anyTermPresent(new Set(tokenize(message.content)), tokens);
    if (hasToken || phraseMatches(message.content, phrases)) {
      matched.push(message.id);
    }
  }
  return matched;
}
