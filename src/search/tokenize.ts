/**
 * Tokenizer shared by scoring, matching and exclusion
 *
 * Lowercases, then emits runs of ASCII letters/digits as tokens and every
 * other Unicode letter as a token of its own, so "Haskell很好" becomes
 * ["haskell", "很", "好"].
 */

const LATIN_RUN = /[a-z0-9]+/g;
const OTHER_LETTER = /(?![a-z])\p{L}/gu;

export function tokenize(text: string): string[] {
  const lower = text.toLowerCase();
  const tokens: string[] = lower.match(LATIN_RUN) ?? [];
  const others = lower.match(OTHER_LETTER);
  return others ? tokens.concat(others) : tokens;
}

/**
 * Offset of the first whole-token occurrence of `token` in `text`, or -1.
 * "cat" is found in "a cat" but not in "concatenate".
 */
export function findTokenOffset(text: string, token: string): number {
  const lower = text.toLowerCase();
  if (!/^[a-z0-9]+$/.test(token)) return lower.indexOf(token);
  for (const match of lower.matchAll(LATIN_RUN)) {
    if (match[0] === token) return match.index ?? -1;
  }
  return -1;
}

/**
 * Tokens of several query terms, de-duplicated, first-seen order
 */
export function tokenizeTerms(terms: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const term of terms) {
    for (const token of tokenize(term)) {
      seen.add(token);
    }
  }
  return [...seen];
}

/**
 * Term frequency table for a document
 */
export function termFrequencies(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}
