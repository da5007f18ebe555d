/**
 * Id matching for the get-by-id operations
 *
 * Lookups accept the full id or a prefix of at least MIN_PREFIX_LENGTH
 * characters, case-insensitively. Within one scan the preference is:
 * exact case-sensitive match (ends the scan), then the first
 * case-insensitive exact match, then the first prefix match.
 */

export const MIN_PREFIX_LENGTH = 4;

export type IdMatch = 'exact' | 'exact-ci' | 'prefix';

export function matchId(candidate: string, wanted: string): IdMatch | null {
  if (candidate === wanted) return 'exact';
  const lowerCandidate = candidate.toLowerCase();
  const lowerWanted = wanted.toLowerCase();
  if (lowerCandidate === lowerWanted) return 'exact-ci';
  if (lowerWanted.length >= MIN_PREFIX_LENGTH && lowerCandidate.startsWith(lowerWanted)) {
    return 'prefix';
  }
  return null;
}

/**
 * Keeps the best candidate seen so far in stream order
 */
export class BestIdMatch<T> {
  private exactCaseInsensitive: T | null = null;
  private prefix: T | null = null;
  private exact: T | null = null;

  constructor(private readonly wanted: string) {}

  /**
   * Offer a candidate. Returns true once an exact match is held.
   */
  offer(candidateId: string, value: T): boolean {
    if (this.exact !== null) return true;

    switch (matchId(candidateId, this.wanted)) {
      case 'exact':
        this.exact = value;
        return true;
      case 'exact-ci':
        if (this.exactCaseInsensitive === null) this.exactCaseInsensitive = value;
        return false;
      case 'prefix':
        if (this.prefix === null) this.prefix = value;
        return false;
      case null:
        return false;
    }
  }

  get best(): T | null {
    return this.exact ?? this.exactCaseInsensitive ?? this.prefix;
  }
}
