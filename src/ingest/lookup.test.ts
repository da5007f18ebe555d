/**
 * Id lookup tests
 */

import { describe, it, expect } from 'vitest';
import { BestIdMatch, matchId } from './lookup.js';

describe('matchId', () => {
  it('should classify exact, case-insensitive and prefix matches', () => {
    expect(matchId('abc-123', 'abc-123')).toBe('exact');
    expect(matchId('ABC-123', 'abc-123')).toBe('exact-ci');
    expect(matchId('abc-123', 'ABC-')).toBe('prefix');
    expect(matchId('abc-123', 'abc')).toBeNull();
    expect(matchId('abc-123', 'xyz-1')).toBeNull();
  });
});

describe('BestIdMatch', () => {
  it('should prefer an exact match and stop there', () => {
    const match = new BestIdMatch<string>('abcd-1');

    expect(match.offer('abcd-10', 'prefix')).toBe(false);
    expect(match.offer('ABCD-1', 'case')).toBe(false);
    expect(match.offer('abcd-1', 'exact')).toBe(true);
    expect(match.best).toBe('exact');
  });

  it('should prefer a case-insensitive match over an earlier prefix match', () => {
    const match = new BestIdMatch<string>('abcd');

    match.offer('abcd-1', 'first prefix');
    match.offer('ABCD', 'case');

    expect(match.best).toBe('case');
  });

  it('should keep the first prefix match in stream order', () => {
    const match = new BestIdMatch<string>('abcd');

    match.offer('abcd-1', 'first');
    match.offer('abcd-2', 'second');

    expect(match.best).toBe('first');
  });

  it('should be null when nothing matched', () => {
    expect(new BestIdMatch<string>('zzzz').best).toBeNull();
  });
});
