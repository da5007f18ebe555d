/**
 * Search query tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors/index.js';
import { createSearchQuery, hasKeywords, hasPhrases, parseSearchQuery } from './search.js';

describe('createSearchQuery', () => {
  it('should apply defaults', () => {
    const query = createSearchQuery();

    expect(query).toEqual({
      keywords: [],
      phrases: [],
      excludeKeywords: [],
      titleFilter: undefined,
      matchMode: 'any',
      sortBy: 'score',
      sortOrder: 'desc',
    });
    expect(hasKeywords(query)).toBe(false);
    expect(hasPhrases(query)).toBe(false);
  });

  it('should trim terms and drop blank ones', () => {
    const query = createSearchQuery({ keywords: [' haskell ', '', '  '], phrases: ['exact match'] });

    expect(query.keywords).toEqual(['haskell']);
    expect(query.phrases).toEqual(['exact match']);
  });

  it('should treat a blank title filter as absent', () => {
    expect(createSearchQuery({ titleFilter: '   ' }).titleFilter).toBeUndefined();
  });

  it('should be frozen', () => {
    const query = createSearchQuery({ keywords: ['a'] });

    expect(Object.isFrozen(query)).toBe(true);
    expect(Object.isFrozen(query.keywords)).toBe(true);
  });

  it('should reject a non-positive limit', () => {
    expect(() => createSearchQuery({ limit: 0 })).toThrow(ValidationError);
    expect(() => createSearchQuery({ limit: 1.5 })).toThrow(ValidationError);
  });

  it('should reject fromDate after toDate', () => {
    expect(() => createSearchQuery({ fromDate: '2024-03-01', toDate: '2024-02-01' })).toThrow(
      'fromDate (2024-03-01) is after toDate (2024-02-01)'
    );
  });

  it('should accept equal date bounds', () => {
    expect(createSearchQuery({ fromDate: '2024-03-01', toDate: '2024-03-01' }).fromDate).toBe('2024-03-01');
  });

  it('should reject malformed and impossible dates', () => {
    expect(() => createSearchQuery({ fromDate: '03/01/2024' })).toThrow('Expected a date in YYYY-MM-DD format');
    expect(() => createSearchQuery({ toDate: '2024-02-30' })).toThrow('Not a valid calendar date');
  });

  it('should reject minMessages above maxMessages', () => {
    expect(() => createSearchQuery({ minMessages: 5, maxMessages: 2 })).toThrow(
      'minMessages (5) is greater than maxMessages (2)'
    );
  });
});

describe('parseSearchQuery', () => {
  it('should reject unknown roles and fields', () => {
    expect(() => parseSearchQuery({ roleFilter: 'tool' })).toThrow(ValidationError);
    expect(() => parseSearchQuery({ keyword: ['typo'] })).toThrow(ValidationError);
  });

  it('should reject NaN counts', () => {
    expect(() => parseSearchQuery({ minMessages: Number.NaN })).toThrow(ValidationError);
  });
});
