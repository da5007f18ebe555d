/**
 * Timestamp parser tests
 */

import { describe, it, expect } from 'vitest';
import { parseEpochSeconds, parseIsoTimestamp } from './timestamps.js';

describe('parseEpochSeconds', () => {
  it('should convert fractional epoch seconds', () => {
    expect(parseEpochSeconds(1_700_000_000.5)?.toISOString()).toBe('2023-11-14T22:13:20.500Z');
  });

  it('should reject non-numbers and out-of-range values', () => {
    expect(parseEpochSeconds('1700000000')).toBeNull();
    expect(parseEpochSeconds(null)).toBeNull();
    expect(parseEpochSeconds(Number.NaN)).toBeNull();
    expect(parseEpochSeconds(1e20)).toBeNull();
  });
});

describe('parseIsoTimestamp', () => {
  it('should parse UTC timestamps with fractional seconds', () => {
    expect(parseIsoTimestamp('2024-03-01T10:00:00.123456Z')?.toISOString()).toBe('2024-03-01T10:00:00.123Z');
  });

  it('should apply offsets in every accepted spelling', () => {
    expect(parseIsoTimestamp('2024-03-01T12:00:00+02:00')?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
    expect(parseIsoTimestamp('2024-03-01T12:00:00+0200')?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
    expect(parseIsoTimestamp('2024-03-01T05:00:00-05')?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
  });

  it('should reject timestamps without a zone', () => {
    expect(parseIsoTimestamp('2024-03-01T10:00:00')).toBeNull();
  });

  it('should reject impossible dates and garbage', () => {
    expect(parseIsoTimestamp('2024-02-30T10:00:00Z')).toBeNull();
    expect(parseIsoTimestamp('yesterday')).toBeNull();
    expect(parseIsoTimestamp(42)).toBeNull();
  });
});
