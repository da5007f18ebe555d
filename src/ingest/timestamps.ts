/**
 * Timestamp parsing for provider encodings
 * Every parser returns null instead of throwing; callers decide the fallback.
 */

// Upper bound of the ECMAScript time value range, in seconds
const MAX_EPOCH_SECONDS = 8.64e12;

/**
 * Unix epoch seconds (fractional allowed) → Date
 */
export function parseEpochSeconds(value: unknown): Date | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) return null;
  if (Math.abs(value) > MAX_EPOCH_SECONDS) return null;
  const date = new Date(Math.round(value * 1000));
  return Number.isNaN(date.getTime()) ? null : date;
}

const ISO_8601 =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?(Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * ISO-8601 string with a zone designator → Date.
 * Strings without a zone are rejected rather than guessed.
 */
export function parseIsoTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string') return null;
  const match = ISO_8601.exec(value.trim());
  if (!match) return null;

  const [, day, hours, minutes, seconds = '00', fraction = '', zone] = match;
  const millis = fraction.padEnd(3, '0').slice(0, 3);

  let offset = zone.toUpperCase();
  if (offset !== 'Z') {
    const digits = offset.slice(1).replace(':', '');
    offset = `${offset[0]}${digits.slice(0, 2)}:${digits.slice(2, 4).padEnd(2, '0')}`;
  }

  const date = new Date(`${day}T${hours}:${minutes}:${seconds}.${millis}${offset}`);
  if (Number.isNaN(date.getTime())) return null;

  // Reject rollovers such as February 30th
  const [year, month, dayOfMonth] = day.split('-').map(Number);
  const check = new Date(Date.UTC(year, month - 1, dayOfMonth));
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== dayOfMonth) return null;

  return date;
}
