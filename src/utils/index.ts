/**
 * Utility functions
 */

/**
 * Slugify a string for use in filenames
 */
export function slugify(text: string, maxLength = 50): string {
  return (
    text
      .toLowerCase()
      .replace(/[^a-z0-9\s-]/g, '')
      .replace(/\s+/g, '-')
      .replace(/-+/g, '-')
      .replace(/^-|-$/g, '')
      .slice(0, maxLength)
      .replace(/-$/, '') || 'untitled'
  );
}

/**
 * Format a date as ISO string (date only, UTC)
 */
export function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * Format a date as ISO string (full timestamp, UTC)
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

/**
 * Truncate text to a maximum length, marking the cut with an ellipsis
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, Math.max(0, maxLength - 3)) + '...';
}
