/**
 * CSV export
 *
 * RFC 4180 fields: a value containing a comma, quote or line break is
 * quoted with inner quotes doubled; null is an empty, unquoted field.
 * Line breaks inside content are kept as-is. Rows end with "\n".
 */

import type { Conversation, SearchResult } from '../model/index.js';

export type CsvValue = string | number | null;

export const CONVERSATION_COLUMNS = ['conversation_id', 'title', 'created_at', 'updated_at', 'message_count'] as const;
export const SEARCH_RESULT_COLUMNS = [...CONVERSATION_COLUMNS, 'score'] as const;
export const MESSAGE_COLUMNS = ['conversation_id', 'message_id', 'role', 'timestamp', 'content'] as const;

const NEEDS_QUOTING = /[",\r\n]/;

export function csvField(value: CsvValue): string {
  if (value === null) return '';
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function csvRow(values: readonly CsvValue[]): string {
  return values.map(csvField).join(',');
}

/**
 * ISO 8601 to the second, UTC
 */
export function csvTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function conversationRow(conversation: Conversation): string {
  return csvRow([
    conversation.id,
    conversation.title,
    csvTimestamp(conversation.createdAt),
    conversation.updatedAt ? csvTimestamp(conversation.updatedAt) : null,
    conversation.messages.length,
  ]);
}

/**
 * Conversation row plus the normalized score to three decimals
 */
export function searchResultRow(result: SearchResult): string {
  return `${conversationRow(result.conversation)},${csvField(result.score.toFixed(3))}`;
}

/**
 * One row per message, in conversation order
 */
export function messageRows(conversation: Conversation): string[] {
  return conversation.messages.map((message) =>
    csvRow([conversation.id, message.id, message.role, csvTimestamp(message.timestamp), message.content])
  );
}

function csvDocument(header: readonly string[], rows: Iterable<string>): string {
  let out = csvRow(header) + '\n';
  for (const row of rows) {
    out += row + '\n';
  }
  return out;
}

export function conversationsToCsv(conversations: Iterable<Conversation>): string {
  return csvDocument(CONVERSATION_COLUMNS, mapRows(conversations, conversationRow));
}

export function searchResultsToCsv(results: Iterable<SearchResult>): string {
  return csvDocument(SEARCH_RESULT_COLUMNS, mapRows(results, searchResultRow));
}

/**
 * Message-level CSV across every given conversation
 */
export function messagesToCsv(conversations: Iterable<Conversation>): string {
  return csvDocument(MESSAGE_COLUMNS, flatRows(conversations));
}

function* mapRows<T>(items: Iterable<T>, toRow: (item: T) => string): Generator<string> {
  for (const item of items) {
    yield toRow(item);
  }
}

function* flatRows(conversations: Iterable<Conversation>): Generator<string> {
  for (const conversation of conversations) {
    yield* messageRows(conversation);
  }
}
