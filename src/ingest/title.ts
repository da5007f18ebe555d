/**
 * Conversation lookup by title
 */

import { ValidationError } from '../errors/index.js';
import type { Conversation } from '../model/index.js';
import type { ExportSource } from '../stream/index.js';
import type { IngestOptions, ProviderAdapter } from './provider.js';

export interface TitleMatch {
  /** First conversation, in export order, whose title contains the text */
  conversation: Conversation | null;
  /** Id of every matching conversation, in export order */
  matchIds: string[];
}

/**
 * Case-insensitive substring match over titles. Scans the whole export so
 * that an ambiguous title is reported with every matching id; only the
 * first matching conversation is held.
 */
export async function findConversationByTitle(
  adapter: ProviderAdapter,
  source: ExportSource,
  title: string,
  options: IngestOptions = {}
): Promise<TitleMatch> {
  const wanted = title.trim().toLowerCase();
  if (wanted.length === 0) {
    throw new ValidationError('Title to look up must be non-empty');
  }

  let conversation: Conversation | null = null;
  const matchIds: string[] = [];
  for await (const candidate of adapter.streamConversations(source, options)) {
    if (!candidate.title.toLowerCase().includes(wanted)) continue;
    matchIds.push(candidate.id);
    if (conversation === null) conversation = candidate;
  }
  return { conversation, matchIds };
}
