/**
 * Provider adapter contract and the shared streaming implementation
 *
 * Each export format implements parseRecord(); streaming, search and the
 * id lookups are the same for every provider and live in ExportAdapter.
 * Adapters keep no state between calls, and every call re-reads the source.
 */

import type pino from 'pino';
import type { Conversation, Message, SearchQuery, SearchResult } from '../model/index.js';
import { rankConversations } from '../search/index.js';
import { describeSource, readRecords, type ExportSource } from '../stream/index.js';
import { createLogger } from '../utils/logger.js';
import { BestIdMatch } from './lookup.js';
import {
  DEFAULT_PROGRESS_EVERY,
  DEFAULT_PROGRESS_INTERVAL_MS,
  ProgressReporter,
  type ProgressCallback,
} from './progress.js';

export type ProviderName = 'chatgpt' | 'claude';

/**
 * Invoked when a record (or a message inside one) is dropped
 */
export type SkipCallback = (identifier: string, reason: string) => void;

/**
 * Invoked when a record is kept but a value had to be substituted
 */
export type WarningCallback = (identifier: string, reason: string) => void;

export interface IngestOptions {
  onProgress?: ProgressCallback;
  onSkip?: SkipCallback;
  onWarning?: WarningCallback;
  /** Items between progress reports */
  progressEvery?: number;
  /** Milliseconds between progress reports */
  progressIntervalMs?: number;
}

export interface SearchOptions extends IngestOptions {
  snippetLength?: number;
}

export interface MessageLookup {
  message: Message;
  conversation: Conversation;
}

/**
 * The operations every provider exposes
 */
export interface ProviderAdapter {
  readonly provider: ProviderName;

  streamConversations(source: ExportSource, options?: IngestOptions): AsyncGenerator<Conversation>;

  search(source: ExportSource, query: SearchQuery, options?: SearchOptions): AsyncGenerator<SearchResult>;

  getConversationById(
    source: ExportSource,
    conversationId: string,
    options?: IngestOptions
  ): Promise<Conversation | null>;

  getMessageById(
    source: ExportSource,
    messageId: string,
    conversationIdHint?: string,
    options?: IngestOptions
  ): Promise<MessageLookup | null>;
}

export type ParseOutcome =
  | { ok: true; conversation: Conversation }
  | { ok: false; identifier: string; reason: string };

/**
 * What a provider parser gets besides the raw value
 */
export interface RecordContext {
  /** Position of the record in the top-level array */
  index: number;
  /** Report a dropped sub-record (e.g. one message) */
  skip: SkipCallback;
  /** Report a substituted value */
  warn: WarningCallback;
  logger: pino.Logger;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export abstract class ExportAdapter implements ProviderAdapter {
  abstract readonly provider: ProviderName;

  /**
   * Turn one raw array element into a conversation, or explain why not
   */
  protected abstract parseRecord(value: unknown, context: RecordContext): ParseOutcome;

  async *streamConversations(
    source: ExportSource,
    options: IngestOptions = {}
  ): AsyncGenerator<Conversation> {
    const logger = createLogger({ module: `ingest:${this.provider}`, source: describeSource(source) });
    const progress = new ProgressReporter(
      options.onProgress,
      options.progressEvery ?? DEFAULT_PROGRESS_EVERY,
      options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS
    );

    const skip: SkipCallback = (identifier, reason) => {
      logger.warn({ identifier, reason }, 'Skipped malformed record');
      options.onSkip?.(identifier, reason);
    };
    const warn: WarningCallback = (identifier, reason) => {
      logger.warn({ identifier, reason }, 'Substituted value in record');
      options.onWarning?.(identifier, reason);
    };

    for await (const record of readRecords(source)) {
      if (record.kind === 'malformed') {
        skip(`#${record.index}`, `Invalid JSON: ${record.reason}`);
        continue;
      }

      const outcome = this.parseRecord(record.value, { index: record.index, skip, warn, logger });
      if (!outcome.ok) {
        skip(outcome.identifier, outcome.reason);
        continue;
      }

      progress.tick();
      yield outcome.conversation;
    }

    progress.finish();
    logger.debug({ conversations: progress.total }, 'Finished streaming export');
  }

  search(
    source: ExportSource,
    query: SearchQuery,
    options: SearchOptions = {}
  ): AsyncGenerator<SearchResult> {
    return rankConversations(this.streamConversations(source, options), query, {
      snippetLength: options.snippetLength,
    });
  }

  async getConversationById(
    source: ExportSource,
    conversationId: string,
    options: IngestOptions = {}
  ): Promise<Conversation | null> {
    const match = new BestIdMatch<Conversation>(conversationId);
    for await (const conversation of this.streamConversations(source, options)) {
      if (match.offer(conversation.id, conversation)) break;
    }
    return match.best;
  }

  async getMessageById(
    source: ExportSource,
    messageId: string,
    conversationIdHint?: string,
    options: IngestOptions = {}
  ): Promise<MessageLookup | null> {
    if (conversationIdHint !== undefined) {
      const conversation = await this.getConversationById(source, conversationIdHint, options);
      if (!conversation) return null;

      const match = new BestIdMatch<MessageLookup>(messageId);
      for (const message of conversation.messages) {
        if (match.offer(message.id, { message, conversation })) break;
      }
      return match.best;
    }

    const match = new BestIdMatch<MessageLookup>(messageId);
    scan: for await (const conversation of this.streamConversations(source, options)) {
      for (const message of conversation.messages) {
        if (match.offer(message.id, { message, conversation })) break scan;
      }
    }
    return match.best;
  }
}

/**
 * One-line summary of schema issues for skip reasons
 */
export function describeIssues(issues: readonly { path: (string | number)[]; message: string }[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
