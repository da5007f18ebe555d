/**
 * Export and conversation statistics
 *
 * calculateStatistics() streams the export once and keeps only running
 * aggregates, never the conversations themselves.
 */

import type { Conversation, Role } from '../model/index.js';
import type { IngestOptions, ProviderAdapter } from '../ingest/index.js';
import type { ExportSource } from '../stream/index.js';
import { createLogger } from '../utils/logger.js';

export interface ConversationSummary {
  id: string;
  title: string;
  messageCount: number;
}

export interface ExportStatistics {
  totalConversations: number;
  totalMessages: number;
  /** Earliest createdAt */
  earliestDate: Date | null;
  /** Latest updatedAt, or createdAt where updatedAt is absent */
  latestDate: Date | null;
  averageMessages: number;
  largestConversation: ConversationSummary | null;
  smallestConversation: ConversationSummary | null;
  skippedCount: number;
}

export interface ConversationStatistics {
  conversationId: string;
  title: string;
  createdAt: Date;
  updatedAt: Date | null;
  messageCount: number;
  messageCountByRole: Record<Role, number>;
  firstMessage: Date | null;
  lastMessage: Date | null;
  durationSeconds: number;
  /** Null for fewer than two messages */
  averageGapSeconds: number | null;
}

function summarize(conversation: Conversation): ConversationSummary {
  return {
    id: conversation.id,
    title: conversation.title,
    messageCount: conversation.messages.length,
  };
}

export async function calculateStatistics(
  adapter: ProviderAdapter,
  source: ExportSource,
  options: IngestOptions = {}
): Promise<ExportStatistics> {
  const logger = createLogger({ module: 'stats' });
  let totalConversations = 0;
  let totalMessages = 0;
  let earliestDate: Date | null = null;
  let latestDate: Date | null = null;
  let largestConversation: ConversationSummary | null = null;
  let smallestConversation: ConversationSummary | null = null;
  let skippedCount = 0;

  const conversations = adapter.streamConversations(source, {
    ...options,
    onSkip: (identifier, reason) => {
      skippedCount++;
      options.onSkip?.(identifier, reason);
    },
  });

  for await (const conversation of conversations) {
    totalConversations++;
    const count = conversation.messages.length;
    totalMessages += count;

    if (earliestDate === null || conversation.createdAt < earliestDate) {
      earliestDate = conversation.createdAt;
    }
    const latest = conversation.updatedAt ?? conversation.createdAt;
    if (latestDate === null || latest > latestDate) {
      latestDate = latest;
    }

    if (largestConversation === null || count > largestConversation.messageCount) {
      largestConversation = summarize(conversation);
    }
    if (smallestConversation === null || count < smallestConversation.messageCount) {
      smallestConversation = summarize(conversation);
    }
  }

  logger.debug({ provider: adapter.provider, totalConversations, totalMessages, skippedCount }, 'Statistics complete');

  return {
    totalConversations,
    totalMessages,
    earliestDate,
    latestDate,
    averageMessages: totalConversations > 0 ? totalMessages / totalConversations : 0,
    largestConversation,
    smallestConversation,
    skippedCount,
  };
}

/**
 * Per-conversation breakdown. Pure; timestamps are taken in chronological
 * order regardless of message order.
 */
export function calculateConversationStatistics(conversation: Conversation): ConversationStatistics {
  const messageCountByRole: Record<Role, number> = { user: 0, assistant: 0, system: 0 };
  for (const message of conversation.messages) {
    messageCountByRole[message.role]++;
  }

  const times = conversation.messages.map((m) => m.timestamp.getTime()).sort((a, b) => a - b);
  const first = times.length > 0 ? times[0] : null;
  const last = times.length > 0 ? times[times.length - 1] : null;
  const durationSeconds = first !== null && last !== null ? (last - first) / 1000 : 0;

  return {
    conversationId: conversation.id,
    title: conversation.title,
    createdAt: conversation.createdAt,
    updatedAt: conversation.updatedAt ?? null,
    messageCount: conversation.messages.length,
    messageCountByRole,
    firstMessage: first !== null ? new Date(first) : null,
    lastMessage: last !== null ? new Date(last) : null,
    durationSeconds,
    averageGapSeconds: times.length >= 2 ? durationSeconds / (times.length - 1) : null,
  };
}
