/**
 * Core CLI commands
 * list, search, get, stats, export
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { getConfig } from '../../config/index.js';
import { ValidationError } from '../../errors/index.js';
import {
  CONVERSATION_COLUMNS,
  MESSAGE_COLUMNS,
  SEARCH_RESULT_COLUMNS,
  conversationRow,
  csvRow,
  formatMessage,
  messageRows,
  renderMarkdown,
  searchResultRow,
  writeMarkdownFile,
} from '../../export/index.js';
import {
  findConversationByTitle,
  getAdapter,
  PROVIDERS,
  type IngestOptions,
  type ProviderAdapter,
  type ProviderChoice,
} from '../../ingest/index.js';
import { parseSearchQuery, type Conversation, type SearchResult } from '../../model/index.js';
import { calculateStatistics } from '../../stats/index.js';
import { formatDate, formatTimestamp, truncate } from '../../utils/index.js';
import { reportError } from '../errors.js';

/** Options shared by every command through the program */
export interface GlobalOptions {
  provider?: string;
}

/** Options for the list command */
export interface ListOptions {
  limit?: string;
  json?: boolean;
  csv?: boolean;
}

/** Options for the search command */
export interface SearchCommandOptions {
  keywords?: string;
  phrase: string[];
  exclude?: string;
  title?: string;
  from?: string;
  to?: string;
  minMessages?: string;
  maxMessages?: string;
  role?: string;
  matchMode?: string;
  sort?: string;
  order?: string;
  limit?: string;
  json?: boolean;
  csv?: boolean;
  csvMessages?: boolean;
}

/** Options for the get subcommands */
export interface GetOptions {
  conversation?: string;
  json?: boolean;
}

/** Options for the stats command */
export interface StatsOptions {
  json?: boolean;
}

/** Options for the export command */
export interface ExportOptions {
  output?: string;
  title?: string;
}

const PROVIDER_CHOICES: readonly ProviderChoice[] = ['auto', ...PROVIDERS];

/**
 * At most one of the machine-readable output flags
 */
function exclusiveFormats(options: { json?: boolean; csv?: boolean; csvMessages?: boolean }): void {
  const chosen = [options.json && '--json', options.csv && '--csv', options.csvMessages && '--csv-messages'].filter(
    (flag): flag is string => typeof flag === 'string'
  );
  if (chosen.length > 1) {
    throw new ValidationError(`Choose one output format, got ${chosen.join(' and ')}`);
  }
}

type ExportTarget = { kind: 'id'; id: string } | { kind: 'title'; title: string };

/**
 * Exactly one of the id argument and --title
 */
function exportTarget(id: string | undefined, title: string | undefined): ExportTarget {
  if (id !== undefined && title !== undefined) {
    throw new ValidationError('Specify either a conversation id or --title, not both');
  }
  if (id !== undefined) return { kind: 'id', id };
  if (title !== undefined) return { kind: 'title', title };
  throw new ValidationError('Specify a conversation id or --title');
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function splitTerms(value: string | undefined): string[] {
  return value === undefined ? [] : value.split(',');
}

/**
 * Parse an integer flag. Non-numeric input becomes NaN, which query
 * validation rejects.
 */
function integerOption(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  return /^-?\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : Number.NaN;
}

function resolveProvider(command: Command): ProviderChoice {
  const globals: GlobalOptions = command.optsWithGlobals();
  const requested = globals.provider ?? getConfig().provider;
  const choice = PROVIDER_CHOICES.find((p) => p === requested);
  if (!choice) {
    throw new ValidationError(`Unknown provider "${requested}" (expected one of ${PROVIDER_CHOICES.join(', ')})`);
  }
  return choice;
}

async function openExport(file: string, command: Command): Promise<{ adapter: ProviderAdapter; path: string }> {
  const path = resolve(file);
  const adapter = await getAdapter(resolveProvider(command), path);
  return { adapter, path };
}

/**
 * Observers wired to the configured progress cadence. Progress goes to
 * stderr only when it is a terminal; skips are counted for the summary.
 */
function ingestOptions(): IngestOptions & { skipped: () => number; done: () => void } {
  const config = getConfig();
  const interactive = process.stderr.isTTY === true;
  let skipped = 0;

  return {
    progressEvery: config.progressEvery,
    progressIntervalMs: config.progressIntervalMs,
    onProgress: interactive
      ? (count) => {
          process.stderr.write(`\rProcessed ${count} conversations...`);
        }
      : undefined,
    onSkip: () => {
      skipped++;
    },
    skipped: () => skipped,
    done: () => {
      if (interactive) process.stderr.write('\r' + ' '.repeat(60) + '\r');
      if (skipped > 0) console.error(`Skipped ${skipped} malformed records`);
    },
  };
}

function conversationSummary(conversation: Conversation) {
  return {
    id: conversation.id,
    title: conversation.title,
    createdAt: formatTimestamp(conversation.createdAt),
    updatedAt: conversation.updatedAt ? formatTimestamp(conversation.updatedAt) : null,
    messageCount: conversation.messages.length,
  };
}

function printConversation(conversation: Conversation): void {
  console.log(`${conversation.title || '(No title)'}`);
  console.log(`ID: ${conversation.id}`);
  console.log(`Created: ${formatTimestamp(conversation.createdAt)}`);
  if (conversation.updatedAt) console.log(`Updated: ${formatTimestamp(conversation.updatedAt)}`);
  console.log(`Messages: ${conversation.messages.length}`);
  console.log('');
  for (const message of conversation.messages) {
    console.log(formatMessage(message));
  }
}

/**
 * Register core commands on the program
 */
export function registerCoreCommands(program: Command): void {
  // List command
  program
    .command('list <file>')
    .description('List conversations in an export')
    .option('--limit <n>', 'Stop after this many conversations')
    .option('--json', 'Output as JSON')
    .option('--csv', 'Output as CSV')
    .action(async (file: string, options: ListOptions, command: Command) => {
      try {
        const limit = integerOption(options.limit);
        if (limit !== undefined && !(limit > 0)) {
          throw new ValidationError(`--limit must be a positive integer, got "${options.limit}"`);
        }
        exclusiveFormats(options);

        const { adapter, path } = await openExport(file, command);
        const observers = ingestOptions();
        const rows: ReturnType<typeof conversationSummary>[] = [];

        if (options.csv) console.log(csvRow(CONVERSATION_COLUMNS));
        for await (const conversation of adapter.streamConversations(path, observers)) {
          if (options.csv) console.log(conversationRow(conversation));
          rows.push(conversationSummary(conversation));
          if (limit !== undefined && rows.length >= limit) break;
        }
        observers.done();

        if (options.csv) return;

        if (options.json) {
          console.log(JSON.stringify(rows, null, 2));
          return;
        }
        for (const row of rows) {
          console.log(`${row.id}  ${row.createdAt.slice(0, 10)}  ${String(row.messageCount).padStart(4)} msgs  ${row.title}`);
        }
        console.log(`\n${rows.length} conversations`);
      } catch (err) {
        reportError(err);
      }
    });

  // Search command
  program
    .command('search <file>')
    .description('Rank conversations by keyword relevance')
    .option('-k, --keywords <terms>', 'Comma-separated keywords')
    .option('--phrase <text>', 'Exact phrase to match (repeatable)', collect, [])
    .option('--exclude <terms>', 'Comma-separated terms that disqualify a conversation')
    .option('--title <text>', 'Title must contain this text')
    .option('--from <date>', 'Created on or after (YYYY-MM-DD)')
    .option('--to <date>', 'Created on or before (YYYY-MM-DD)')
    .option('--min-messages <n>', 'Minimum message count')
    .option('--max-messages <n>', 'Maximum message count')
    .option('--role <role>', 'Only match messages from user, assistant or system')
    .option('--match-mode <mode>', 'any or all keywords')
    .option('--sort <field>', 'score, date, title or messages')
    .option('--order <order>', 'asc or desc')
    .option('--limit <n>', 'Maximum number of results')
    .option('--json', 'Output as JSON')
    .option('--csv', 'Output results as CSV, one row per conversation')
    .option('--csv-messages', 'Output every message of the results as CSV')
    .action(async (file: string, options: SearchCommandOptions, command: Command) => {
      try {
        exclusiveFormats(options);
        const query = parseSearchQuery({
          keywords: splitTerms(options.keywords),
          phrases: options.phrase,
          excludeKeywords: splitTerms(options.exclude),
          titleFilter: options.title,
          fromDate: options.from,
          toDate: options.to,
          minMessages: integerOption(options.minMessages),
          maxMessages: integerOption(options.maxMessages),
          roleFilter: options.role,
          matchMode: options.matchMode,
          sortBy: options.sort,
          sortOrder: options.order,
          limit: integerOption(options.limit),
        });

        const { adapter, path } = await openExport(file, command);
        const observers = ingestOptions();
        const results: SearchResult[] = [];
        for await (const result of adapter.search(path, query, {
          ...observers,
          snippetLength: getConfig().snippetLength,
        })) {
          results.push(result);
        }
        observers.done();

        if (options.csv) {
          console.log(csvRow(SEARCH_RESULT_COLUMNS));
          for (const result of results) console.log(searchResultRow(result));
          return;
        }
        if (options.csvMessages) {
          console.log(csvRow(MESSAGE_COLUMNS));
          for (const result of results) {
            for (const row of messageRows(result.conversation)) console.log(row);
          }
          return;
        }

        if (options.json) {
          const rows = results.map((r) => ({
            ...conversationSummary(r.conversation),
            score: r.score,
            matchedMessageIds: r.matchedMessageIds,
            snippet: r.snippet,
          }));
          console.log(JSON.stringify(rows, null, 2));
          return;
        }

        if (results.length === 0) {
          console.log('No matching conversations found.');
          return;
        }
        for (const result of results) {
          const { conversation } = result;
          console.log(
            `${result.score.toFixed(3)}  ${conversation.id}  ${formatDate(conversation.createdAt)}  ${truncate(conversation.title, 60)}`
          );
          console.log(`       ${result.snippet}`);
        }
      } catch (err) {
        reportError(err);
      }
    });

  // Get command group
  const get = program.command('get').description('Fetch a conversation or message by id or id prefix');

  get
    .command('conversation <file> <id>')
    .description('Show one conversation')
    .option('--json', 'Output as JSON')
    .action(async (file: string, id: string, options: GetOptions, command: Command) => {
      try {
        const { adapter, path } = await openExport(file, command);
        const conversation = await adapter.getConversationById(path, id, ingestOptions());
        if (!conversation) {
          console.error(`Conversation not found: ${id}`);
          process.exitCode = 1;
          return;
        }
        if (options.json) {
          console.log(JSON.stringify(conversation, null, 2));
        } else {
          printConversation(conversation);
        }
      } catch (err) {
        reportError(err);
      }
    });

  get
    .command('message <file> <id>')
    .description('Show one message and the conversation it belongs to')
    .option('--conversation <id>', 'Only look inside this conversation')
    .option('--json', 'Output as JSON')
    .action(async (file: string, id: string, options: GetOptions, command: Command) => {
      try {
        const { adapter, path } = await openExport(file, command);
        const found = await adapter.getMessageById(path, id, options.conversation, ingestOptions());
        if (!found) {
          console.error(`Message not found: ${id}`);
          process.exitCode = 1;
          return;
        }
        if (options.json) {
          console.log(
            JSON.stringify({ message: found.message, conversation: conversationSummary(found.conversation) }, null, 2)
          );
          return;
        }
        console.log(`Conversation: ${found.conversation.title || '(No title)'} (${found.conversation.id})`);
        console.log(`Message: ${found.message.id}`);
        console.log('');
        console.log(formatMessage(found.message));
      } catch (err) {
        reportError(err);
      }
    });

  // Stats command
  program
    .command('stats <file>')
    .description('Summarize an export')
    .option('--json', 'Output as JSON')
    .action(async (file: string, options: StatsOptions, command: Command) => {
      try {
        const { adapter, path } = await openExport(file, command);
        const observers = ingestOptions();
        const stats = await calculateStatistics(adapter, path, observers);
        observers.done();

        if (options.json) {
          console.log(JSON.stringify({ provider: adapter.provider, ...stats }, null, 2));
          return;
        }

        console.log(`Provider:       ${adapter.provider}`);
        console.log(`Conversations:  ${stats.totalConversations}`);
        console.log(`Messages:       ${stats.totalMessages}`);
        console.log(`Average:        ${stats.averageMessages.toFixed(1)} messages per conversation`);
        if (stats.earliestDate && stats.latestDate) {
          console.log(`Date range:     ${formatDate(stats.earliestDate)} to ${formatDate(stats.latestDate)}`);
        }
        if (stats.largestConversation) {
          const { title, id, messageCount } = stats.largestConversation;
          console.log(`Largest:        ${title || '(No title)'} (${id}, ${messageCount} messages)`);
        }
        if (stats.smallestConversation) {
          const { title, id, messageCount } = stats.smallestConversation;
          console.log(`Smallest:       ${title || '(No title)'} (${id}, ${messageCount} messages)`);
        }
        if (stats.skippedCount > 0) {
          console.log(`Skipped:        ${stats.skippedCount}`);
        }
      } catch (err) {
        reportError(err);
      }
    });

  // Export command
  program
    .command('export <file> [id]')
    .description('Render one conversation as markdown')
    .option('-t, --title <text>', 'Pick the conversation by title (case-insensitive substring) instead of id')
    .option('-o, --output <dir>', 'Write YYYY-MM-DD-<slug>.md into this directory instead of stdout')
    .action(async (file: string, id: string | undefined, options: ExportOptions, command: Command) => {
      try {
        const target = exportTarget(id, options.title);
        const { adapter, path } = await openExport(file, command);
        let conversation: Conversation | null;
        if (target.kind === 'title') {
          const match = await findConversationByTitle(adapter, path, target.title, ingestOptions());
          if (match.matchIds.length > 1) {
            console.error(
              `Multiple conversations found with title containing "${target.title}": ${match.matchIds.join(', ')}. Use the conversation id instead.`
            );
            process.exitCode = 1;
            return;
          }
          conversation = match.conversation;
          if (!conversation) {
            console.error(`No conversation found with title containing "${target.title}"`);
            process.exitCode = 1;
            return;
          }
          if (!options.output) console.error(`Matched conversation: ${conversation.title}`);
        } else {
          conversation = await adapter.getConversationById(path, target.id, ingestOptions());
          if (!conversation) {
            console.error(`Conversation not found: ${target.id}`);
            process.exitCode = 1;
            return;
          }
        }

        if (options.output) {
          const result = await writeMarkdownFile(conversation, resolve(options.output), {
            provider: adapter.provider,
          });
          console.log(`Wrote ${result.filePath} (${result.bytesWritten} bytes)`);
        } else {
          console.log(renderMarkdown(conversation, { provider: adapter.provider }));
        }
      } catch (err) {
        reportError(err);
      }
    });
}
