/**
 * Builders for raw export records and temporary export files used by tests
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import yazl from 'yazl';
import type { Chunk, SourceFactory } from '../stream/index.js';

export interface ChatGPTMessageFixture {
  id: string;
  role?: string;
  text?: string;
  /** Overrides `text` */
  parts?: unknown[];
  contentType?: string;
  /** Epoch seconds; null omits the field */
  createTime?: number | null | string;
  /** Node id of the parent; defaults to the previous message's node */
  parent?: string | null;
  /** Node id; defaults to `node-<id>` */
  node?: string;
  modelSlug?: string;
}

export interface ChatGPTConversationFixture {
  id: string;
  title?: string | null;
  createTime?: number;
  updateTime?: number | null | string;
  messages: ChatGPTMessageFixture[];
  extra?: Record<string, unknown>;
}

export const ROOT_NODE = 'client-created-root';

/**
 * A ChatGPT conversation record with a mapping tree. Messages chain one
 * after another under an empty root node unless `parent` says otherwise.
 */
export function chatgptConversation(fixture: ChatGPTConversationFixture): Record<string, unknown> {
  const createTime = fixture.createTime ?? 1_700_000_000;
  const mapping: Record<string, { id: string; message: unknown; parent: string | null; children: string[] }> = {
    [ROOT_NODE]: { id: ROOT_NODE, message: null, parent: null, children: [] },
  };

  let previous = ROOT_NODE;
  fixture.messages.forEach((message, i) => {
    const node = message.node ?? `node-${message.id}`;
    const parent = message.parent === undefined ? previous : message.parent;
    const raw: Record<string, unknown> = {
      id: message.id,
      author: { role: message.role ?? (i % 2 === 0 ? 'user' : 'assistant') },
      content: {
        content_type: message.contentType ?? 'text',
        parts: message.parts ?? [message.text ?? ''],
      },
      metadata: message.modelSlug ? { model_slug: message.modelSlug } : {},
    };
    if (message.createTime !== null) {
      raw.create_time = message.createTime ?? createTime + i;
    }
    mapping[node] = { id: node, message: raw, parent, children: [] };
    previous = node;
  });

  for (const [node, entry] of Object.entries(mapping)) {
    if (entry.parent !== null) {
      mapping[entry.parent]?.children.push(node);
    }
  }

  const record: Record<string, unknown> = {
    id: fixture.id,
    title: fixture.title === undefined ? `Conversation ${fixture.id}` : fixture.title,
    create_time: createTime,
    mapping,
    current_node: previous,
    ...fixture.extra,
  };
  if (fixture.updateTime !== undefined) {
    record.update_time = fixture.updateTime;
  }
  return record;
}

export interface ClaudeMessageFixture {
  uuid: string;
  sender?: string;
  text?: string;
  /** Content blocks; defaults to one text block holding `text` */
  content?: unknown[];
  createdAt?: string | null;
}

export interface ClaudeConversationFixture {
  uuid: string;
  name?: string;
  createdAt?: string;
  updatedAt?: string;
  messages: ClaudeMessageFixture[];
}

/**
 * A Claude conversation record with a flat message list
 */
export function claudeConversation(fixture: ClaudeConversationFixture): Record<string, unknown> {
  const createdAt = fixture.createdAt ?? '2024-03-01T10:00:00Z';
  const record: Record<string, unknown> = {
    uuid: fixture.uuid,
    name: fixture.name ?? `Conversation ${fixture.uuid}`,
    created_at: createdAt,
    chat_messages: fixture.messages.map((message, i) => {
      const raw: Record<string, unknown> = {
        uuid: message.uuid,
        sender: message.sender ?? (i % 2 === 0 ? 'human' : 'assistant'),
        text: message.text ?? '',
        content: message.content ?? [{ type: 'text', text: message.text ?? '' }],
      };
      if (message.createdAt !== null) {
        raw.created_at = message.createdAt ?? createdAt;
      }
      return raw;
    }),
  };
  if (fixture.updatedAt !== undefined) {
    record.updated_at = fixture.updatedAt;
  }
  return record;
}

/**
 * A source that serves `text` in chunks of `chunkSize` characters
 */
export function textSource(text: string, chunkSize = 16): SourceFactory {
  return async function* (): AsyncGenerator<Chunk> {
    for (let i = 0; i < text.length; i += chunkSize) {
      yield text.slice(i, i + chunkSize);
    }
  };
}

/**
 * A source serving the JSON encoding of `records`
 */
export function recordsSource(records: unknown[], chunkSize = 64): SourceFactory {
  return textSource(JSON.stringify(records), chunkSize);
}

/**
 * Collect an async iterable into an array
 */
export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}

/**
 * Temporary directory helper for tests that need real files
 */
export interface TempDir {
  path: string;
  write(name: string, contents: string | Uint8Array): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createTempDir(prefix = 'threadscan-test-'): Promise<TempDir> {
  const path = await mkdtemp(join(tmpdir(), prefix));
  return {
    path,
    async write(name, contents) {
      const file = join(path, name);
      await writeFile(file, contents);
      return file;
    },
    async cleanup() {
      await rm(path, { recursive: true, force: true });
    },
  };
}

/**
 * Build a ZIP archive in memory
 */
export async function buildZip(entries: Record<string, string>): Promise<Buffer> {
  const zip = new yazl.ZipFile();
  for (const [name, text] of Object.entries(entries)) {
    zip.addBuffer(Buffer.from(text, 'utf8'), name);
  }
  zip.end();

  const chunks: Buffer[] = [];
  for await (const chunk of zip.outputStream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}
