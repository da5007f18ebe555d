/**
 * Provider detection tests
 */

import { describe, it, expect } from 'vitest';
import { UnsupportedSchemaError } from '../errors/index.js';
import type { Chunk } from '../stream/index.js';
import { chatgptConversation, claudeConversation, recordsSource, textSource } from '../test-utils/fixtures.js';
import { ChatGPTAdapter } from './chatgpt/index.js';
import { ClaudeAdapter } from './claude/index.js';
import { createAdapter, detectProvider, getAdapter } from './detect.js';

describe('detectProvider', () => {
  it('should recognize a ChatGPT export by its mapping', async () => {
    const source = recordsSource([chatgptConversation({ id: 'c', messages: [{ id: 'm', text: 'x' }] })]);

    expect(await detectProvider(source)).toBe('chatgpt');
  });

  it('should recognize a Claude export by its chat_messages', async () => {
    const source = recordsSource([claudeConversation({ uuid: 'c', messages: [] })]);

    expect(await detectProvider(source)).toBe('claude');
  });

  it('should default an empty export to chatgpt', async () => {
    expect(await detectProvider(textSource('[]'))).toBe('chatgpt');
  });

  it('should reject an unrecognized first record', async () => {
    await expect(detectProvider(recordsSource([{ messages: [] }]))).rejects.toBeInstanceOf(UnsupportedSchemaError);
    await expect(detectProvider(textSource('[{broken}]'))).rejects.toBeInstanceOf(UnsupportedSchemaError);
  });

  it('should stop reading after the first record', async () => {
    let chunksRead = 0;
    let released = false;
    const source = async function* (): AsyncGenerator<Chunk> {
      try {
        const parts = ['[{"uuid":"a","chat_messages":[]}', ',{"uuid":"b"', ',"chat_messages":[]}]'];
        for (const part of parts) {
          chunksRead++;
          yield part;
        }
      } finally {
        released = true;
      }
    };

    expect(await detectProvider(source)).toBe('claude');
    expect(chunksRead).toBe(1);
    expect(released).toBe(true);
  });
});

describe('getAdapter', () => {
  it('should honor an explicit provider without reading the source', async () => {
    const unreadable = async function* (): AsyncGenerator<Chunk> {
      throw new Error('should not be read');
    };

    expect(await getAdapter('claude', unreadable)).toBeInstanceOf(ClaudeAdapter);
  });

  it('should detect the provider for auto', async () => {
    const source = recordsSource([chatgptConversation({ id: 'c', messages: [{ id: 'm', text: 'x' }] })]);

    expect(await getAdapter('auto', source)).toBeInstanceOf(ChatGPTAdapter);
  });
});

describe('createAdapter', () => {
  it('should build each adapter', () => {
    expect(createAdapter('chatgpt').provider).toBe('chatgpt');
    expect(createAdapter('claude').provider).toBe('claude');
  });
});
