/**
 * Provider selection
 *
 * Peeks at the first array element to tell the export formats apart.
 * The peek stops reading right after that element.
 */

import { UnsupportedSchemaError } from '../errors/index.js';
import { describeSource, readRecords, type ExportSource } from '../stream/index.js';
import { ChatGPTAdapter } from './chatgpt/index.js';
import { ClaudeAdapter } from './claude/index.js';
import { isRecord, type ProviderAdapter, type ProviderName } from './provider.js';

export type ProviderChoice = ProviderName | 'auto';

export const PROVIDERS: readonly ProviderName[] = ['chatgpt', 'claude'];

export async function detectProvider(source: ExportSource): Promise<ProviderName> {
  const records = readRecords(source);
  try {
    const first = await records.next();
    if (first.done) {
      // An empty export parses the same under every adapter
      return 'chatgpt';
    }

    const record = first.value;
    if (record.kind === 'record' && isRecord(record.value)) {
      if ('chat_messages' in record.value) return 'claude';
      if ('mapping' in record.value) return 'chatgpt';
    }
    throw new UnsupportedSchemaError(
      `Unrecognized export format in ${describeSource(source)}: first record has neither "mapping" nor "chat_messages"`
    );
  } finally {
    await records.return(undefined);
  }
}

export function createAdapter(provider: ProviderName): ProviderAdapter {
  switch (provider) {
    case 'chatgpt':
      return new ChatGPTAdapter();
    case 'claude':
      return new ClaudeAdapter();
  }
}

/**
 * Adapter for an explicit provider, or for whatever the source looks like
 */
export async function getAdapter(provider: ProviderChoice, source: ExportSource): Promise<ProviderAdapter> {
  const name = provider === 'auto' ? await detectProvider(source) : provider;
  return createAdapter(name);
}
