/**
 * Streaming access to conversations.json inside a ChatGPT export ZIP
 * The entry is inflated on the fly; nothing is extracted to disk.
 */

import { basename } from 'path';
import type { Readable } from 'stream';
import yauzl from 'yauzl';
import { UnsupportedSchemaError } from '../errors/index.js';

export const CONVERSATIONS_ENTRY = 'conversations.json';

/**
 * Check if a file is a ZIP file by extension
 */
export function isZipFile(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.zip');
}

/**
 * Open a ZIP file and return a yauzl ZipFile instance
 */
function openZipFile(zipPath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(zipPath, { lazyEntries: true, autoClose: false }, (err, zipFile) => {
      if (err) reject(err);
      else if (zipFile) resolve(zipFile);
      else reject(new Error(`Failed to open ZIP file: ${zipPath}`));
    });
  });
}

function isConversationsEntry(fileName: string): boolean {
  if (fileName.endsWith('/')) return false;
  if (fileName.includes('__MACOSX')) return false;
  const name = basename(fileName);
  return name === CONVERSATIONS_ENTRY;
}

/**
 * Walk the central directory until conversations.json turns up (at any depth)
 */
function findEntry(zipFile: yauzl.ZipFile): Promise<yauzl.Entry | null> {
  return new Promise((resolve, reject) => {
    const onEntry = (entry: yauzl.Entry) => {
      if (isConversationsEntry(entry.fileName)) {
        cleanup();
        resolve(entry);
      } else {
        zipFile.readEntry();
      }
    };
    const onEnd = () => {
      cleanup();
      resolve(null);
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    const cleanup = () => {
      zipFile.off('entry', onEntry);
      zipFile.off('end', onEnd);
      zipFile.off('error', onError);
    };

    zipFile.on('entry', onEntry);
    zipFile.on('end', onEnd);
    zipFile.on('error', onError);
    zipFile.readEntry();
  });
}

function openEntryStream(zipFile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipFile.openReadStream(entry, (err, readStream) => {
      if (err) reject(err);
      else if (readStream) resolve(readStream);
      else reject(new Error(`Failed to open ${entry.fileName} in ZIP file`));
    });
  });
}

/**
 * Stream the bytes of conversations.json out of an export archive.
 * The archive is closed when the consumer finishes, stops early or fails.
 *
 * @throws UnsupportedSchemaError when the archive has no conversations.json
 */
export async function* readConversationsEntry(zipPath: string): AsyncGenerator<Uint8Array> {
  const zipFile = await openZipFile(zipPath);
  let stream: Readable | null = null;

  try {
    const entry = await findEntry(zipFile);
    if (!entry) {
      throw new UnsupportedSchemaError(`${CONVERSATIONS_ENTRY} not found in ZIP file: ${zipPath}`);
    }

    stream = await openEntryStream(zipFile, entry);
    for await (const chunk of stream) {
      yield chunk;
    }
  } finally {
    stream?.destroy();
    zipFile.close();
  }
}
