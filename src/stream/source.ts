/**
 * Byte sources for export files
 */

import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { DecodeError, ThreadscanError, mapFsError } from '../errors/index.js';
import { decodeJsonArray, type Chunk, type RawRecord } from './decoder.js';
import { isZipFile, readConversationsEntry } from './zip.js';

/**
 * Produces a fresh chunk stream each time it is called.
 * Every scan calls it once, so it must not hand out a used stream.
 */
export type SourceFactory = () => AsyncIterable<Chunk>;

/**
 * A path to a .json export, a path to an export .zip, or a factory
 */
export type ExportSource = string | SourceFactory;

/**
 * Human-readable name of a source for logs and messages
 */
export function describeSource(source: ExportSource): string {
  return typeof source === 'string' ? source : '<stream>';
}

async function* readFile(path: string): AsyncGenerator<Uint8Array> {
  try {
    await stat(path);
  } catch (err) {
    throw mapFsError(err, path);
  }

  const stream = createReadStream(path, { highWaterMark: 64 * 1024 });
  try {
    for await (const chunk of stream) {
      yield chunk;
    }
  } catch (err) {
    throw mapFsError(err, path);
  } finally {
    stream.destroy();
  }
}

/**
 * Open a source for one forward-only pass
 * @throws NotFoundError / AccessDeniedError for unusable paths
 */
export function openSource(source: ExportSource): AsyncIterable<Chunk> {
  if (typeof source !== 'string') {
    return source();
  }
  if (isZipFile(source)) {
    return readZip(source);
  }
  return readFile(source);
}

async function* readZip(path: string): AsyncGenerator<Uint8Array> {
  try {
    await stat(path);
  } catch (err) {
    throw mapFsError(err, path);
  }
  try {
    yield* readConversationsEntry(path);
  } catch (err) {
    throw toZipError(err, path);
  }
}

/**
 * Archive structure and inflate failures become DecodeError.
 * Errors from the file system keep their errno mapping.
 */
function toZipError(err: unknown, path: string): unknown {
  if (err instanceof ThreadscanError) return err;
  if (err instanceof Error && !('syscall' in err)) {
    return new DecodeError(`Corrupt ZIP archive ${path}: ${err.message}`, null, { cause: err });
  }
  return mapFsError(err, path);
}

/**
 * Open a source and decode its top-level array, one record per pull
 */
export function readRecords(source: ExportSource): AsyncGenerator<RawRecord> {
  return decodeJsonArray(openSource(source));
}
