/**
 * Export source tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { DecodeError, NotFoundError, UnsupportedSchemaError } from '../errors/index.js';
import { buildZip, collect, createTempDir, textSource, type TempDir } from '../test-utils/fixtures.js';
import { describeSource, readRecords } from './source.js';
import { isZipFile } from './zip.js';

describe('readRecords', () => {
  let dir: TempDir;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  it('should read records from a JSON file', async () => {
    const file = await dir.write('conversations.json', '[{"id":"a"},{"id":"b"}]');

    const records = await collect(readRecords(file));

    expect(records.map((r) => r.kind === 'record' && r.value)).toEqual([{ id: 'a' }, { id: 'b' }]);
  });

  it('should raise NotFoundError for a missing file', async () => {
    const missing = join(dir.path, 'missing.json');

    await expect(collect(readRecords(missing))).rejects.toBeInstanceOf(NotFoundError);
    await expect(collect(readRecords(missing))).rejects.toThrow(`Export file not found: ${missing}`);
  });

  it('should raise NotFoundError for a missing ZIP file', async () => {
    await expect(collect(readRecords(join(dir.path, 'missing.zip')))).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should stream conversations.json out of a ZIP archive', async () => {
    const zip = await buildZip({
      'README.txt': 'not this one',
      'export/conversations.json': '[{"id":"zipped"}]',
    });
    const file = await dir.write('export.zip', zip);

    const records = await collect(readRecords(file));

    expect(records).toEqual([{ kind: 'record', index: 0, value: { id: 'zipped' } }]);
  });

  it('should ignore macOS resource copies inside a ZIP archive', async () => {
    const zip = await buildZip({
      '__MACOSX/conversations.json': 'garbage',
      'conversations.json': '[1]',
    });
    const file = await dir.write('export.zip', zip);

    const records = await collect(readRecords(file));

    expect(records).toEqual([{ kind: 'record', index: 0, value: 1 }]);
  });

  it('should raise UnsupportedSchemaError when the archive has no conversations.json', async () => {
    const file = await dir.write('export.zip', await buildZip({ 'chat.html': '<html></html>' }));

    await expect(collect(readRecords(file))).rejects.toBeInstanceOf(UnsupportedSchemaError);
  });

  it('should raise DecodeError for a file that is not a ZIP archive', async () => {
    const file = await dir.write('export.zip', 'this is plain text, not an archive');

    const error = await collect(readRecords(file)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({ code: 'DECODE_FAILURE' });
    expect(error).toHaveProperty('cause');
  });

  it('should raise DecodeError for a truncated ZIP archive', async () => {
    const zip = await buildZip({ 'conversations.json': '[{"id":"cut"}]' });
    const file = await dir.write('export.zip', zip.subarray(0, zip.length - 10));

    await expect(collect(readRecords(file))).rejects.toBeInstanceOf(DecodeError);
  });

  it('should call a factory source once per scan', async () => {
    let opened = 0;
    const factory = textSource('[1,2]');
    const counting = () => {
      opened++;
      return factory();
    };

    await collect(readRecords(counting));
    await collect(readRecords(counting));

    expect(opened).toBe(2);
  });
});

describe('describeSource', () => {
  it('should name paths and factories', () => {
    expect(describeSource('/tmp/export.json')).toBe('/tmp/export.json');
    expect(describeSource(textSource('[]'))).toBe('<stream>');
  });
});

describe('isZipFile', () => {
  it('should detect .zip extensions case-insensitively', () => {
    expect(isZipFile('export.zip')).toBe(true);
    expect(isZipFile('EXPORT.ZIP')).toBe(true);
    expect(isZipFile('conversations.json')).toBe(false);
  });
});
