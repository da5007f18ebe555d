/**
 * JSON array decoder tests
 */

import { describe, it, expect } from 'vitest';
import { DecodeError } from '../errors/index.js';
import { collect, textSource } from '../test-utils/fixtures.js';
import { decodeJsonArray, JsonArrayScanner, type Chunk, type RawRecord } from './decoder.js';

function decode(text: string, chunkSize = 4): Promise<RawRecord[]> {
  return collect(decodeJsonArray(textSource(text, chunkSize)()));
}

function values(records: RawRecord[]): unknown[] {
  return records.map((r) => (r.kind === 'record' ? r.value : r.text));
}

describe('decodeJsonArray', () => {
  it('should yield each element of an array of objects', async () => {
    const records = await decode('[{"a":1},{"b":[2,3]}]', 3);

    expect(records).toEqual([
      { kind: 'record', index: 0, value: { a: 1 } },
      { kind: 'record', index: 1, value: { b: [2, 3] } },
    ]);
  });

  it('should decode the same records whatever the chunk size', async () => {
    const text = JSON.stringify([{ title: 'x, y' }, { nested: { list: [1, { deep: '}' }] } }, 'plain']);
    const expected = values(await decode(text, text.length));

    for (const size of [1, 2, 5, 7]) {
      expect(values(await decode(text, size))).toEqual(expected);
    }
  });

  it('should handle scalar elements', async () => {
    const records = await decode('[1, "x,y", null, true]', 2);

    expect(values(records)).toEqual([1, 'x,y', null, true]);
  });

  it('should ignore brackets and quotes inside strings', async () => {
    const text = JSON.stringify(['a"]b', 'c\\', '{not an object}']);
    const records = await decode(text, 1);

    expect(values(records)).toEqual(['a"]b', 'c\\', '{not an object}']);
  });

  it('should yield nothing for an empty array', async () => {
    expect(await decode('  [ ]  ')).toEqual([]);
  });

  it('should surface a malformed element and keep going', async () => {
    const records = await decode('[{"a":1},{bad},{"c":3}]', 5);

    expect(records).toHaveLength(3);
    expect(records[0]).toEqual({ kind: 'record', index: 0, value: { a: 1 } });
    expect(records[1].kind).toBe('malformed');
    expect(records[1].index).toBe(1);
    expect(records[1]).toMatchObject({ text: '{bad}' });
    expect(records[2]).toEqual({ kind: 'record', index: 2, value: { c: 3 } });
  });

  it('should skip a leading byte order mark', async () => {
    expect(values(await decode('\uFEFF[1]'))).toEqual([1]);
  });

  it('should reassemble multi-byte characters split across chunks', async () => {
    const bytes = Buffer.from('["héllo wörld"]', 'utf8');
    const source = async function* (): AsyncGenerator<Chunk> {
      // Split inside the two-byte encoding of "é"
      yield new Uint8Array(bytes.subarray(0, 4));
      yield new Uint8Array(bytes.subarray(4));
    };

    const records = await collect(decodeJsonArray(source()));

    expect(values(records)).toEqual(['héllo wörld']);
  });

  it('should reject a top level that is not an array', async () => {
    const result = decode('{"a":1}');

    await expect(result).rejects.toBeInstanceOf(DecodeError);
    await expect(decode('{"a":1}')).rejects.toThrow(
      'Expected the export to be a JSON array, found "{" (at character 0)'
    );
  });

  it('should reject empty input', async () => {
    await expect(decode('')).rejects.toThrow('Export is empty; expected a JSON array');
    await expect(decode('   \n')).rejects.toThrow('Export is empty; expected a JSON array');
  });

  it('should reject truncated input', async () => {
    await expect(decode('[{"a":1}')).rejects.toThrow(
      'Unexpected end of input inside the top-level array (at character 8)'
    );
  });

  it('should reject a trailing comma', async () => {
    await expect(decode('[1,]')).rejects.toThrow('Unexpected "]" where an array element was expected');
  });

  it('should reject data after the closing bracket', async () => {
    await expect(decode('[1] x')).rejects.toThrow('Unexpected data after the closing "]": "x"');
  });

  it('should not read the source before the first pull', async () => {
    let started = false;
    const source = async function* (): AsyncGenerator<Chunk> {
      started = true;
      yield '[1]';
    };

    const records = decodeJsonArray(source());
    expect(started).toBe(false);

    await records.next();
    expect(started).toBe(true);
  });

  it('should release the source when the consumer stops early', async () => {
    let released = false;
    const source = async function* (): AsyncGenerator<Chunk> {
      try {
        yield '[1,';
        yield '2,';
        yield '3]';
      } finally {
        released = true;
      }
    };

    const records = decodeJsonArray(source());
    const first = await records.next();
    expect(first.value).toEqual({ kind: 'record', index: 0, value: 1 });

    await records.return(undefined);
    expect(released).toBe(true);
  });
});

describe('JsonArrayScanner', () => {
  it('should count completed elements', () => {
    const scanner = new JsonArrayScanner();

    const first = [...scanner.feed('[{"a":1},')];
    expect(first).toHaveLength(1);
    expect(scanner.count).toBe(1);

    const rest = [...scanner.feed('{"b":2}]')];
    expect(rest).toHaveLength(1);
    expect(scanner.count).toBe(2);
    expect(() => scanner.end()).not.toThrow();
  });

  it('should report the offset of an unbalanced brace', () => {
    const scanner = new JsonArrayScanner();

    try {
      [...scanner.feed('[1}')];
      expect.unreachable('scanner should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(DecodeError);
      expect(err).toMatchObject({ offset: 2, code: 'DECODE_FAILURE' });
    }
  });
});
