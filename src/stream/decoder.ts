/**
 * Incremental decoder for a top-level JSON array
 *
 * Scans the input chunk by chunk and hands back one element at a time.
 * Only the text of the element currently being scanned is held in memory,
 * so peak usage follows the largest record rather than the whole file.
 */

import { StringDecoder } from 'string_decoder';
import { DecodeError } from '../errors/index.js';

/**
 * A decoded array element
 */
export interface DecodedRecord {
  kind: 'record';
  index: number;
  value: unknown;
}

/**
 * An element whose boundaries were found but whose text is not valid JSON.
 * Skip policy belongs to the consumer.
 */
export interface MalformedRecord {
  kind: 'malformed';
  index: number;
  text: string;
  reason: string;
}

export type RawRecord = DecodedRecord | MalformedRecord;

export type Chunk = Uint8Array | string;

type Phase = 'start' | 'first' | 'next' | 'element' | 'after' | 'done';

const OPEN_BRACE = 0x7b; // {
const CLOSE_BRACE = 0x7d; // }
const OPEN_BRACKET = 0x5b; // [
const CLOSE_BRACKET = 0x5d; // ]
const QUOTE = 0x22; // "
const BACKSLASH = 0x5c; // \
const COMMA = 0x2c; // ,
const BOM = 0xfeff;

function isWhitespace(code: number): boolean {
  return code === 0x20 || code === 0x0a || code === 0x0d || code === 0x09;
}

function describe(code: number): string {
  return JSON.stringify(String.fromCharCode(code));
}

/**
 * Push-style scanner over the text of a JSON array.
 * Feed it decoded text in any chunking; it yields each completed element.
 */
export class JsonArrayScanner {
  private phase: Phase = 'start';
  private offset = 0; // characters consumed before the current chunk
  private index = 0;

  // State of the element being scanned
  private parts: string[] = [];
  private depth = 0;
  private inString = false;
  private escaped = false;

  /**
   * Scan one piece of text, yielding the elements it completes
   */
  *feed(text: string): Generator<RawRecord> {
    let elementStart = this.phase === 'element' ? 0 : -1;

    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);

      switch (this.phase) {
        case 'start':
          if (isWhitespace(code) || (code === BOM && this.offset + i === 0)) continue;
          if (code !== OPEN_BRACKET) {
            throw new DecodeError(
              `Expected the export to be a JSON array, found ${describe(code)}`,
              this.offset + i
            );
          }
          this.phase = 'first';
          continue;

        case 'first':
        case 'next':
          if (isWhitespace(code)) continue;
          if (code === CLOSE_BRACKET && this.phase === 'first') {
            this.phase = 'done';
            continue;
          }
          if (code === COMMA || code === CLOSE_BRACKET || code === CLOSE_BRACE) {
            throw new DecodeError(
              `Unexpected ${describe(code)} where an array element was expected`,
              this.offset + i
            );
          }
          this.phase = 'element';
          elementStart = i;
          this.parts = [];
          this.depth = 0;
          this.inString = false;
          this.escaped = false;
          break; // the opening character belongs to the element

        case 'after':
          if (isWhitespace(code)) continue;
          if (code === COMMA) {
            this.phase = 'next';
            continue;
          }
          if (code === CLOSE_BRACKET) {
            this.phase = 'done';
            continue;
          }
          throw new DecodeError(
            `Expected "," or "]" after array element, found ${describe(code)}`,
            this.offset + i
          );

        case 'done':
          if (isWhitespace(code)) continue;
          throw new DecodeError(
            `Unexpected data after the closing "]": ${describe(code)}`,
            this.offset + i
          );

        case 'element':
          break;
      }

      if (this.inString) {
        if (this.escaped) {
          this.escaped = false;
        } else if (code === BACKSLASH) {
          this.escaped = true;
        } else if (code === QUOTE) {
          this.inString = false;
        }
        continue;
      }

      if (code === QUOTE) {
        this.inString = true;
      } else if (code === OPEN_BRACE || code === OPEN_BRACKET) {
        this.depth++;
      } else if (code === CLOSE_BRACE || code === CLOSE_BRACKET) {
        if (this.depth === 0) {
          if (code === CLOSE_BRACE) {
            throw new DecodeError('Unbalanced "}" in array element', this.offset + i);
          }
          // "]" closes the top-level array right after a scalar element
          this.parts.push(text.slice(elementStart, i));
          yield this.finishElement();
          elementStart = -1;
          this.phase = 'done';
          continue;
        }
        this.depth--;
        if (this.depth === 0) {
          this.parts.push(text.slice(elementStart, i + 1));
          yield this.finishElement();
          elementStart = -1;
          this.phase = 'after';
        }
      } else if (code === COMMA && this.depth === 0) {
        this.parts.push(text.slice(elementStart, i));
        yield this.finishElement();
        elementStart = -1;
        this.phase = 'next';
      }
    }

    if (this.phase === 'element' && elementStart >= 0) {
      this.parts.push(text.slice(elementStart));
    }
    this.offset += text.length;
  }

  /**
   * Signal end of input
   * @throws DecodeError if the array was never opened or never closed
   */
  end(): void {
    if (this.phase === 'start') {
      throw new DecodeError('Export is empty; expected a JSON array');
    }
    if (this.phase !== 'done') {
      throw new DecodeError('Unexpected end of input inside the top-level array', this.offset);
    }
  }

  /** Number of elements completed so far */
  get count(): number {
    return this.index;
  }

  private finishElement(): RawRecord {
    const text = this.parts.join('').trim();
    this.parts = [];
    const position = this.index++;
    try {
      return { kind: 'record', index: position, value: JSON.parse(text) };
    } catch (err) {
      return {
        kind: 'malformed',
        index: position,
        text,
        reason: err instanceof Error ? err.message : String(err),
      };
    }
  }
}

/**
 * Decode a JSON array into its elements, lazily.
 * Nothing is read until the consumer pulls the first element.
 *
 * @throws DecodeError when the top level is not an array, brackets do not
 *   balance, data follows the closing bracket, or the input ends early
 */
export async function* decodeJsonArray(chunks: AsyncIterable<Chunk>): AsyncGenerator<RawRecord> {
  const utf8 = new StringDecoder('utf8');
  const scanner = new JsonArrayScanner();

  for await (const chunk of chunks) {
    const text = typeof chunk === 'string' ? chunk : utf8.write(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));
    if (text.length > 0) {
      yield* scanner.feed(text);
    }
  }

  const rest = utf8.end();
  if (rest.length > 0) {
    yield* scanner.feed(rest);
  }
  scanner.end();
}
