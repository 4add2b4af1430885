import {
  ArrayTooLargeError,
  BulkTooLargeError,
  IncompleteInputError,
  MalformedFrameError,
  type ProtocolError,
} from './errors.js';

const CR = 0x0d;
const LF = 0x0a;
const ARRAY_PREFIX = 0x2a; // '*'
const BULK_PREFIX = 0x24; // '$'

export const DEFAULT_MAX_BULK_LENGTH = 512 * 1024 * 1024;
export const DEFAULT_MAX_ARRAY_LENGTH = 1_000_000;
// longest header or inline line accepted before a newline shows up
export const MAX_LINE_LENGTH = 64 * 1024;
const INITIAL_CAPACITY = 16 * 1024;
// storage above this size is released once everything in it has been consumed
const RETAINED_CAPACITY = 1024 * 1024;

export interface ParserOptions {
  maxBulkLength?: number;
  maxArrayLength?: number;
}

export type ParseResult =
  | { type: 'command'; args: string[] }
  | { type: 'incomplete' }
  | { type: 'error'; error: ProtocolError };

const INCOMPLETE: ParseResult = { type: 'incomplete' };

function parseInteger(text: string): number | null {
  if (!/^-?\d+$/.test(text)) return null;
  const n = Number(text);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Incremental RESP request decoder.
 *
 * Feed socket chunks with push() and drain requests with next() until it reports
 * `incomplete`. A request is either an inline line of whitespace-separated tokens or a
 * multi-bulk array. Arguments are byte strings: each character holds one byte (latin1),
 * so binary payloads survive unchanged.
 *
 * On a protocol error only the bytes examined up to the fault are discarded, and the next
 * call continues with whatever follows them.
 */
export class RespParser {
  // grows geometrically; `buffer` is the filled part of it
  private storage: Buffer = Buffer.allocUnsafe(INITIAL_CAPACITY);
  private buffer: Buffer = this.storage.subarray(0, 0);
  private offset = 0;
  // bytes the frame at `offset` needs before parsing it again can succeed
  private awaiting = 0;
  private maxBulkLength: number;
  private maxArrayLength: number;

  constructor(options: ParserOptions = {}) {
    this.maxBulkLength = options.maxBulkLength ?? DEFAULT_MAX_BULK_LENGTH;
    this.maxArrayLength = options.maxArrayLength ?? DEFAULT_MAX_ARRAY_LENGTH;
  }

  /** Bytes received but not yet consumed by a complete request or an error. */
  get pending(): number {
    return this.buffer.length - this.offset;
  }

  /**
   * Appends a chunk. Unconsumed bytes move to the front of the storage, which doubles
   * whenever it runs out, so copying stays linear in the bytes received.
   */
  push(chunk: Buffer): void {
    const live = this.pending;
    const required = live + chunk.length;

    if (live === 0 && this.storage.length > RETAINED_CAPACITY) {
      this.storage = Buffer.allocUnsafe(INITIAL_CAPACITY);
    }
    if (required > this.storage.length) {
      const grown = Buffer.allocUnsafe(Math.max(required, this.storage.length * 2));
      this.buffer.copy(grown, 0, this.offset);
      this.storage = grown;
    } else if (this.offset > 0 && live > 0) {
      this.storage.copyWithin(0, this.offset, this.buffer.length);
    }

    this.offset = 0;
    chunk.copy(this.storage, live);
    this.buffer = this.storage.subarray(0, required);
  }

  next(): ParseResult {
    // a bulk payload is still arriving; skip re-parsing its frame
    if (this.pending < this.awaiting) return INCOMPLETE;
    this.awaiting = 0;

    while (this.pending > 0) {
      const lineEnd = this.findLineEnd(this.offset);
      if (lineEnd === 'overflow') return this.overflow();
      if (lineEnd < 0) return INCOMPLETE;

      if (this.buffer[this.offset] === ARRAY_PREFIX) {
        return this.parseArray(lineEnd);
      }

      const line = this.lineText(this.offset, lineEnd);
      this.offset = lineEnd + 1;
      const tokens = line.trim().split(/\s+/).filter(t => t.length > 0);
      if (tokens.length > 0) {
        return { type: 'command', args: tokens };
      }
      // blank lines between requests are ignored
    }
    return INCOMPLETE;
  }

  /**
   * Call when the peer has closed the stream. Leftover bytes mean a request was cut off.
   */
  finish(): IncompleteInputError | null {
    const pending = this.pending;
    this.storage = Buffer.allocUnsafe(INITIAL_CAPACITY);
    this.buffer = this.storage.subarray(0, 0);
    this.offset = 0;
    this.awaiting = 0;
    return pending > 0 ? new IncompleteInputError(pending) : null;
  }

  private parseArray(headerEnd: number): ParseResult {
    const count = parseInteger(this.lineText(this.offset + 1, headerEnd));
    let pos = headerEnd + 1;

    if (count === null) {
      return this.fail(pos, new MalformedFrameError('invalid multibulk length'));
    }
    if (count < 0) {
      return this.fail(pos, new MalformedFrameError(`negative array length: ${count}`));
    }
    if (count > this.maxArrayLength) {
      return this.fail(pos, new ArrayTooLargeError(count, this.maxArrayLength));
    }

    const args: string[] = [];
    for (let i = 0; i < count; i++) {
      const lineEnd = this.findLineEnd(pos);
      if (lineEnd === 'overflow') return this.overflow();
      if (lineEnd < 0) return INCOMPLETE;

      if (lineEnd === pos || this.buffer[pos] !== BULK_PREFIX) {
        return this.fail(lineEnd + 1, new MalformedFrameError(`expected '$' at index ${i}`));
      }

      const length = parseInteger(this.lineText(pos + 1, lineEnd));
      if (length === null || length < -1) {
        return this.fail(lineEnd + 1, new MalformedFrameError(`invalid bulk length at index ${i}`));
      }
      if (length === -1) {
        // null bulk string stands in as an empty argument
        args.push('');
        pos = lineEnd + 1;
        continue;
      }
      if (length > this.maxBulkLength) {
        return this.fail(lineEnd + 1, new BulkTooLargeError(i, length, this.maxBulkLength));
      }

      const dataStart = lineEnd + 1;
      const dataEnd = dataStart + length;
      if (this.buffer.length < dataEnd + 2) {
        this.awaiting = dataEnd + 2 - this.offset;
        return INCOMPLETE;
      }

      if (this.buffer[dataEnd] !== CR || this.buffer[dataEnd + 1] !== LF) {
        return this.fail(dataEnd + 2, new MalformedFrameError(`bulk string at index ${i} missing CRLF terminator`));
      }

      args.push(this.buffer.toString('latin1', dataStart, dataEnd));
      pos = dataEnd + 2;
    }

    this.offset = pos;
    return { type: 'command', args };
  }

  /** Index of the next LF at or after `from`, -1 if none yet. */
  private findLineEnd(from: number): number | 'overflow' {
    const lineEnd = this.buffer.indexOf(LF, from);
    if (lineEnd < 0 && this.buffer.length - from > MAX_LINE_LENGTH) return 'overflow';
    if (lineEnd - from > MAX_LINE_LENGTH) return 'overflow';
    return lineEnd;
  }

  /** Text between `start` and the LF at `lineEnd`, without a trailing CR. */
  private lineText(start: number, lineEnd: number): string {
    const end = lineEnd > start && this.buffer[lineEnd - 1] === CR ? lineEnd - 1 : lineEnd;
    return this.buffer.toString('latin1', start, end);
  }

  private fail(resumeAt: number, error: ProtocolError): ParseResult {
    this.offset = Math.min(resumeAt, this.buffer.length);
    return { type: 'error', error };
  }

  private overflow(): ParseResult {
    return this.fail(this.buffer.length, new MalformedFrameError('too big request line'));
  }
}
