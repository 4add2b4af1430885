import { errorReply, type Reply } from '../protocol/reply.js';
import type { StoreResult } from '../store/types.js';

export const SYNTAX_ERROR = errorReply('ERR syntax error');
export const NOT_AN_INTEGER = errorReply('ERR value is not an integer or out of range');
export const NOT_A_FLOAT = errorReply('ERR value is not a valid float');
export const INVALID_CURSOR = errorReply('ERR invalid cursor');

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)inf(inity)?$/i;

export function parseInteger(text: string): number | null {
  if (!/^[+-]?\d+$/.test(text)) return null;
  const n = Number(text);
  return Number.isSafeInteger(n) ? n : null;
}

export function parseScore(text: string): number | null {
  const inf = INFINITY_PATTERN.exec(text);
  if (inf) return inf[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  if (!FLOAT_PATTERN.test(text)) return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

/**
 * Maps a store result to a reply; type mismatches become error replies carrying the
 * store's message.
 */
export function fromResult<T>(result: StoreResult<T>, toReply: (value: T) => Reply): Reply {
  if (!result.ok) return errorReply(result.error.message);
  return toReply(result.value);
}

export interface ScanArgs {
  cursor: number;
  pattern: string;
  count: number;
}

/**
 * Parses `cursor [MATCH pattern] [COUNT count]`.
 */
export function parseScanArgs(args: string[]): ScanArgs | Reply {
  const cursor = parseInteger(args[0]);
  if (cursor === null || cursor < 0) return INVALID_CURSOR;

  let pattern = '*';
  let count = 10;
  for (let i = 1; i < args.length; i += 2) {
    const option = args[i].toUpperCase();
    if (i + 1 >= args.length) return SYNTAX_ERROR;
    const value = args[i + 1];

    if (option === 'MATCH') {
      pattern = value;
    } else if (option === 'COUNT') {
      const parsed = parseInteger(value);
      if (parsed === null) return NOT_AN_INTEGER;
      count = parsed;
    } else {
      return SYNTAX_ERROR;
    }
  }

  return { cursor, pattern, count };
}

export function isReply(value: ScanArgs | Reply): value is Reply {
  return 'type' in value;
}
