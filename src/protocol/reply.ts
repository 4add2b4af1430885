// RESP reply model and encoder

export type Reply =
  | { type: 'simple'; value: string }
  | { type: 'error'; message: string }
  | { type: 'integer'; value: number }
  | { type: 'bulk'; value: string }
  | { type: 'null' }
  | { type: 'array'; items: string[] }
  | { type: 'page'; cursor: string; items: string[] }
  | { type: 'scored'; score: number; member: string }
  | { type: 'nested'; items: Reply[] };

const CRLF = '\r\n';

// --- Helper builders ---

export function simpleReply(value: string): Reply {
  return { type: 'simple', value };
}

export function errorReply(message: string): Reply {
  return { type: 'error', message };
}

export function integerReply(value: number): Reply {
  return { type: 'integer', value };
}

export function bulkReply(value: string): Reply {
  return { type: 'bulk', value };
}

export function nullReply(): Reply {
  return { type: 'null' };
}

export function arrayReply(items: string[]): Reply {
  return { type: 'array', items };
}

export function pageReply(cursor: number, items: string[]): Reply {
  return { type: 'page', cursor: String(cursor), items };
}

export function scoredReply(score: number, member: string): Reply {
  return { type: 'scored', score, member };
}

export function nestedReply(items: Reply[]): Reply {
  return { type: 'nested', items };
}

export const OK = simpleReply('OK');

/**
 * Scores go over the wire with six decimals, infinities as "inf" / "-inf".
 */
export function formatScore(score: number): string {
  if (score === Number.POSITIVE_INFINITY) return 'inf';
  if (score === Number.NEGATIVE_INFINITY) return '-inf';
  return score.toFixed(6);
}

// simple strings and errors are single lines
function singleLine(text: string): string {
  return text.replace(/[\r\n]+/g, ' ');
}

function bulk(value: string): string {
  return `$${value.length}${CRLF}${value}${CRLF}`;
}

function bulkArray(items: string[]): string {
  return `*${items.length}${CRLF}${items.map(bulk).join('')}`;
}

function encodeText(reply: Reply): string {
  switch (reply.type) {
    case 'simple':
      return `+${singleLine(reply.value)}${CRLF}`;
    case 'error':
      return `-${singleLine(reply.message)}${CRLF}`;
    case 'integer':
      return `:${Math.trunc(reply.value)}${CRLF}`;
    case 'bulk':
      return bulk(reply.value);
    case 'null':
      return `$-1${CRLF}`;
    case 'array':
      return bulkArray(reply.items);
    case 'page':
      return `*2${CRLF}${bulk(reply.cursor)}${bulkArray(reply.items)}`;
    case 'scored':
      return `*2${CRLF}${bulk(formatScore(reply.score))}${bulk(reply.member)}`;
    case 'nested':
      return `*${reply.items.length}${CRLF}${reply.items.map(encodeText).join('')}`;
  }
}

/**
 * Encodes a reply to wire bytes. Strings are byte strings (one character per byte), the
 * same mapping the parser decodes with, so bulk lengths are byte counts.
 */
export function encodeReply(reply: Reply): Buffer {
  return Buffer.from(encodeText(reply), 'latin1');
}
