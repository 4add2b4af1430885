import { arrayReply, bulkReply, integerReply, nullReply, type Reply } from '../../protocol/reply.js';
import { fromResult, NOT_AN_INTEGER, parseInteger } from '../args.js';
import type { CommandSpec } from '../types.js';

function popped(value: string | null): Reply {
  return value === null ? nullReply() : bulkReply(value);
}

export const listCommands: CommandSpec[] = [
  {
    name: 'LPUSH',
    arity: -3,
    write: true,
    handler: (keyspace, args) => fromResult(keyspace.lpush(args[0], ...args.slice(1)), integerReply),
  },
  {
    name: 'RPUSH',
    arity: -3,
    write: true,
    handler: (keyspace, args) => fromResult(keyspace.rpush(args[0], ...args.slice(1)), integerReply),
  },
  {
    name: 'LPOP',
    arity: 2,
    write: true,
    handler: (keyspace, args) => fromResult(keyspace.lpop(args[0]), popped),
  },
  {
    name: 'RPOP',
    arity: 2,
    write: true,
    handler: (keyspace, args) => fromResult(keyspace.rpop(args[0]), popped),
  },
  {
    name: 'LRANGE',
    arity: 4,
    write: false,
    handler: (keyspace, args) => {
      const start = parseInteger(args[1]);
      const stop = parseInteger(args[2]);
      if (start === null || stop === null) return NOT_AN_INTEGER;
      return fromResult(keyspace.lrange(args[0], start, stop), arrayReply);
    },
  },
];
