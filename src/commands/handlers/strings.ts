import { bulkReply, errorReply, nullReply, OK } from '../../protocol/reply.js';
import { parseInteger, SYNTAX_ERROR } from '../args.js';
import type { CommandSpec } from '../types.js';

const INVALID_EXPIRE = errorReply("ERR invalid expire time in 'set' command");

export const stringCommands: CommandSpec[] = [
  {
    // SET key value [EX seconds | PX milliseconds]
    name: 'SET',
    arity: -3,
    write: true,
    handler: (keyspace, args) => {
      const [key, value] = args;
      let ttlMs: number | undefined;

      for (let i = 2; i < args.length; i += 2) {
        const option = args[i].toUpperCase();
        if (i + 1 >= args.length || (option !== 'EX' && option !== 'PX')) return SYNTAX_ERROR;

        const amount = parseInteger(args[i + 1]);
        if (amount === null || amount <= 0) return INVALID_EXPIRE;
        ttlMs = option === 'EX' ? amount * 1000 : amount;
      }

      keyspace.set(key, value, ttlMs);
      return OK;
    },
  },
  {
    name: 'GET',
    arity: 2,
    write: false,
    handler: (keyspace, args) => {
      const value = keyspace.get(args[0]);
      return value === null ? nullReply() : bulkReply(value);
    },
  },
];
