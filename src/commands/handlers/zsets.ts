import {
  arrayReply,
  bulkReply,
  errorReply,
  formatScore,
  integerReply,
  nestedReply,
  nullReply,
  scoredReply,
} from '../../protocol/reply.js';
import { fromResult, NOT_A_FLOAT, NOT_AN_INTEGER, parseInteger, parseScore, SYNTAX_ERROR } from '../args.js';
import type { CommandSpec } from '../types.js';

export const sortedSetCommands: CommandSpec[] = [
  {
    // ZADD key score member [score member ...]
    name: 'ZADD',
    arity: -4,
    write: true,
    handler: (keyspace, args) => {
      const [key, ...pairs] = args;
      if (pairs.length % 2 !== 0) {
        return errorReply("ERR wrong number of arguments for 'zadd' command");
      }

      // validate every score before touching the key
      const entries: Array<{ score: number; member: string }> = [];
      for (let i = 0; i < pairs.length; i += 2) {
        const score = parseScore(pairs[i]);
        if (score === null) return NOT_A_FLOAT;
        entries.push({ score, member: pairs[i + 1] });
      }

      let changed = 0;
      for (const { score, member } of entries) {
        const res = keyspace.zadd(key, score, member);
        if (!res.ok) return errorReply(res.error.message);
        changed += res.value;
      }
      return integerReply(changed);
    },
  },
  {
    name: 'ZSCORE',
    arity: 3,
    write: false,
    handler: (keyspace, args) =>
      fromResult(keyspace.zscore(args[0], args[1]), score =>
        score === null ? nullReply() : bulkReply(formatScore(score)),
      ),
  },
  {
    // ZRANGE key start stop [WITHSCORES]
    name: 'ZRANGE',
    arity: -4,
    write: false,
    handler: (keyspace, args) => {
      const [key, startArg, stopArg, ...rest] = args;
      const start = parseInteger(startArg);
      const stop = parseInteger(stopArg);
      if (start === null || stop === null) return NOT_AN_INTEGER;

      if (rest.length === 0) {
        return fromResult(keyspace.zrange(key, start, stop), arrayReply);
      }
      if (rest.length > 1 || rest[0].toUpperCase() !== 'WITHSCORES') return SYNTAX_ERROR;

      return fromResult(keyspace.zrangeWithScores(key, start, stop), entries =>
        nestedReply(entries.map(e => scoredReply(e.score, e.member))),
      );
    },
  },
  {
    name: 'ZREM',
    arity: -3,
    write: true,
    handler: (keyspace, args) => fromResult(keyspace.zrem(args[0], ...args.slice(1)), integerReply),
  },
];
