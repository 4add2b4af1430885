import { arrayReply, bulkReply, errorReply, integerReply, nullReply, pageReply } from '../../protocol/reply.js';
import { fromResult, isReply, parseScanArgs } from '../args.js';
import type { CommandSpec } from '../types.js';

export const hashCommands: CommandSpec[] = [
  {
    // HSET key field value [field value ...]
    name: 'HSET',
    arity: -4,
    write: true,
    handler: (keyspace, args) => {
      const [key, ...pairs] = args;
      if (pairs.length % 2 !== 0) {
        return errorReply("ERR wrong number of arguments for 'hset' command");
      }
      let added = 0;
      for (let i = 0; i < pairs.length; i += 2) {
        const res = keyspace.hset(key, pairs[i], pairs[i + 1]);
        if (!res.ok) return errorReply(res.error.message);
        added += res.value;
      }
      return integerReply(added);
    },
  },
  {
    name: 'HGET',
    arity: 3,
    write: false,
    handler: (keyspace, args) =>
      fromResult(keyspace.hget(args[0], args[1]), value => (value === null ? nullReply() : bulkReply(value))),
  },
  {
    name: 'HDEL',
    arity: -3,
    write: true,
    handler: (keyspace, args) => fromResult(keyspace.hdel(args[0], ...args.slice(1)), integerReply),
  },
  {
    name: 'HGETALL',
    arity: 2,
    write: false,
    handler: (keyspace, args) =>
      fromResult(keyspace.hgetall(args[0]), hash => arrayReply([...hash].flat())),
  },
  {
    // HSCAN key cursor [MATCH pattern] [COUNT count]
    name: 'HSCAN',
    arity: -3,
    write: false,
    handler: (keyspace, args) => {
      const scan = parseScanArgs(args.slice(1));
      if (isReply(scan)) return scan;
      return fromResult(
        keyspace.hscan(args[0], scan.cursor, scan.pattern, scan.count),
        page => pageReply(page.cursor, page.items),
      );
    },
  },
];
