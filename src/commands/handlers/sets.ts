import { arrayReply, integerReply, pageReply } from '../../protocol/reply.js';
import { fromResult, isReply, parseScanArgs } from '../args.js';
import type { CommandSpec } from '../types.js';

export const setCommands: CommandSpec[] = [
  {
    name: 'SADD',
    arity: -3,
    write: true,
    handler: (keyspace, args) => fromResult(keyspace.sadd(args[0], ...args.slice(1)), integerReply),
  },
  {
    name: 'SREM',
    arity: -3,
    write: true,
    handler: (keyspace, args) => fromResult(keyspace.srem(args[0], ...args.slice(1)), integerReply),
  },
  {
    name: 'SMEMBERS',
    arity: 2,
    write: false,
    handler: (keyspace, args) => fromResult(keyspace.smembers(args[0]), arrayReply),
  },
  {
    name: 'SISMEMBER',
    arity: 3,
    write: false,
    handler: (keyspace, args) =>
      fromResult(keyspace.sismember(args[0], args[1]), isMember => integerReply(isMember ? 1 : 0)),
  },
  {
    // SSCAN key cursor [MATCH pattern] [COUNT count]
    name: 'SSCAN',
    arity: -3,
    write: false,
    handler: (keyspace, args) => {
      const scan = parseScanArgs(args.slice(1));
      if (isReply(scan)) return scan;
      return fromResult(
        keyspace.sscan(args[0], scan.cursor, scan.pattern, scan.count),
        page => pageReply(page.cursor, page.items),
      );
    },
  },
];
