import { integerReply, pageReply, simpleReply } from '../../protocol/reply.js';
import { isReply, parseScanArgs } from '../args.js';
import type { CommandSpec } from '../types.js';

export const keyCommands: CommandSpec[] = [
  {
    name: 'DEL',
    arity: -2,
    write: true,
    handler: (keyspace, args) => integerReply(keyspace.delete(...args)),
  },
  {
    name: 'EXISTS',
    arity: -2,
    write: false,
    handler: (keyspace, args) => integerReply(keyspace.exists(...args)),
  },
  {
    name: 'TYPE',
    arity: 2,
    write: false,
    handler: (keyspace, args) => simpleReply(keyspace.type(args[0]) ?? 'none'),
  },
  {
    name: 'PTTL',
    arity: 2,
    write: false,
    handler: (keyspace, args) => integerReply(keyspace.ttl(args[0])),
  },
  {
    name: 'TTL',
    arity: 2,
    write: false,
    handler: (keyspace, args) => {
      const ms = keyspace.ttl(args[0]);
      return integerReply(ms < 0 ? ms : Math.round(ms / 1000));
    },
  },
  {
    // SCAN cursor [MATCH pattern] [COUNT count]
    name: 'SCAN',
    arity: -2,
    write: false,
    handler: (keyspace, args) => {
      const scan = parseScanArgs(args);
      if (isReply(scan)) return scan;
      const page = keyspace.scan(scan.cursor, scan.pattern, scan.count);
      return pageReply(page.cursor, page.items);
    },
  },
];

