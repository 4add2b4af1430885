import { arrayReply, bulkReply, errorReply, integerReply, OK, simpleReply } from '../../protocol/reply.js';
import type { CommandSpec } from '../types.js';

export const serverCommands: CommandSpec[] = [
  {
    name: 'PING',
    arity: -1,
    write: false,
    handler: (_keyspace, args) => (args.length === 0 ? simpleReply('PONG') : bulkReply(args[0])),
  },
  {
    name: 'ECHO',
    arity: 2,
    write: false,
    handler: (_keyspace, args) => bulkReply(args[0]),
  },
  {
    name: 'DBSIZE',
    arity: 1,
    write: false,
    handler: keyspace => integerReply(keyspace.size),
  },
  {
    name: 'FLUSHDB',
    arity: 1,
    write: true,
    handler: keyspace => {
      keyspace.flush();
      return OK;
    },
  },
  {
    // 只返回匹配的键名，不做分页；模式可省略，默认 *
    name: 'KEYS',
    arity: -1,
    write: false,
    handler: (keyspace, args) => {
      if (args.length > 1) {
        return errorReply("ERR wrong number of arguments for 'keys' command");
      }
      return arrayReply(keyspace.keys(args[0] ?? '*'));
    },
  },
];
