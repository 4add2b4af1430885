import { getLogger } from '../utils/logger.js';
import { errorReply, type Reply } from '../protocol/reply.js';
import type { Keyspace } from '../store/keyspace.js';
import type { CommandSpec } from './types.js';
import { serverCommands } from './handlers/server.js';
import { stringCommands } from './handlers/strings.js';
import { keyCommands } from './handlers/keys.js';
import { hashCommands } from './handlers/hashes.js';
import { listCommands } from './handlers/lists.js';
import { setCommands } from './handlers/sets.js';
import { sortedSetCommands } from './handlers/zsets.js';

const log = getLogger('dispatcher');

export const ALL_COMMANDS: CommandSpec[] = [
  ...serverCommands,
  ...stringCommands,
  ...keyCommands,
  ...hashCommands,
  ...listCommands,
  ...setCommands,
  ...sortedSetCommands,
];

function arityMatches(arity: number, argc: number): boolean {
  return arity >= 0 ? argc === arity : argc >= -arity;
}

/**
 * CommandDispatcher — routes a decoded request to its keyspace operation.
 *
 * execute() is also the replay entry point for the append log: calling it again with the
 * same recorded commands rebuilds the same keyspace.
 */
export class CommandDispatcher {
  private keyspace: Keyspace;
  private commands = new Map<string, CommandSpec>();

  constructor(keyspace: Keyspace, commands: CommandSpec[] = ALL_COMMANDS) {
    this.keyspace = keyspace;
    for (const spec of commands) {
      this.commands.set(spec.name, spec);
    }
  }

  execute(name: string, args: string[]): Reply {
    const spec = this.commands.get(name.toUpperCase());
    if (!spec) {
      log.debug({ command: name }, 'Unknown command');
      return errorReply(`ERR unknown command '${name}'`);
    }

    if (!arityMatches(spec.arity, args.length + 1)) {
      return errorReply(`ERR wrong number of arguments for '${spec.name.toLowerCase()}' command`);
    }

    try {
      return spec.handler(this.keyspace, args);
    } catch (error) {
      log.error({ error, command: spec.name }, 'Command handler failed');
      return errorReply('ERR internal error');
    }
  }

  /** Whether a successful call to this command should be recorded in the append log. */
  isWriteCommand(name: string): boolean {
    return this.commands.get(name.toUpperCase())?.write ?? false;
  }

  get commandNames(): string[] {
    return [...this.commands.keys()];
  }
}
