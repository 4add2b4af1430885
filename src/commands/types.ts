import type { Keyspace } from '../store/keyspace.js';
import type { Reply } from '../protocol/reply.js';

export type CommandHandler = (keyspace: Keyspace, args: string[]) => Reply;

export interface CommandSpec {
  /** Upper-case command name. */
  name: string;
  /**
   * Argument count including the command name: N means exactly N, -N means at least N.
   */
  arity: number;
  /** Successful calls change the keyspace and are recorded in the append log. */
  write: boolean;
  handler: CommandHandler;
}
