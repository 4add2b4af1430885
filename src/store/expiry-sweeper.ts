import { getLogger } from '../utils/logger.js';
import type { Keyspace } from './keyspace.js';

const log = getLogger('expiry');

export interface ExpirySweeperOptions {
  intervalMs: number;
  /** Entries examined per tick. */
  batchSize: number;
}

/**
 * Periodically removes expired keys. Each tick looks at a bounded slice of the keyspace
 * so request handling never waits behind a full pass.
 */
export class ExpirySweeper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private keyspace: Keyspace;
  private options: ExpirySweeperOptions;

  constructor(keyspace: Keyspace, options: ExpirySweeperOptions) {
    this.keyspace = keyspace;
    this.options = options;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    this.stop();
    this.timer = setInterval(() => this.sweep(), this.options.intervalMs);
    log.debug({ intervalMs: this.options.intervalMs, batchSize: this.options.batchSize }, 'Expiry sweeper started');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.debug('Expiry sweeper stopped');
    }
  }

  sweep(): number {
    const removed = this.keyspace.cleanupExpired(this.options.batchSize);
    if (removed > 0) {
      log.debug({ removed, remaining: this.keyspace.size }, 'Expired keys removed');
    }
    return removed;
  }
}
