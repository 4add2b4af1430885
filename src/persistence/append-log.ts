import { closeSync, existsSync, fsyncSync, mkdirSync, openSync, readFileSync, writeSync } from 'node:fs';
import { join } from 'node:path';
import { getLogger } from '../utils/logger.js';
import type { Reply } from '../protocol/reply.js';

const log = getLogger('append-log');

export const APPEND_LOG_FILE = 'commands.aof';

export interface AppendLogEntry {
  ts: number;
  cmd: string;
  args: string[];
}

export interface AppendLogOptions {
  directory: string;
  /** 0 表示每次写入都 fsync */
  fsyncIntervalMs: number;
}

/** Anything that can re-execute a recorded command (the command dispatcher). */
export interface CommandExecutor {
  execute(name: string, args: string[]): Reply;
}

function isEntry(value: unknown): value is AppendLogEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('ts' in value) || !('cmd' in value) || !('args' in value)) return false;
  return (
    typeof value.ts === 'number' &&
    typeof value.cmd === 'string' &&
    Array.isArray(value.args) &&
    value.args.every(arg => typeof arg === 'string')
  );
}

/**
 * 追加日志：每条写命令一行 JSON（{"ts","cmd","args"}），启动时按顺序重放。
 * 写入直接落到文件，fsync 按间隔批量进行，只提供尽力而为的持久性。
 */
export class AppendLog {
  readonly path: string;
  private fd: number | null = null;
  private lastSync = 0;
  private fsyncIntervalMs: number;
  private directory: string;

  constructor(options: AppendLogOptions) {
    this.directory = options.directory;
    this.fsyncIntervalMs = options.fsyncIntervalMs;
    this.path = join(options.directory, APPEND_LOG_FILE);
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  open(): void {
    if (this.fd !== null) return;
    if (!existsSync(this.directory)) {
      mkdirSync(this.directory, { recursive: true });
    }
    this.fd = openSync(this.path, 'a');
    this.lastSync = Date.now();
    log.info({ path: this.path }, '追加日志已打开');
  }

  append(cmd: string, args: string[]): void {
    if (this.fd === null) {
      throw new Error(`追加日志未打开: ${this.path}`);
    }
    const entry: AppendLogEntry = { ts: Date.now(), cmd, args };
    writeSync(this.fd, `${JSON.stringify(entry)}\n`, null, 'utf-8');

    const now = Date.now();
    if (now - this.lastSync >= this.fsyncIntervalMs) {
      fsyncSync(this.fd);
      this.lastSync = now;
    }
  }

  /**
   * 读取全部记录，跳过无法解析的行
   */
  readEntries(): AppendLogEntry[] {
    if (!existsSync(this.path)) return [];

    const entries: AppendLogEntry[] = [];
    const lines = readFileSync(this.path, 'utf-8').split('\n');

    lines.forEach((line, index) => {
      if (line.trim().length === 0) return;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        log.warn({ line: index + 1, error }, '跳过无法解析的追加日志行');
        return;
      }
      if (!isEntry(parsed)) {
        log.warn({ line: index + 1 }, '跳过格式错误的追加日志行');
        return;
      }
      entries.push(parsed);
    });

    return entries;
  }

  /**
   * 按顺序重放全部记录，返回重放条数
   */
  replay(executor: CommandExecutor): number {
    const entries = this.readEntries();
    for (const entry of entries) {
      const reply = executor.execute(entry.cmd, entry.args);
      if (reply.type === 'error') {
        log.warn({ cmd: entry.cmd, error: reply.message }, '重放命令返回错误');
      }
    }
    if (entries.length > 0) {
      log.info({ count: entries.length, path: this.path }, '追加日志重放完成');
    }
    return entries.length;
  }

  close(): void {
    if (this.fd === null) return;
    fsyncSync(this.fd);
    closeSync(this.fd);
    this.fd = null;
    log.info({ path: this.path }, '追加日志已关闭');
  }
}
