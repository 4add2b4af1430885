import type { Socket } from 'node:net';
import { getLogger } from '../utils/logger.js';
import { RespParser } from '../protocol/parser.js';
import { OK, encodeReply, errorReply, type Reply } from '../protocol/reply.js';
import type { CommandDispatcher } from '../commands/dispatcher.js';
import type { AppendLog } from '../persistence/append-log.js';
import type { ProtocolConfig } from '../config/schema.js';

const log = getLogger('connection');

export interface ConnectionOptions {
  id: number;
  dispatcher: CommandDispatcher;
  protocol: ProtocolConfig;
  appendLog: AppendLog | null;
  /** 0 表示不限制 */
  idleTimeoutMs: number;
}

/**
 * 单个客户端连接：解码请求、顺序执行、按请求顺序写回响应。
 * 同一次 data 事件中解码出的多个请求（pipelining）合并为一次写出；
 * 客户端不读取响应时暂停读取，直到输出缓冲排空。
 */
export class ClientConnection {
  readonly id: number;
  private socket: Socket;
  private parser: RespParser;
  private dispatcher: CommandDispatcher;
  private appendLog: AppendLog | null;
  private closing = false;
  private draining = false;

  constructor(socket: Socket, options: ConnectionOptions) {
    this.id = options.id;
    this.socket = socket;
    this.dispatcher = options.dispatcher;
    this.appendLog = options.appendLog;
    this.parser = new RespParser({
      maxBulkLength: options.protocol.maxBulkLength,
      maxArrayLength: options.protocol.maxArrayLength,
    });

    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('end', () => this.onEnd());
    socket.on('error', (error) => {
      log.debug({ connId: this.id, error }, '连接错误');
    });

    if (options.idleTimeoutMs > 0) {
      socket.setTimeout(options.idleTimeoutMs, () => {
        log.info({ connId: this.id, idleTimeoutMs: options.idleTimeoutMs }, '空闲连接已关闭');
        socket.destroy();
      });
    }
  }

  close(): void {
    this.closing = true;
    this.socket.destroy();
  }

  private onData(chunk: Buffer): void {
    if (this.closing) return;
    this.parser.push(chunk);

    const replies: Buffer[] = [];
    while (!this.closing) {
      const result = this.parser.next();
      if (result.type === 'incomplete') break;

      if (result.type === 'error') {
        log.debug({ connId: this.id, code: result.error.code, error: result.error.message }, '协议错误');
        replies.push(encodeReply(errorReply(`ERR Protocol error: ${result.error.message}`)));
        continue;
      }

      if (result.args.length === 0) continue;
      replies.push(encodeReply(this.handle(result.args)));
    }

    if (replies.length > 0) {
      const flushed = this.socket.write(replies.length === 1 ? replies[0] : Buffer.concat(replies));
      if (!flushed && !this.closing) this.waitForDrain();
    }
    if (this.closing) {
      this.socket.end();
    }
  }

  /**
   * 输出缓冲超过高水位时暂停读取，客户端取走响应后再继续解析新的请求
   */
  private waitForDrain(): void {
    if (this.draining) return;
    this.draining = true;
    this.socket.pause();
    log.debug({ connId: this.id, buffered: this.socket.writableLength }, '输出缓冲已满，暂停读取');
    this.socket.once('drain', () => {
      this.draining = false;
      this.socket.resume();
    });
  }

  private handle(args: string[]): Reply {
    const [name, ...rest] = args;
    const command = name.toUpperCase();

    if (command === 'QUIT') {
      this.closing = true;
      return OK;
    }

    const reply = this.dispatcher.execute(name, rest);

    if (this.appendLog && reply.type !== 'error' && this.dispatcher.isWriteCommand(command)) {
      try {
        this.appendLog.append(command, rest);
      } catch (error) {
        log.error({ connId: this.id, command, error }, '写入追加日志失败');
      }
    }

    return reply;
  }

  private onEnd(): void {
    const incomplete = this.parser.finish();
    if (incomplete) {
      log.warn({ connId: this.id, pendingBytes: incomplete.pendingBytes }, incomplete.message);
    }
  }
}
