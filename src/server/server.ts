import { createServer, type AddressInfo, type Server, type Socket } from 'node:net';
import { getLogger } from '../utils/logger.js';
import { encodeReply, errorReply } from '../protocol/reply.js';
import { ClientConnection } from './connection.js';
import type { CommandDispatcher } from '../commands/dispatcher.js';
import type { AppendLog } from '../persistence/append-log.js';
import type { ProtocolConfig, ServerConfig } from '../config/schema.js';

const log = getLogger('server');

const MAX_CLIENTS_REPLY = encodeReply(errorReply('ERR max number of clients reached'));

export interface KvServerOptions {
  config: ServerConfig;
  protocol: ProtocolConfig;
  dispatcher: CommandDispatcher;
  appendLog?: AppendLog | null;
}

export class KvServer {
  private server: Server | null = null;
  private config: ServerConfig;
  private protocol: ProtocolConfig;
  private dispatcher: CommandDispatcher;
  private appendLog: AppendLog | null;
  private connections = new Map<number, ClientConnection>();
  private nextConnectionId = 1;

  constructor(options: KvServerOptions) {
    this.config = options.config;
    this.protocol = options.protocol;
    this.dispatcher = options.dispatcher;
    this.appendLog = options.appendLog ?? null;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  async start(): Promise<void> {
    const server = createServer((socket) => this.accept(socket));
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        server.on('error', (error) => log.error({ error }, 'TCP 服务错误'));
        log.info({ host: this.config.host, port: this.address()?.port ?? this.config.port }, 'TCP 服务已启动');
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    for (const connection of this.connections.values()) {
      connection.close();
    }
    this.connections.clear();

    return new Promise((resolve) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      this.server = null;
      server.close(() => {
        log.info('TCP 服务已停止');
        resolve();
      });
    });
  }

  /** 实际监听地址（端口配置为 0 时由系统分配） */
  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  private accept(socket: Socket): void {
    if (this.connections.size >= this.config.maxConnections) {
      log.warn({ limit: this.config.maxConnections, remote: socket.remoteAddress }, '连接数已达上限');
      socket.on('error', (error) => log.debug({ error }, '被拒绝的连接出错'));
      socket.end(MAX_CLIENTS_REPLY);
      return;
    }

    const id = this.nextConnectionId++;
    const connection = new ClientConnection(socket, {
      id,
      dispatcher: this.dispatcher,
      protocol: this.protocol,
      appendLog: this.appendLog,
      idleTimeoutMs: this.config.idleTimeoutMs,
    });
    this.connections.set(id, connection);
    log.debug({ connId: id, remote: socket.remoteAddress }, '客户端已连接');

    socket.on('close', () => {
      this.connections.delete(id);
      log.debug({ connId: id }, '客户端已断开');
    });
  }
}
