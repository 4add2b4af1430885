import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { connect, type Socket } from 'node:net';
import { existsSync, rmSync } from 'node:fs';
import { resolve } from 'node:path';
import { KvServer } from '../../src/server/server.js';
import { CommandDispatcher } from '../../src/commands/dispatcher.js';
import { Keyspace } from '../../src/store/keyspace.js';
import { AppendLog } from '../../src/persistence/append-log.js';
import { WRONGTYPE_MESSAGE } from '../../src/store/types.js';
import type { ServerConfig } from '../../src/config/schema.js';

const AOF_DIR = resolve('/tmp/emberdb-test-server-aof');

interface TestClient {
  socket: Socket;
  /** Resolves with the next `length` bytes received. */
  read(length: number): Promise<string>;
  closed: Promise<void>;
}

function connectClient(port: number): Promise<TestClient> {
  return new Promise((resolveClient, reject) => {
    const socket = connect({ host: '127.0.0.1', port });
    let buffer = '';
    let pending: { length: number; resolve: (data: string) => void } | null = null;

    const flush = () => {
      if (pending && buffer.length >= pending.length) {
        const data = buffer.slice(0, pending.length);
        buffer = buffer.slice(pending.length);
        const waiter = pending;
        pending = null;
        waiter.resolve(data);
      }
    };

    const closed = new Promise<void>(resolveClosed => socket.once('close', () => resolveClosed()));
    socket.on('data', (chunk: Buffer) => {
      buffer += chunk.toString('latin1');
      flush();
    });
    socket.once('error', reject);
    socket.once('connect', () => {
      resolveClient({
        socket,
        read: length =>
          new Promise(resolveRead => {
            pending = { length, resolve: resolveRead };
            flush();
          }),
        closed,
      });
    });
  });
}

describe('KvServer', () => {
  let server: KvServer;
  let port: number;
  let clients: TestClient[];
  let appendLog: AppendLog | null;

  async function startServer(overrides: Partial<ServerConfig> = {}, withLog = false): Promise<void> {
    const config: ServerConfig = { host: '127.0.0.1', port: 0, maxConnections: 100, idleTimeoutMs: 0, ...overrides };
    if (withLog) {
      appendLog = new AppendLog({ directory: AOF_DIR, fsyncIntervalMs: 0 });
      appendLog.open();
    }
    server = new KvServer({
      config,
      protocol: { maxBulkLength: 1024, maxArrayLength: 16 },
      dispatcher: new CommandDispatcher(new Keyspace()),
      appendLog,
    });
    await server.start();
    port = server.address()?.port ?? 0;
  }

  async function client(): Promise<TestClient> {
    const c = await connectClient(port);
    clients.push(c);
    return c;
  }

  async function roundTrip(c: TestClient, payload: string, expected: string): Promise<void> {
    c.socket.write(Buffer.from(payload, 'latin1'));
    expect(await c.read(expected.length)).toBe(expected);
  }

  beforeEach(() => {
    clients = [];
    appendLog = null;
    if (existsSync(AOF_DIR)) rmSync(AOF_DIR, { recursive: true });
  });

  afterEach(async () => {
    for (const c of clients) c.socket.destroy();
    await server.stop();
    appendLog?.close();
    if (existsSync(AOF_DIR)) rmSync(AOF_DIR, { recursive: true });
  });

  it('should answer inline and multi-bulk requests', async () => {
    await startServer();
    const c = await client();
    await roundTrip(c, 'PING\r\n', '+PONG\r\n');
    await roundTrip(c, '*2\r\n$4\r\nECHO\r\n$5\r\nhello\r\n', '$5\r\nhello\r\n');
  });

  it('should answer pipelined requests in order', async () => {
    await startServer();
    const c = await client();
    await roundTrip(
      c,
      '*3\r\n$3\r\nSET\r\n$1\r\nk\r\n$1\r\nv\r\n*2\r\n$3\r\nGET\r\n$1\r\nk\r\n*1\r\n$6\r\nDBSIZE\r\n',
      '+OK\r\n$1\r\nv\r\n:1\r\n',
    );
  });

  it('should assemble a request split across writes', async () => {
    await startServer();
    const c = await client();
    c.socket.write('*2\r\n$4\r\nEC');
    await new Promise(r => setTimeout(r, 20));
    await roundTrip(c, 'HO\r\n$2\r\nhi\r\n', '$2\r\nhi\r\n');
  });

  it('should round-trip binary values', async () => {
    await startServer();
    const c = await client();
    const value = '\x00\xff\r\n';
    await roundTrip(c, `*3\r\n$3\r\nSET\r\n$3\r\nbin\r\n$4\r\n${value}\r\n`, '+OK\r\n');
    await roundTrip(c, '*2\r\n$3\r\nGET\r\n$3\r\nbin\r\n', `$4\r\n${value}\r\n`);
  });

  it('should keep the connection after a protocol error', async () => {
    await startServer();
    const c = await client();
    await roundTrip(c, '*1\r\nGET\r\nPING\r\n', "-ERR Protocol error: expected '$' at index 0\r\n+PONG\r\n");
    await roundTrip(c, '*17\r\n', '-ERR Protocol error: array length too large: 17 > 16\r\n');
    await roundTrip(c, '*1\r\n$4\r\nPING\r\n', '+PONG\r\n');
  });

  it('should ignore empty requests', async () => {
    await startServer();
    const c = await client();
    await roundTrip(c, '*0\r\n\r\nPING\r\n', '+PONG\r\n');
  });

  it('should report command errors without closing', async () => {
    await startServer();
    const c = await client();
    await roundTrip(c, 'NOPE\r\n', "-ERR unknown command 'NOPE'\r\n");
    await roundTrip(c, 'SET s v\r\nLPUSH s x\r\n', `+OK\r\n-${WRONGTYPE_MESSAGE}\r\n`);
  });

  it('should close the connection after QUIT', async () => {
    await startServer();
    const c = await client();
    await roundTrip(c, 'QUIT\r\n', '+OK\r\n');
    await c.closed;
  });

  it('should reject clients beyond the connection limit', async () => {
    await startServer({ maxConnections: 1 });
    const first = await client();
    await roundTrip(first, 'PING\r\n', '+PONG\r\n');

    const second = await client();
    const rejection = '-ERR max number of clients reached\r\n';
    expect(await second.read(rejection.length)).toBe(rejection);
    await second.closed;
    expect(server.connectionCount).toBe(1);
  });

  it('should close idle connections', async () => {
    await startServer({ idleTimeoutMs: 50 });
    const c = await client();
    await c.closed;
  });

  it('should record successful write commands in the append log', async () => {
    await startServer({}, true);
    const c = await client();
    await roundTrip(
      c,
      'SET a 1\r\nGET a\r\nLPUSH a x\r\nDEL a\r\n',
      `+OK\r\n$1\r\n1\r\n-${WRONGTYPE_MESSAGE}\r\n:1\r\n`,
    );

    const entries = appendLog?.readEntries() ?? [];
    expect(entries.map(e => [e.cmd, ...e.args])).toEqual([
      ['SET', 'a', '1'],
      ['DEL', 'a'],
    ]);
  });
});
