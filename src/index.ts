import { loadConfig } from './config/loader.js';
import { initLogger, getLogger } from './utils/logger.js';
import { Keyspace } from './store/keyspace.js';
import { ExpirySweeper } from './store/expiry-sweeper.js';
import { CommandDispatcher } from './commands/dispatcher.js';
import { AppendLog } from './persistence/append-log.js';
import { KvServer } from './server/server.js';
import type { AppConfig } from './config/schema.js';

export { Keyspace } from './store/keyspace.js';
export { SortedSet } from './store/sorted-set.js';
export { CommandDispatcher } from './commands/dispatcher.js';
export { RespParser } from './protocol/parser.js';
export { encodeReply } from './protocol/reply.js';
export { KvServer } from './server/server.js';
export type { AppConfig } from './config/schema.js';

export interface EmberDBOverrides {
  host?: string;
  port?: number;
}

export interface EmberDBInstance {
  config: AppConfig;
  keyspace: Keyspace;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export async function createEmberDB(configPath?: string, overrides: EmberDBOverrides = {}): Promise<EmberDBInstance> {
  // 1. 加载配置
  const config = loadConfig(configPath);
  if (overrides.host !== undefined) config.server.host = overrides.host;
  if (overrides.port !== undefined) config.server.port = overrides.port;

  // 2. 初始化日志
  initLogger({
    level: config.logging.level,
    file: config.logging.file,
    stdout: config.logging.stdout,
  });
  const mainLog = getLogger('main');

  // 3. 初始化键空间与命令分发
  const keyspace = new Keyspace();
  const dispatcher = new CommandDispatcher(keyspace);

  // 4. 重放追加日志
  let appendLog: AppendLog | null = null;
  if (config.persistence.enabled) {
    appendLog = new AppendLog({
      directory: config.persistence.directory,
      fsyncIntervalMs: config.persistence.fsyncIntervalMs,
    });
    const replayed = appendLog.replay(dispatcher);
    mainLog.info({ replayed, keys: keyspace.size }, '数据已恢复');
  }

  // 5. 过期清理与 TCP 服务
  const sweeper = new ExpirySweeper(keyspace, {
    intervalMs: config.store.cleanupIntervalMs,
    batchSize: config.store.sweepBatchSize,
  });
  const server = new KvServer({
    config: config.server,
    protocol: config.protocol,
    dispatcher,
    appendLog,
  });

  return {
    config,
    keyspace,
    async start() {
      mainLog.info('EmberDB 启动中...');

      appendLog?.open();
      sweeper.start();
      try {
        await server.start();
      } catch (error) {
        // 监听失败时释放已占用的定时器与文件句柄
        sweeper.stop();
        appendLog?.close();
        mainLog.error({ error }, 'EmberDB 启动失败');
        throw error;
      }

      mainLog.info({
        address: `${config.server.host}:${server.address()?.port ?? config.server.port}`,
        commands: dispatcher.commandNames.length,
        persistence: config.persistence.enabled,
      }, 'EmberDB 已启动');
    },

    async stop() {
      mainLog.info('EmberDB 停止中...');

      await server.stop();
      sweeper.stop();
      appendLog?.close();

      mainLog.info('EmberDB 已停止');
    },
  };
}

// 如果直接运行此文件（非 CLI 入口）
const entryFile = process.argv[1] ?? '';
const isDirectRun = entryFile.endsWith('src/index.js') || entryFile.endsWith('src/index.ts');
if (isDirectRun) {
  createEmberDB()
    .then(db => db.start())
    .catch(error => {
      console.error('启动失败:', error);
      process.exit(1);
    });
}
