#!/usr/bin/env node

import { Command } from 'commander';
import { existsSync, mkdirSync, writeFileSync, readFileSync, unlinkSync } from 'node:fs';
import { connect } from 'node:net';
import { resolve, dirname } from 'node:path';
import { homedir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { createEmberDB } from '../src/index.js';
import { HOME_DIR_NAME, loadConfig, resolveConfigPath } from '../src/config/loader.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
// cli/index.ts → dist/cli/index.js, 需要往上两级到包根目录
const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '..', '..', 'package.json'), 'utf-8'));
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
  ? pkg.version
  : '0.0.0';

const PID_FILE = resolve(homedir(), HOME_DIR_NAME, 'emberdb.pid');
const STATUS_TIMEOUT_MS = 2000;

function writePidFile(): void {
  const dir = dirname(PID_FILE);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(PID_FILE, String(process.pid));
}

function removePidFile(): void {
  if (existsSync(PID_FILE)) unlinkSync(PID_FILE);
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/**
 * 向运行中的实例发送 PING 与 DBSIZE，返回原始响应文本
 */
function queryServer(host: string, port: number): Promise<string> {
  return new Promise((resolvePromise, reject) => {
    const socket = connect({ host, port });
    let received = '';

    socket.setTimeout(STATUS_TIMEOUT_MS, () => {
      socket.destroy();
      reject(new Error('连接超时'));
    });
    socket.on('error', reject);
    socket.on('connect', () => {
      socket.write('*1\r\n$4\r\nPING\r\n*1\r\n$6\r\nDBSIZE\r\n*1\r\n$4\r\nQUIT\r\n');
    });
    socket.on('data', (chunk: Buffer) => {
      received += chunk.toString('latin1');
    });
    socket.on('close', () => resolvePromise(received));
  });
}

const program = new Command();

program
  .name('emberdb')
  .description('EmberDB — 兼容 RESP 协议的内存键值数据库')
  .version(version);

// === start ===
program
  .command('start')
  .description('启动 EmberDB 服务')
  .option('-c, --config <path>', '配置文件路径')
  .option('-p, --port <port>', '监听端口（覆盖配置）')
  .action(async (options: { config?: string; port?: string }) => {
    try {
      const port = options.port === undefined ? undefined : Number.parseInt(options.port, 10);
      if (port !== undefined && (Number.isNaN(port) || port < 0 || port > 65535)) {
        throw new Error(`端口无效: ${options.port}`);
      }

      const db = await createEmberDB(options.config, { port });
      await db.start();

      writePidFile();

      console.log(`\n  EmberDB v${version} 已启动`);
      console.log(`  监听: ${db.config.server.host}:${db.config.server.port}`);
      if (db.config.persistence.enabled) {
        console.log(`  追加日志: ${db.config.persistence.directory}`);
      }
      console.log('');

      // 优雅关闭（防止重复调用）
      let stopping = false;
      const shutdown = async () => {
        if (stopping) {
          console.log('\n强制退出...');
          process.exit(1);
        }
        stopping = true;
        console.log('\n正在停止...');
        removePidFile();
        await db.stop();
        process.exit(0);
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
      process.on('exit', () => {
        if (!stopping) removePidFile();
      });
    } catch (error) {
      console.error('启动失败:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// === stop ===
program
  .command('stop')
  .description('停止 EmberDB 服务')
  .action(() => {
    if (!existsSync(PID_FILE)) {
      console.log('EmberDB 未运行（PID 文件不存在）。');
      return;
    }

    const pid = Number.parseInt(readFileSync(PID_FILE, 'utf-8').trim(), 10);

    if (Number.isNaN(pid)) {
      console.log('PID 文件内容无效，已清理。');
      removePidFile();
      return;
    }

    if (!isAlive(pid)) {
      console.log(`进程 ${pid} 不存在，清理过期 PID 文件。`);
      removePidFile();
      return;
    }

    console.log(`正在停止 EmberDB (PID: ${pid})...`);
    process.kill(pid, 'SIGTERM');

    // 等待确认进程退出
    let checks = 0;
    const interval = setInterval(() => {
      checks++;
      if (!isAlive(pid)) {
        clearInterval(interval);
        if (existsSync(PID_FILE)) removePidFile();
        console.log('EmberDB 已停止。');
      } else if (checks >= 10) {
        clearInterval(interval);
        console.log(`进程 ${pid} 未在 5 秒内退出。可使用 kill -9 ${pid} 强制终止。`);
      }
    }, 500);
  });

// === status ===
program
  .command('status')
  .description('查看运行状态')
  .option('-c, --config <path>', '配置文件路径')
  .action(async (options: { config?: string }) => {
    const config = loadConfig(options.config);
    const { host, port } = config.server;
    try {
      const response = await queryServer(host, port);
      const keys = /^:(\d+)\r$/m.exec(response);
      if (!response.startsWith('+PONG')) {
        console.log(`${host}:${port} 响应异常: ${JSON.stringify(response)}`);
        process.exitCode = 1;
        return;
      }
      console.log(`EmberDB 运行中: ${host}:${port}`);
      console.log(`  键数量: ${keys ? keys[1] : '未知'}`);
    } catch (error) {
      console.log(`EmberDB 未运行 (${host}:${port}): ${error instanceof Error ? error.message : error}`);
      process.exitCode = 1;
    }
  });

// === config show ===
const configCmd = program.command('config').description('配置管理');
configCmd
  .command('show')
  .description('显示当前生效的配置')
  .option('-c, --config <path>', '配置文件路径')
  .action((options: { config?: string }) => {
    try {
      const source = resolveConfigPath(options.config);
      const config = loadConfig(options.config);
      console.log(`# 来源: ${source ?? '内置默认值'}`);
      console.log(JSON.stringify(config, null, 2));
    } catch (error) {
      console.error('加载配置失败:', error instanceof Error ? error.message : error);
      process.exitCode = 1;
    }
  });

program.parse();
