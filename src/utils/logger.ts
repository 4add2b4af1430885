import pino from 'pino';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export interface LoggerOptions {
  level?: string;
  file?: string;
  stdout?: boolean;
}

// 未调用 initLogger() 前保持静默，避免测试与 CLI 子命令输出日志
let logger: pino.Logger = pino({ level: 'silent' });

function prettyTarget(level: string): pino.TransportTargetOptions {
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
      ignore: 'pid,hostname',
    },
    level,
  };
}

export function initLogger(options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? 'info';
  if (level === 'silent') {
    logger = pino({ level });
    return logger;
  }

  const targets: pino.TransportTargetOptions[] = [];

  if (options.stdout) {
    targets.push(prettyTarget(level));
  }

  if (options.file) {
    const dir = dirname(options.file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    targets.push({
      target: 'pino/file',
      options: { destination: options.file },
      level,
    });
  }

  // 没有任何目标时退回到终端输出
  if (targets.length === 0) {
    targets.push(prettyTarget(level));
  }

  logger = pino({ level, transport: { targets } });
  return logger;
}

/**
 * 获取命名日志实例。
 * 模块加载时即可调用：返回的 Proxy 每次都委托给当前 logger，initLogger() 之后自动生效。
 */
export function getLogger(name?: string): pino.Logger {
  return new Proxy({} as pino.Logger, {
    get(_target, prop, receiver) {
      const current = name ? logger.child({ module: name }) : logger;
      const value = Reflect.get(current, prop, receiver);
      return typeof value === 'function' ? value.bind(current) : value;
    },
  });
}
