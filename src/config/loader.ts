import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { homedir } from 'node:os';
import JSON5 from 'json5';
import { Value } from '@sinclair/typebox/value';
import { AppConfigSchema, type AppConfig } from './schema.js';

export const CONFIG_FILE_NAME = 'emberdb.json';
export const HOME_DIR_NAME = '.emberdb';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * 替换配置值中的 ${ENV_VAR} 为实际环境变量值
 */
function substituteEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => process.env[varName] ?? '');
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVars);
  }
  if (isPlainObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value);
    }
    return result;
  }
  return obj;
}

/**
 * 展开 ~ 为用户目录
 */
export function expandHome(filepath: string): string {
  if (filepath.startsWith('~/') || filepath === '~') {
    return resolve(homedir(), filepath.slice(2));
  }
  return filepath;
}

/**
 * 查找配置文件路径
 * 优先级：命令行参数 > 当前目录 > ~/.emberdb/
 */
export function resolveConfigPath(explicitPath?: string): string | null {
  if (explicitPath) {
    const resolved = resolve(explicitPath);
    if (existsSync(resolved)) return resolved;
    throw new Error(`配置文件不存在: ${resolved}`);
  }

  const candidates = [
    resolve(process.cwd(), CONFIG_FILE_NAME),
    resolve(homedir(), HOME_DIR_NAME, CONFIG_FILE_NAME),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) return candidate;
  }

  return null;
}

/**
 * 加载并验证配置
 */
export function loadConfig(explicitPath?: string): AppConfig {
  const configPath = resolveConfigPath(explicitPath);

  let rawConfig: unknown = {};
  if (configPath) {
    rawConfig = JSON5.parse(readFileSync(configPath, 'utf-8'));
    if (!isPlainObject(rawConfig)) {
      throw new Error(`配置文件顶层必须是对象: ${configPath}`);
    }
  }

  const substituted = substituteEnvVars(rawConfig);
  const merged = deepMerge(Value.Create(AppConfigSchema), isPlainObject(substituted) ? substituted : {});

  if (!Value.Check(AppConfigSchema, merged)) {
    const details = [...Value.Errors(AppConfigSchema, merged)]
      .map(e => `  ${e.path}: ${e.message}`)
      .join('\n');
    throw new Error(`配置校验失败:\n${details}`);
  }

  merged.persistence.directory = resolve(expandHome(merged.persistence.directory));
  if (merged.logging.file) {
    merged.logging.file = resolve(expandHome(merged.logging.file));
  }

  return merged;
}

/**
 * 深度合并对象（target 会被 source 覆盖）
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * 获取配置文件所在目录（PID 文件等运行时文件也放在这里）
 */
export function getConfigDir(explicitPath?: string): string {
  const configPath = resolveConfigPath(explicitPath);
  if (configPath) return dirname(configPath);
  return resolve(homedir(), HOME_DIR_NAME);
}
