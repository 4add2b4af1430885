import { Type, type Static } from '@sinclair/typebox';

export const ServerConfigSchema = Type.Object({
  host: Type.String({ default: '127.0.0.1' }),
  port: Type.Integer({ default: 6379, minimum: 0, maximum: 65535 }),
  maxConnections: Type.Integer({ default: 1000, minimum: 1 }),
  // 0 表示不限制空闲时间
  idleTimeoutMs: Type.Integer({ default: 0, minimum: 0 }),
});

export const ProtocolConfigSchema = Type.Object({
  maxBulkLength: Type.Integer({ default: 512 * 1024 * 1024, minimum: 1 }),
  maxArrayLength: Type.Integer({ default: 1_000_000, minimum: 1 }),
});

export const StoreConfigSchema = Type.Object({
  cleanupIntervalMs: Type.Integer({ default: 1000, minimum: 10 }),
  sweepBatchSize: Type.Integer({ default: 1000, minimum: 1 }),
});

export const PersistenceConfigSchema = Type.Object({
  enabled: Type.Boolean({ default: false }),
  directory: Type.String({ default: '~/.emberdb/data' }),
  fsyncIntervalMs: Type.Integer({ default: 1000, minimum: 0 }),
});

export const LoggingConfigSchema = Type.Object({
  level: Type.Union([
    Type.Literal('trace'),
    Type.Literal('debug'),
    Type.Literal('info'),
    Type.Literal('warn'),
    Type.Literal('error'),
    Type.Literal('fatal'),
    Type.Literal('silent'),
  ], { default: 'info' }),
  file: Type.Optional(Type.String()),
  stdout: Type.Boolean({ default: true }),
});

export const AppConfigSchema = Type.Object({
  server: ServerConfigSchema,
  protocol: ProtocolConfigSchema,
  store: StoreConfigSchema,
  persistence: PersistenceConfigSchema,
  logging: LoggingConfigSchema,
});

export type ServerConfig = Static<typeof ServerConfigSchema>;
export type ProtocolConfig = Static<typeof ProtocolConfigSchema>;
export type StoreConfig = Static<typeof StoreConfigSchema>;
export type PersistenceConfig = Static<typeof PersistenceConfigSchema>;
export type LoggingConfig = Static<typeof LoggingConfigSchema>;
export type AppConfig = Static<typeof AppConfigSchema>;
