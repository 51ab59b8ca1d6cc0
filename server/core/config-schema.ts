/**
 * ============================================================================
 * 配置验证 Schema — Zod 强类型验证
 * ============================================================================
 *
 * 用途：
 *   1. 启动时验证所有环境变量的类型和范围
 *   2. DATABASE_PATH 为必填项，缺失时在监听端口之前失败
 *   3. 提供清晰的错误消息，帮助快速定位配置问题
 *
 * 使用方式：
 *   import { validateConfigWithSchema } from './config-schema';
 *   const result = validateConfigWithSchema(raw);
 *   if (!result.success) throw new ConfigurationError(result.errors);
 *
 * ============================================================================
 */

import { z } from 'zod';
import { createModuleLogger } from './logger';

const log = createModuleLogger('config-validator');

// ============================================================
// Schema 定义
// ============================================================

/** 端口号范围验证（0 表示由系统分配，仅测试使用） */
const portSchema = z.number().int().min(0).max(65535);

/** 毫秒时长 */
const durationMsSchema = z.number().int().min(1);

/** 应用基础配置 */
const appSchema = z.object({
  name: z.string().min(1),
  version: z.string().regex(/^\d+\.\d+\.\d+/, 'must be semver format (e.g., 1.0.0)'),
  env: z.enum(['development', 'production', 'test']),
  port: portSchema,
  host: z.string().min(1),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
  /** 预构建 UI 的静态目录，空字符串表示不托管 */
  staticDir: z.string(),
});

/** 持久化配置 */
const storageSchema = z.object({
  databasePath: z.string().min(1, 'DATABASE_PATH must be set'),
});

/** 消息与推送策略 */
const chatSchema = z.object({
  maxIdLength: z.number().int().min(1).max(1024),
  maxSenderLength: z.number().int().min(1).max(4000),
  maxContentLength: z.number().int().min(1).max(100_000),
  listenerBufferSize: z.number().int().min(1).max(100_000),
  heartbeatIntervalMs: durationMsSchema,
});

/** HTTP 层 */
const httpSchema = z.object({
  jsonBodyLimit: z.string().regex(/^\d+(b|kb|mb)$/, 'must be like 64kb, 1mb'),
  shutdownTimeoutMs: durationMsSchema,
});

/** 完整配置 Schema */
export const configSchema = z.object({
  app: appSchema,
  storage: storageSchema,
  chat: chatSchema,
  http: httpSchema,
});

export type AppConfig = z.infer<typeof configSchema>;

// ============================================================
// 公开 API
// ============================================================

export type ConfigValidationResult =
  | { success: true; config: AppConfig; warnings: string[] }
  | { success: false; errors: string[]; warnings: string[] };

/**
 * 使用 Zod Schema 验证配置
 */
export function validateConfigWithSchema(raw: unknown): ConfigValidationResult {
  const warnings: string[] = [];
  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    log.warn({ errors }, `Configuration validation found ${errors.length} error(s)`);
    return { success: false, errors, warnings };
  }

  const cfg = result.data;
  if (cfg.storage.databasePath === ':memory:' && cfg.app.env === 'production') {
    warnings.push('storage.databasePath: in-memory database in production, messages are lost on restart');
  }
  if (cfg.chat.listenerBufferSize < 8) {
    warnings.push('chat.listenerBufferSize: very small buffers drop listeners on short network hiccups');
  }

  if (warnings.length > 0) {
    log.warn({ warnings }, `Configuration warnings (${warnings.length})`);
  }

  log.debug('Configuration validation passed');
  return { success: true, config: cfg, warnings };
}
