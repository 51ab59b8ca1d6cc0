/**
 * Chat Relay — 统一配置中心
 * 端口、存储路径、推送策略的唯一来源
 *
 * 使用方式：
 *   import { loadConfig } from '../core/config';
 *   const cfg = loadConfig();
 *   const dbPath = cfg.storage.databasePath;
 *
 * 环境变量优先级：
 *   环境变量 > .env 文件（env-loader.ts）> 默认值
 */

import { ConfigurationError } from './errors';
import { validateConfigWithSchema, type AppConfig } from './config-schema';

type EnvSource = Record<string, string | undefined>;

// ============================================
// 辅助函数
// ============================================

function env(source: EnvSource, key: string, defaultValue: string): string {
  return source[key] || defaultValue;
}

/** 非法数字返回 NaN，交给 schema 报错而不是静默回落到默认值 */
function envInt(source: EnvSource, key: string, defaultValue: number): number {
  const v = source[key];
  return v ? Number(v) : defaultValue;
}

// ============================================
// 配置结构
// ============================================

/** 原始（未验证）配置，字段类型由 configSchema 收窄 */
export function readRawConfig(source: EnvSource) {
  return {
    /** 应用基础配置 */
    app: {
      name: env(source, 'APP_NAME', 'Chat Relay'),
      version: env(source, 'APP_VERSION', '1.0.0'),
      env: env(source, 'NODE_ENV', 'development'),
      port: envInt(source, 'PORT', 3000),
      host: env(source, 'HOST', '0.0.0.0'),
      logLevel: env(source, 'LOG_LEVEL', 'info'),
      staticDir: env(source, 'STATIC_DIR', ''),
    },

    /** SQLite 文件路径；必填，`:memory:` 仅用于开发 */
    storage: {
      databasePath: env(source, 'DATABASE_PATH', ''),
    },

    /** 消息校验上限与推送缓冲 */
    chat: {
      maxIdLength: envInt(source, 'CHAT_MAX_ID_LENGTH', 128),
      maxSenderLength: envInt(source, 'CHAT_MAX_SENDER_LENGTH', 100),
      maxContentLength: envInt(source, 'CHAT_MAX_CONTENT_LENGTH', 4000),
      listenerBufferSize: envInt(source, 'CHAT_LISTENER_BUFFER', 64),
      heartbeatIntervalMs: envInt(source, 'SSE_HEARTBEAT_MS', 15_000),
    },

    http: {
      jsonBodyLimit: env(source, 'JSON_BODY_LIMIT', '64kb'),
      shutdownTimeoutMs: envInt(source, 'SHUTDOWN_TIMEOUT_MS', 10_000),
    },
  };
}

/**
 * 读取并验证配置；任何问题都以 ConfigurationError 抛出，
 * 由启动流程记录 fatal 日志后退出。
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  const result = validateConfigWithSchema(readRawConfig(source));
  if (!result.success) {
    throw new ConfigurationError(result.errors);
  }
  return result.config;
}

export type { AppConfig };
