/**
 * config.ts / config-schema.ts 测试
 */
import { describe, it, expect } from 'vitest';
import { loadConfig, readRawConfig } from '../config';
import { validateConfigWithSchema } from '../config-schema';
import { ConfigurationError } from '../errors';

const BASE_ENV = { DATABASE_PATH: ':memory:' };

describe('loadConfig', () => {
  it('仅提供 DATABASE_PATH 时使用默认值', () => {
    const cfg = loadConfig(BASE_ENV);
    expect(cfg.app.port).toBe(3000);
    expect(cfg.app.host).toBe('0.0.0.0');
    expect(cfg.app.env).toBe('development');
    expect(cfg.app.logLevel).toBe('info');
    expect(cfg.app.staticDir).toBe('');
    expect(cfg.storage.databasePath).toBe(':memory:');
    expect(cfg.chat).toEqual({
      maxIdLength: 128,
      maxSenderLength: 100,
      maxContentLength: 4000,
      listenerBufferSize: 64,
      heartbeatIntervalMs: 15_000,
    });
    expect(cfg.http).toEqual({ jsonBodyLimit: '64kb', shutdownTimeoutMs: 10_000 });
  });

  it('环境变量覆盖默认值', () => {
    const cfg = loadConfig({
      ...BASE_ENV,
      PORT: '8080',
      HOST: '127.0.0.1',
      NODE_ENV: 'production',
      LOG_LEVEL: 'warn',
      CHAT_LISTENER_BUFFER: '16',
      SSE_HEARTBEAT_MS: '500',
    });
    expect(cfg.app.port).toBe(8080);
    expect(cfg.app.host).toBe('127.0.0.1');
    expect(cfg.app.env).toBe('production');
    expect(cfg.app.logLevel).toBe('warn');
    expect(cfg.chat.listenerBufferSize).toBe(16);
    expect(cfg.chat.heartbeatIntervalMs).toBe(500);
  });

  it('缺少 DATABASE_PATH 抛出 ConfigurationError', () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    try {
      loadConfig({});
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues).toEqual(['storage.databasePath: DATABASE_PATH must be set']);
      }
    }
  });

  it('非法数字不会静默回落到默认值', () => {
    try {
      loadConfig({ ...BASE_ENV, PORT: 'abc' });
      expect.fail('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0].startsWith('app.port: ')).toBe(true);
      }
    }
  });

  it('一次报告所有问题', () => {
    try {
      loadConfig({ PORT: '70000', NODE_ENV: 'staging' });
      expect.fail('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        const paths = err.issues.map((issue) => issue.split(':')[0]);
        expect(paths.sort()).toEqual(['app.env', 'app.port', 'storage.databasePath']);
      }
    }
  });
});

describe('validateConfigWithSchema', () => {
  it('生产环境使用内存数据库给出警告', () => {
    const result = validateConfigWithSchema(readRawConfig({ ...BASE_ENV, NODE_ENV: 'production' }));
    expect(result.success).toBe(true);
    expect(result.warnings).toEqual([
      'storage.databasePath: in-memory database in production, messages are lost on restart',
    ]);
  });

  it('过小的监听缓冲给出警告', () => {
    const result = validateConfigWithSchema(
      readRawConfig({ DATABASE_PATH: './chat.db', CHAT_LISTENER_BUFFER: '4' }),
    );
    expect(result.success).toBe(true);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].startsWith('chat.listenerBufferSize:')).toBe(true);
  });

  it('JSON_BODY_LIMIT 格式校验', () => {
    const result = validateConfigWithSchema(readRawConfig({ ...BASE_ENV, JSON_BODY_LIMIT: 'lots' }));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors).toEqual(['http.jsonBodyLimit: must be like 64kb, 1mb']);
    }
  });
});
