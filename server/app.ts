/**
 * Express 应用装配
 *
 * 与 listen() 分离，测试直接把返回的 app 交给 supertest 或临时端口。
 */

import path from 'path';
import express, { type Express } from 'express';
import { createChatRouter } from './api/chat.router';
import type { ChatService } from './chat/chatService';
import type { AppConfig } from './core/config';
import { createModuleLogger } from './core/logger';
import { metricsCollector } from './lib/metrics';
import { errorHandler } from './middleware/errorHandler';

const log = createModuleLogger('app');

export interface AppDeps {
  service: ChatService;
  config: Pick<AppConfig, 'app' | 'chat' | 'http'>;
  shutdownSignal?: AbortSignal;
}

export function createApp({ service, config, shutdownSignal }: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  // HTTP 指标收集中间件（记录请求延迟/计数/状态码）
  app.use(metricsCollector.httpMiddleware());

  app.get('/health', (_req, res) => {
    res.type('text/plain').send('OK');
  });

  // ── Prometheus /api/metrics 端点 ─────────────────────────────
  app.get('/api/metrics', (_req, res) => {
    metricsCollector.getMetrics().then(
      (text) => {
        res.set('Content-Type', metricsCollector.getContentType());
        res.end(text);
      },
      (err: unknown) => {
        log.warn({ err }, 'Failed to collect metrics');
        res.status(500).end('Error collecting metrics');
      },
    );
  });

  app.use(
    '/api/v0',
    express.json({ limit: config.http.jsonBodyLimit }),
    createChatRouter({
      service,
      heartbeatIntervalMs: config.chat.heartbeatIntervalMs,
      shutdownSignal,
    }),
  );

  // 预构建 UI（可选）
  if (config.app.staticDir) {
    const staticPath = path.resolve(config.app.staticDir);
    app.use(express.static(staticPath));
    log.info({ staticPath }, 'Serving static UI');
  }

  app.use(errorHandler());

  return app;
}
