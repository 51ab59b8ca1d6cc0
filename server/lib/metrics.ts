/**
 * Prometheus 指标收集器
 *
 * 基于 prom-client 实现应用级指标暴露，供 Prometheus 抓取（GET /api/metrics）。
 *
 * 指标覆盖：
 * - HTTP 请求延迟/计数/状态码分布
 * - 消息接收 / 去重 / 拒绝计数
 * - 活跃监听者数量与被摘除次数
 * - 系统资源（Node.js 默认指标）
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import {
  Registry,
  Counter,
  Histogram,
  Gauge,
  collectDefaultMetrics,
} from 'prom-client';
import { createModuleLogger } from '../core/logger';

const log = createModuleLogger('metrics-collector');

// ============================================================
// 指标注册表
// ============================================================

const register = new Registry();

register.setDefaultLabels({
  app: 'chat-relay',
  env: process.env.NODE_ENV || 'development',
});

// Node.js 默认指标（CPU、内存、事件循环延迟、GC 等）
collectDefaultMetrics({ register, prefix: 'chat_' });

// ============================================================
// 自定义指标定义
// ============================================================

const httpRequestsTotal = new Counter({
  name: 'chat_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [register],
});

const httpRequestDuration = new Histogram({
  name: 'chat_http_request_duration_seconds',
  help: 'HTTP request duration in seconds (event streams measure connection lifetime)',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register],
});

const messagesAccepted = new Counter({
  name: 'chat_messages_accepted_total',
  help: 'Messages committed with a new sequence number',
  registers: [register],
});

const messagesDeduplicated = new Counter({
  name: 'chat_messages_deduplicated_total',
  help: 'Submissions answered with an already committed message',
  registers: [register],
});

const messagesRejected = new Counter({
  name: 'chat_messages_rejected_total',
  help: 'Submissions rejected before or during commit',
  labelNames: ['reason'] as const,
  registers: [register],
});

const listenersActive = new Gauge({
  name: 'chat_listeners_active',
  help: 'Live listeners registered with the broadcast hub',
  registers: [register],
});

const listenersDropped = new Counter({
  name: 'chat_listeners_dropped_total',
  help: 'Listeners removed by the hub instead of unsubscribing themselves',
  labelNames: ['reason'] as const,
  registers: [register],
});

export type RejectionReason = 'invalid' | 'storage' | 'shutdown';
export type DropReason = 'overrun' | 'shutdown';

// ============================================================
// 指标收集器类
// ============================================================

class MetricsCollector {
  /**
   * Express 中间件，自动收集 HTTP 指标
   */
  httpMiddleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      const start = process.hrtime.bigint();

      const onFinish = () => {
        res.removeListener('finish', onFinish);
        res.removeListener('close', onFinish);
        const elapsed = Number(process.hrtime.bigint() - start) / 1e9;
        const route = this.normalizeRoute(req.path);
        const statusCode = res.statusCode.toString();

        httpRequestsTotal.inc({ method: req.method, route, status_code: statusCode });
        httpRequestDuration.observe({ method: req.method, route, status_code: statusCode }, elapsed);
      };

      // 事件流被客户端断开时只有 close 没有 finish
      res.on('finish', onFinish);
      res.on('close', onFinish);
      next();
    };
  }

  // ============================================================
  // 业务指标记录方法
  // ============================================================

  recordMessageAccepted(): void {
    messagesAccepted.inc();
  }

  recordMessageDeduplicated(): void {
    messagesDeduplicated.inc();
  }

  recordMessageRejected(reason: RejectionReason): void {
    messagesRejected.inc({ reason });
  }

  /** 记录监听者数量变化 */
  listenerChange(delta: number): void {
    listenersActive.inc(delta);
  }

  recordListenerDropped(reason: DropReason): void {
    listenersDropped.inc({ reason });
  }

  /** Prometheus exposition format 文本 */
  async getMetrics(): Promise<string> {
    return register.metrics();
  }

  getContentType(): string {
    return register.contentType;
  }

  /** 获取注册表（用于测试） */
  getRegistry(): Registry {
    return register;
  }

  /** 重置计数（用于测试） */
  reset(): void {
    register.resetMetrics();
    log.debug('Metrics reset');
  }

  // ============================================================
  // 内部方法
  // ============================================================

  /**
   * 规范化路由路径，避免高基数标签
   */
  private normalizeRoute(path: string): string {
    if (path.startsWith('/api/')) return path.replace(/\/\d+/g, '/:id');
    if (path === '/health') return path;
    return '/static';
  }
}

export const metricsCollector = new MetricsCollector();
