/**
 * 优雅关闭模块
 *
 * 处理 SIGTERM/SIGINT 信号，确保：
 * 1. 先结束所有长连接事件流（否则 server.close() 会一直等待它们）
 * 2. 停止接受新请求，等待进行中的请求完成
 * 3. 排空写入队列、关闭数据库
 * 4. 超时后强制退出
 */

import type { Server } from 'http';
import { createModuleLogger } from './logger';

const log = createModuleLogger('graceful-shutdown');

// ============================================================
// 类型定义
// ============================================================

/**
 * beforeServerClose：在关闭 HTTP server 之前执行（结束事件流）
 * afterServerClose：HTTP server 关闭后执行（释放存储等资源）
 */
export type ShutdownStage = 'beforeServerClose' | 'afterServerClose';

export interface ShutdownHook {
  name: string;
  stage: ShutdownStage;
  priority: number;  // 越小越先执行
  handler: () => Promise<void> | void;
}

export interface ShutdownOptions {
  /** 最大等待时间(ms)，超过则强制退出 */
  timeout: number;
  /** 单个钩子的超时(ms) */
  hookTimeout: number;
  /** 退出函数，测试中替换 */
  exit: (code: number) => void;
}

const DEFAULT_OPTIONS: ShutdownOptions = {
  timeout: 10_000,
  hookTimeout: 5_000,
  exit: (code) => process.exit(code),
};

// ============================================================
// 优雅关闭管理器
// ============================================================

export class GracefulShutdownManager {
  private hooks: ShutdownHook[] = [];
  private isShuttingDown = false;
  private server: Server | null = null;
  private options: ShutdownOptions;

  constructor(options?: Partial<ShutdownOptions>) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /** 注册 HTTP Server 实例 */
  registerServer(server: Server): void {
    this.server = server;
  }

  /**
   * 注册关闭钩子
   * @param priority 同一阶段内越小越先执行，默认 100
   */
  addHook(name: string, stage: ShutdownStage, handler: () => Promise<void> | void, priority = 100): void {
    this.hooks.push({ name, stage, priority, handler });
    this.hooks.sort((a, b) => a.priority - b.priority);
    log.debug(`Shutdown hook registered: ${name} (${stage}, priority=${priority})`);
  }

  /** 注册进程信号处理器 */
  registerSignalHandlers(): void {
    const shutdown = (signal: string) => {
      this.initiateShutdown(signal).catch((err: unknown) => {
        log.fatal({ err }, 'Shutdown sequence crashed');
        this.options.exit(1);
      });
    };

    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));

    log.debug('Signal handlers registered (SIGTERM, SIGINT)');
  }

  /** 发起优雅关闭流程 */
  async initiateShutdown(signal: string): Promise<void> {
    if (this.isShuttingDown) {
      log.warn(`Shutdown already in progress, ignoring ${signal}`);
      return;
    }

    this.isShuttingDown = true;
    const startTime = Date.now();
    log.info(`Received ${signal}, starting graceful shutdown...`);

    const forceExitTimer = setTimeout(() => {
      log.error(`Graceful shutdown timed out after ${this.options.timeout}ms, forcing exit`);
      this.options.exit(1);
    }, this.options.timeout);
    forceExitTimer.unref();

    const streamsOk = await this.executeHooks('beforeServerClose');
    if (this.server) {
      await this.closeServer(this.server);
    }
    const resourcesOk = await this.executeHooks('afterServerClose');

    clearTimeout(forceExitTimer);
    log.info(`Graceful shutdown completed in ${Date.now() - startTime}ms`);
    this.options.exit(streamsOk && resourcesOk ? 0 : 1);
  }

  // ============================================================
  // 内部方法
  // ============================================================

  private closeServer(server: Server): Promise<void> {
    return new Promise((resolve) => {
      log.info('Closing HTTP server (no new connections)...');
      server.close((err) => {
        if (err) {
          log.warn({ err }, 'Server close error (may be expected)');
        }
        log.info('HTTP server closed');
        resolve();
      });
      // keep-alive 空闲连接不会自行断开
      server.closeIdleConnections();
    });
  }

  /** 返回 false 表示至少一个钩子失败；其余钩子照常执行 */
  private async executeHooks(stage: ShutdownStage): Promise<boolean> {
    let ok = true;
    for (const hook of this.hooks.filter(h => h.stage === stage)) {
      const start = Date.now();
      let timer: NodeJS.Timeout | undefined;
      try {
        await Promise.race([
          Promise.resolve().then(hook.handler),
          new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new Error(`Hook "${hook.name}" timed out`)), this.options.hookTimeout);
          }),
        ]);
        log.info(`  ✓ ${hook.name} (${Date.now() - start}ms)`);
      } catch (err) {
        ok = false;
        log.error({ err }, `  ✗ ${hook.name} failed`);
      } finally {
        clearTimeout(timer);
      }
    }
    return ok;
  }
}
