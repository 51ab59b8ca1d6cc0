/**
 * 单写入者队列
 *
 * 所有"提交 + 发布"单元串行执行，序号永远不会被并发分配。
 * 任务失败只影响它自己的调用方，不会阻断后续任务。
 */

import { AppError, ErrorCode } from '../core/errors';
import { createModuleLogger } from '../core/logger';

const log = createModuleLogger('write-queue');

export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;

  get size(): number {
    return this.pending;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  run<T>(task: () => Promise<T> | T): Promise<T> {
    if (this.closed) {
      return Promise.reject(new AppError('Server is shutting down', ErrorCode.SERVICE_UNAVAILABLE));
    }

    this.pending++;
    const result = this.tail.then(task);
    // 链尾只关心"完成"，错误已经交给调用方
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  /** 拒绝新任务并等待已入队的任务全部完成 */
  async drain(): Promise<void> {
    this.closed = true;
    if (this.pending > 0) {
      log.info({ pending: this.pending }, 'Draining write queue');
    }
    await this.tail;
  }

  private settle(): void {
    this.pending--;
  }
}
