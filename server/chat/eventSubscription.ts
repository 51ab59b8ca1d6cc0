/**
 * 单个事件流订阅
 *
 * 状态机：connecting → streaming → closed
 *
 * 先向 hub 注册监听者，再读取回放快照；实时流中 sequence 不大于
 * 已发送最大序号的消息被跳过。因此回放与实时之间既不丢失也不重复。
 *
 * 续传点超过存储中的最大序号时（存储被重置过），续传点作废，从头回放。
 */

import { createModuleLogger } from '../core/logger';
import type { BroadcastHub, HubListener } from './broadcastHub';
import type { MessageStore } from './messageStore';
import type { ChatMessage } from './types';

const log = createModuleLogger('event-subscription');

export type SubscriptionState = 'connecting' | 'streaming' | 'closed';

export interface SubscriptionOptions {
  /** 断线重连时的 Last-Event-ID；只推送序号更大的消息 */
  afterSequence?: number;
  /** false 时跳过历史，只接收实时消息 */
  replay?: boolean;
}

export class EventSubscription {
  private currentState: SubscriptionState = 'connecting';
  private listener: HubListener | null = null;
  private highestSent: number;
  private readonly replay: boolean;

  constructor(
    private readonly store: MessageStore,
    private readonly hub: BroadcastHub,
    options: SubscriptionOptions = {},
  ) {
    this.highestSent = options.afterSequence ?? 0;
    this.replay = options.replay ?? true;
  }

  get state(): SubscriptionState {
    return this.currentState;
  }

  /** 已交付给消费者的最大序号 */
  get lastSequence(): number {
    return this.highestSent;
  }

  get listenerId(): number | null {
    return this.listener?.id ?? null;
  }

  /** 监听者结束（被 hub 摘除、hub 关闭或 close()）时兑现；open() 之前为 undefined */
  get listenerClosed(): Promise<void> | undefined {
    return this.listener?.closed;
  }

  /**
   * 注册监听者并进入 streaming 状态。必须在读取回放快照之前调用，
   * events() 会在尚未打开时自动调用它。
   */
  open(): void {
    if (this.currentState !== 'connecting') return;
    this.listener = this.hub.subscribe();
    this.currentState = 'streaming';
    log.debug({ listenerId: this.listener.id, afterSequence: this.highestSent }, 'Subscription streaming');
  }

  /**
   * 先回放历史，再转为实时流。存储读取失败或监听者被摘除时抛出，
   * 调用方负责向客户端发送终止事件并 close()。
   */
  async *events(): AsyncGenerator<ChatMessage, void, undefined> {
    this.open();
    const listener = this.listener;
    if (!listener || this.currentState === 'closed') return;

    try {
      await this.discardStaleResumePoint();

      if (this.replay) {
        const snapshot = await this.store.listSince(this.highestSent);
        for (const message of snapshot) {
          if (this.isClosed()) return;
          if (message.sequence <= this.highestSent) continue;
          this.highestSent = message.sequence;
          yield message;
        }
      }

      for await (const message of listener) {
        if (this.isClosed()) return;
        if (message.sequence <= this.highestSent) continue;
        this.highestSent = message.sequence;
        yield message;
      }
    } finally {
      this.close();
    }
  }

  /** 幂等；立即从 hub 注销 */
  close(): void {
    if (this.currentState === 'closed') return;
    this.currentState = 'closed';
    if (this.listener) {
      this.hub.unsubscribe(this.listener);
      log.debug({ listenerId: this.listener.id, lastSequence: this.highestSent }, 'Subscription closed');
    }
  }

  /** 客户端带来的序号存储里从未出现过时，按新客户端处理 */
  private async discardStaleResumePoint(): Promise<void> {
    if (this.highestSent === 0) return;
    const storeLast = await this.store.lastSequence();
    if (this.highestSent <= storeLast) return;

    log.info(
      { listenerId: this.listener?.id, afterSequence: this.highestSent, storeLast },
      'Resume point is ahead of the store, replaying from the start',
    );
    this.highestSent = 0;
  }

  private isClosed(): boolean {
    return this.currentState === 'closed';
  }
}
