/**
 * 广播中心 — 进程内唯一的扇出点
 *
 * 每个监听者持有独立的有界缓冲；publish() 对每个监听者做非阻塞投递。
 * 缓冲已满的监听者被摘除并以 ListenerOverrunError 结束其流，
 * 写入方和其他监听者都不会因此等待。
 */

import { ListenerOverrunError } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import { metricsCollector } from '../lib/metrics';
import { ListenerChannel } from './listenerChannel';
import type { ChatMessage } from './types';

const log = createModuleLogger('broadcast-hub');

export interface HubListener extends AsyncIterable<ChatMessage> {
  readonly id: number;
  /** 流结束（正常关闭、被摘除或 hub 关闭）时兑现 */
  readonly closed: Promise<void>;
}

class ChannelListener implements HubListener {
  readonly channel: ListenerChannel<ChatMessage>;

  constructor(readonly id: number, capacity: number) {
    this.channel = new ListenerChannel(capacity);
  }

  get closed(): Promise<void> {
    return this.channel.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<ChatMessage> {
    return this.channel[Symbol.asyncIterator]();
  }
}

export interface BroadcastHubOptions {
  /** 每个监听者最多缓冲的消息数 */
  bufferSize: number;
}

export class BroadcastHub {
  private readonly listeners = new Map<number, ChannelListener>();
  private nextListenerId = 1;
  private closedForShutdown = false;

  constructor(private readonly options: BroadcastHubOptions = { bufferSize: 64 }) {}

  get size(): number {
    return this.listeners.size;
  }

  get isClosed(): boolean {
    return this.closedForShutdown;
  }

  /**
   * 注册新监听者；只接收注册之后发布的消息，不做隐式回放。
   * hub 已关闭时返回一个立即结束的监听者。
   */
  subscribe(): HubListener {
    const listener = new ChannelListener(this.nextListenerId++, this.options.bufferSize);
    if (this.closedForShutdown) {
      listener.channel.close();
      return listener;
    }

    this.listeners.set(listener.id, listener);
    metricsCollector.listenerChange(1);
    log.debug({ listenerId: listener.id, listeners: this.listeners.size }, 'Listener registered');
    return listener;
  }

  /** 幂等；对已摘除的监听者无效果 */
  unsubscribe(listener: HubListener): void {
    const registered = this.listeners.get(listener.id);
    if (!registered) return;

    this.listeners.delete(listener.id);
    metricsCollector.listenerChange(-1);
    registered.channel.close();
    log.debug({ listenerId: listener.id, listeners: this.listeners.size }, 'Listener unregistered');
  }

  /** 由唯一写入方按序号顺序调用 */
  publish(message: ChatMessage): void {
    const overrun: ChannelListener[] = [];
    for (const listener of this.listeners.values()) {
      if (!listener.channel.offer(message)) {
        overrun.push(listener);
      }
    }

    for (const listener of overrun) {
      this.listeners.delete(listener.id);
      metricsCollector.listenerChange(-1);
      metricsCollector.recordListenerDropped('overrun');
      listener.channel.close(new ListenerOverrunError(listener.id, listener.channel.capacity));
      log.warn(
        { listenerId: listener.id, capacity: listener.channel.capacity, sequence: message.sequence },
        'Listener buffer full, dropped',
      );
    }
  }

  /** 关停：所有监听者的流正常结束，之后的 subscribe 立即结束 */
  close(): void {
    if (this.closedForShutdown) return;
    this.closedForShutdown = true;

    const count = this.listeners.size;
    for (const listener of this.listeners.values()) {
      metricsCollector.recordListenerDropped('shutdown');
      listener.channel.close();
    }
    this.listeners.clear();
    metricsCollector.listenerChange(-count);
    log.info({ listeners: count }, 'Broadcast hub closed');
  }
}
