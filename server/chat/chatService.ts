/**
 * 聊天服务 — 消息接收与订阅的唯一入口
 *
 *   addMessage: 校验 → 单写入者内（幂等提交 → 发布）→ 返回
 *   subscribe:  为一个事件流创建 EventSubscription
 *
 * hub 与 store 均由调用方创建并注入，服务本身不持有全局状态。
 */

import { ErrorCode, isAppError, StorageUnavailableError } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import { metricsCollector } from '../lib/metrics';
import type { BroadcastHub } from './broadcastHub';
import { EventSubscription, type SubscriptionOptions } from './eventSubscription';
import {
  createMessageSchema,
  DEFAULT_MESSAGE_LIMITS,
  parseSubmittedMessage,
  type MessageLimits,
  type MessageSchema,
} from './message.validation';
import type { MessageStore } from './messageStore';
import type { ChatMessage, SubmittedMessage } from './types';
import { WriteQueue } from './writeQueue';

const log = createModuleLogger('chat-service');

export interface AddMessageResult {
  message: ChatMessage;
  /** false 表示该 id 已提交过，本次为重试 */
  created: boolean;
}

export interface ChatServiceDeps {
  store: MessageStore;
  hub: BroadcastHub;
  limits?: MessageLimits;
}

export class ChatService {
  private readonly store: MessageStore;
  private readonly hub: BroadcastHub;
  private readonly schema: MessageSchema;
  private readonly writer = new WriteQueue();

  constructor(deps: ChatServiceDeps) {
    this.store = deps.store;
    this.hub = deps.hub;
    this.schema = createMessageSchema(deps.limits ?? DEFAULT_MESSAGE_LIMITS);
  }

  /**
   * 幂等提交一条消息。
   * 同一 id 的重复提交（无论内容是否一致）返回最初提交的消息，且不再广播。
   */
  async addMessage(input: unknown): Promise<AddMessageResult> {
    const submitted = this.validate(input);

    try {
      return await this.writer.run(async () => {
        const { message, wasNew } = await this.store.insertIfAbsent(submitted);
        if (!wasNew) {
          metricsCollector.recordMessageDeduplicated();
          log.debug({ messageId: message.id, sequence: message.sequence }, 'Duplicate submission');
          return { message, created: false };
        }

        this.hub.publish(message);
        metricsCollector.recordMessageAccepted();
        log.debug({ messageId: message.id, sequence: message.sequence }, 'Message committed');
        return { message, created: true };
      });
    } catch (error) {
      const shuttingDown = isAppError(error) && error.code === ErrorCode.SERVICE_UNAVAILABLE;
      metricsCollector.recordMessageRejected(shuttingDown ? 'shutdown' : 'storage');
      if (isAppError(error)) throw error;
      throw new StorageUnavailableError('insert', error, { messageId: submitted.id });
    }
  }

  private validate(input: unknown): SubmittedMessage {
    try {
      return parseSubmittedMessage(this.schema, input);
    } catch (error) {
      metricsCollector.recordMessageRejected('invalid');
      throw error;
    }
  }

  /** 历史消息；afterSequence 缺省时返回全部 */
  async history(afterSequence?: number): Promise<ChatMessage[]> {
    return afterSequence === undefined
      ? this.store.listAll()
      : this.store.listSince(afterSequence);
  }

  subscribe(options: SubscriptionOptions = {}): EventSubscription {
    return new EventSubscription(this.store, this.hub, options);
  }

  /** 关停时调用：拒绝新提交，等待已入队的提交完成 */
  async drain(): Promise<void> {
    await this.writer.drain();
  }
}
