/**
 * 聊天 HTTP 接口
 *
 *   POST /api/v0/add_message  → 幂等提交，成功返回 200 空响应体
 *   GET  /api/v0/events       → text/event-stream，先回放历史再推送实时消息
 *
 * 事件流支持 Last-Event-ID（头部或 ?lastEventId=）断点续传，
 * ?replay=false 跳过历史。终止性错误以 `event: error` 帧发送后断开。
 */

import { Router, type Request, type Response } from 'express';
import { TransportClosedError } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import type { ChatService } from '../chat/chatService';
import { toWireMessage } from '../chat/types';
import {
  encodeSseComment,
  encodeSseEvent,
  parseLastEventId,
  SSE_HEADERS,
} from '../lib/sse';

const log = createModuleLogger('chat-router');

export interface ChatRouterOptions {
  service: ChatService;
  /** 心跳注释帧间隔 */
  heartbeatIntervalMs: number;
  /** 关停时 abort，所有事件流尽快结束 */
  shutdownSignal?: AbortSignal;
}

/** 等待 socket 可写；客户端断开、监听者被摘除或关停时提前返回 */
function waitForDrain(res: Response, stopped: Promise<void>): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.once('drain', done);
    res.once('close', done);
    stopped.then(done, done);
  });
}

function readResumePoint(req: Request): number {
  const fromQuery = typeof req.query.lastEventId === 'string' ? req.query.lastEventId : undefined;
  return parseLastEventId(req.get('Last-Event-ID')) ?? parseLastEventId(fromQuery) ?? 0;
}

async function streamEvents(req: Request, res: Response, options: ChatRouterOptions): Promise<void> {
  const { service, heartbeatIntervalMs, shutdownSignal } = options;
  const subscription = service.subscribe({
    afterSequence: readResumePoint(req),
    replay: req.query.replay !== 'false',
  });

  let stop: () => void = () => undefined;
  const stopped = new Promise<void>((resolve) => {
    stop = resolve;
  });
  let clientGone = false;

  // 断开与关停属于正常生命周期，只记 debug
  const closeWith = (reason: TransportClosedError) => {
    log.debug({ code: reason.code, ...reason.context }, reason.message);
    subscription.close();
    stop();
  };
  const onClientClose = () => {
    clientGone = true;
    closeWith(new TransportClosedError('client', { listenerId: subscription.listenerId }));
  };
  const onShutdown = () => {
    closeWith(new TransportClosedError('shutdown', { listenerId: subscription.listenerId }));
  };

  // 先注册监听者再写响应头，保证握手完成后不会漏消息
  subscription.open();
  // 缓冲溢出被摘除时，写循环可能正卡在一个不再读取的 socket 上
  subscription.listenerClosed?.then(stop, stop);
  res.on('close', onClientClose);
  if (shutdownSignal?.aborted) {
    onShutdown();
  } else {
    shutdownSignal?.addEventListener('abort', onShutdown, { once: true });
  }

  res.writeHead(200, SSE_HEADERS);
  res.write(encodeSseComment('connected'));

  const heartbeat = setInterval(() => {
    if (!res.writableNeedDrain) {
      res.write(encodeSseComment('keep-alive'));
    }
  }, heartbeatIntervalMs);
  heartbeat.unref();

  log.debug({ listenerId: subscription.listenerId, afterSequence: subscription.lastSequence }, 'Event stream opened');

  try {
    for await (const message of subscription.events()) {
      const frame = encodeSseEvent({
        id: message.sequence,
        data: JSON.stringify(toWireMessage(message)),
      });
      if (!res.write(frame)) {
        await waitForDrain(res, stopped);
      }
    }
  } catch (error) {
    if (!clientGone) {
      const reason = error instanceof Error ? error.message : String(error);
      log.warn({ listenerId: subscription.listenerId, err: error }, 'Event stream terminated with error');
      res.write(encodeSseEvent({ event: 'error', data: reason }));
    }
  } finally {
    clearInterval(heartbeat);
    res.off('close', onClientClose);
    shutdownSignal?.removeEventListener('abort', onShutdown);
    subscription.close();

    if (!res.writableEnded) {
      // socket 仍积压时客户端已不再读取，不等待缓冲写出
      if (res.writableNeedDrain) {
        res.destroy();
      } else {
        res.end();
      }
    }
    log.debug({ lastSequence: subscription.lastSequence, clientGone }, 'Event stream closed');
  }
}

export function createChatRouter(options: ChatRouterOptions): Router {
  const router = Router();

  router.post('/add_message', (req, res, next) => {
    options.service.addMessage(req.body).then(
      () => {
        res.status(200).end();
      },
      next,
    );
  });

  router.get('/events', (req, res, next) => {
    streamEvents(req, res, options).catch(next);
  });

  return router;
}
