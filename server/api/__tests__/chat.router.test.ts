/**
 * 聊天 HTTP 接口测试
 *
 * 普通请求走 supertest；事件流在测试进程内监听临时端口，用 http.get 读取。
 */
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import type { Server } from 'http';
import { connect } from 'net';
import { tmpdir } from 'os';
import { join } from 'path';
import request from 'supertest';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Express } from 'express';
import { createApp } from '../../app';
import { BroadcastHub } from '../../chat/broadcastHub';
import { ChatService } from '../../chat/chatService';
import { SqliteMessageStore, type MessageStore } from '../../chat/messageStore';
import type { ChatMessage, InsertOutcome } from '../../chat/types';
import { loadConfig } from '../../core/config';
import { ErrorCode, StorageUnavailableError } from '../../core/errors';
import { openDatabase, type DatabaseHandle } from '../../lib/db';
import { openEventStream } from './sseClient';

const NOW = 1_700_000_000_000;

class FailingStore implements MessageStore {
  async insertIfAbsent(): Promise<InsertOutcome> {
    throw new StorageUnavailableError('insert', new Error('disk full'));
  }
  async listAll(): Promise<ChatMessage[]> {
    return [];
  }
  async listSince(): Promise<ChatMessage[]> {
    return [];
  }
  async count(): Promise<number> {
    return 0;
  }
  async lastSequence(): Promise<number> {
    return 0;
  }
}

function frame(sequence: number, id: string, sender: string, content: string): string {
  return `id: ${sequence}\ndata: ${JSON.stringify({ id, sender, content, timestamp_ms: NOW })}\n\n`;
}

describe('chat router', () => {
  let handle: DatabaseHandle;
  let hub: BroadcastHub;
  let service: ChatService;
  let streams: AbortController;
  let app: Express;

  function buildApp(env: Record<string, string> = {}, bufferSize = 16): Express {
    const config = loadConfig({ DATABASE_PATH: ':memory:', ...env });
    hub = new BroadcastHub({ bufferSize });
    service = new ChatService({ store: SqliteMessageStore.open(handle.db, { clock: () => NOW }), hub });
    return createApp({ service, config, shutdownSignal: streams.signal });
  }

  beforeEach(() => {
    handle = openDatabase(':memory:');
    streams = new AbortController();
    app = buildApp();
  });

  afterEach(() => {
    streams.abort();
    hub.close();
    handle.close();
  });

  describe('POST /api/v0/add_message', () => {
    it('成功返回 200 空响应体', async () => {
      const res = await request(app)
        .post('/api/v0/add_message')
        .send({ id: 'a', sender: 'alice', content: 'hello' });

      expect(res.status).toBe(200);
      expect(res.text).toBe('');
      expect((await service.history()).map((m) => m.id)).toEqual(['a']);
    });

    it('重复提交同样返回 200 且不新增消息', async () => {
      await request(app).post('/api/v0/add_message').send({ id: 'a', sender: 'alice', content: 'hello' });
      const res = await request(app)
        .post('/api/v0/add_message')
        .send({ id: 'a', sender: 'alice', content: 'changed' });

      expect(res.status).toBe(200);
      const history = await service.history();
      expect(history).toHaveLength(1);
      expect(history[0].content).toBe('hello');
    });

    it('校验失败返回 400 和错误详情', async () => {
      const res = await request(app)
        .post('/api/v0/add_message')
        .send({ id: 'a', sender: 'alice', content: '   ' });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({
        error: 'InvalidMessageError',
        code: ErrorCode.INVALID_MESSAGE,
        message: 'content: content must not be blank',
        context: { issues: [{ field: 'content', message: 'content must not be blank' }] },
      });
    });

    it('非法 JSON 返回 400', async () => {
      const res = await request(app)
        .post('/api/v0/add_message')
        .set('Content-Type', 'application/json')
        .send('{"id": "a",');

      expect(res.status).toBe(400);
      expect(res.body.code).toBe(ErrorCode.MALFORMED_BODY);
      expect(res.body.message).toBe('Request body is not valid JSON');
    });

    it('请求体超过上限返回 400', async () => {
      const small = buildApp({ JSON_BODY_LIMIT: '100b' });
      const res = await request(small)
        .post('/api/v0/add_message')
        .send({ id: 'a', sender: 'alice', content: 'x'.repeat(200) });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Request body is too large');
    });

    it('存储不可用返回 503', async () => {
      const config = loadConfig({ DATABASE_PATH: ':memory:' });
      const failing = createApp({
        service: new ChatService({ store: new FailingStore(), hub }),
        config,
      });

      const res = await request(failing)
        .post('/api/v0/add_message')
        .send({ id: 'a', sender: 'alice', content: 'hello' });

      expect(res.status).toBe(503);
      expect(res.body.code).toBe(ErrorCode.STORAGE_UNAVAILABLE);
      expect(res.body.message).toBe('Storage unavailable during insert: disk full');
    });
  });

  describe('运维端点', () => {
    it('GET /health 返回 OK', async () => {
      const res = await request(app).get('/health');
      expect(res.status).toBe(200);
      expect(res.text).toBe('OK');
    });

    it('GET /api/metrics 返回 Prometheus 文本', async () => {
      await request(app).post('/api/v0/add_message').send({ id: 'm', sender: 's', content: 'c' });
      const res = await request(app).get('/api/metrics');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toContain('text/plain');
      expect(res.text).toContain('# TYPE chat_messages_accepted_total counter');
    });

    it('配置 STATIC_DIR 时托管静态文件', async () => {
      const dir = mkdtempSync(join(tmpdir(), 'chat-relay-ui-'));
      try {
        writeFileSync(join(dir, 'index.html'), '<h1>chat</h1>');
        const withUi = buildApp({ STATIC_DIR: dir });

        const res = await request(withUi).get('/');
        expect(res.status).toBe(200);
        expect(res.text).toBe('<h1>chat</h1>');
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe('GET /api/v0/events', () => {
    let server: Server;
    let port: number;

    async function listen(target: Express): Promise<void> {
      server = target.listen(0, '127.0.0.1');
      await new Promise<void>((resolve) => server.once('listening', () => resolve()));
      const address = server.address();
      if (address === null || typeof address === 'string') throw new Error('unexpected address');
      port = address.port;
    }

    const post = (id: string, sender: string, content: string) =>
      request(app).post('/api/v0/add_message').send({ id, sender, content }).expect(200);

    afterEach(async () => {
      streams.abort();
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('回放历史后推送实时消息', async () => {
      await listen(app);
      await post('a', 'alice', 'first');
      await post('b', 'bob', 'second');

      const client = await openEventStream(port);
      expect(client.status).toBe(200);
      expect(client.headers['content-type']).toBe('text/event-stream; charset=utf-8');
      expect(client.headers['cache-control']).toBe('no-cache, no-transform');

      await client.waitFor((t) => t.includes(frame(2, 'b', 'bob', 'second')));
      await post('c', 'carol', 'third');
      const text = await client.waitFor((t) => t.includes(frame(3, 'c', 'carol', 'third')));

      expect(text).toBe(
        ': connected\n\n' +
          frame(1, 'a', 'alice', 'first') +
          frame(2, 'b', 'bob', 'second') +
          frame(3, 'c', 'carol', 'third'),
      );
      client.close();
    });

    it('Last-Event-ID 头部续传', async () => {
      await listen(app);
      await post('a', 'alice', 'first');
      await post('b', 'bob', 'second');

      const client = await openEventStream(port, '/api/v0/events', { 'Last-Event-ID': '1' });
      const text = await client.waitFor((t) => t.includes(frame(2, 'b', 'bob', 'second')));

      expect(text).toBe(': connected\n\n' + frame(2, 'b', 'bob', 'second'));
      client.close();
    });

    it('Last-Event-ID 超过存储最大序号时从头回放', async () => {
      await listen(app);
      await post('a', 'alice', 'first');

      const client = await openEventStream(port, '/api/v0/events', { 'Last-Event-ID': '50' });
      await client.waitFor((t) => t.includes(frame(1, 'a', 'alice', 'first')));
      await post('b', 'bob', 'second');
      const text = await client.waitFor((t) => t.includes(frame(2, 'b', 'bob', 'second')));

      expect(text).toBe(': connected\n\n' + frame(1, 'a', 'alice', 'first') + frame(2, 'b', 'bob', 'second'));
      client.close();
    });

    it('lastEventId 查询参数续传', async () => {
      await listen(app);
      await post('a', 'alice', 'first');
      await post('b', 'bob', 'second');

      const client = await openEventStream(port, '/api/v0/events?lastEventId=2');
      await post('c', 'carol', 'third');
      const text = await client.waitFor((t) => t.includes(frame(3, 'c', 'carol', 'third')));

      expect(text).toBe(': connected\n\n' + frame(3, 'c', 'carol', 'third'));
      client.close();
    });

    it('replay=false 跳过历史', async () => {
      await listen(app);
      await post('a', 'alice', 'first');

      const client = await openEventStream(port, '/api/v0/events?replay=false');
      await client.waitFor((t) => t.includes(': connected'));
      await post('b', 'bob', 'second');
      const text = await client.waitFor((t) => t.includes(frame(2, 'b', 'bob', 'second')));

      expect(text).toBe(': connected\n\n' + frame(2, 'b', 'bob', 'second'));
      client.close();
    });

    it('客户端断开后注销监听者', async () => {
      await listen(app);
      const client = await openEventStream(port);
      await client.waitFor((t) => t.includes(': connected'));
      expect(hub.size).toBe(1);

      client.close();
      await vi.waitFor(() => expect(hub.size).toBe(0));
    });

    it('定期发送心跳注释', async () => {
      app = buildApp({ SSE_HEARTBEAT_MS: '20' });
      await listen(app);

      const client = await openEventStream(port);
      await client.waitFor((t) => t.includes(': keep-alive\n\n'));
      client.close();
    });

    it('监听者溢出时发送 error 事件并断开', async () => {
      app = buildApp({}, 1);
      await listen(app);

      const client = await openEventStream(port);
      await client.waitFor((t) => t.includes(': connected'));
      await vi.waitFor(() => expect(hub.size).toBe(1));

      for (let seq = 1; seq <= 3; seq++) {
        hub.publish({ id: `m${seq}`, sender: 's', content: 'c', sequence: seq, createdAtMs: NOW });
      }

      await client.ended;
      expect(client.text().endsWith(
        'event: error\ndata: Listener fell more than 1 messages behind and was disconnected\n\n',
      )).toBe(true);
      expect(hub.size).toBe(0);
    });

    it('客户端停止读取后溢出，服务端销毁连接', async () => {
      app = buildApp({}, 4);
      await listen(app);
      const openConnections = () =>
        new Promise<number>((resolve, reject) => {
          server.getConnections((err, count) => (err ? reject(err) : resolve(count)));
        });

      // 发出请求后不再读取任何字节
      const socket = connect(port, '127.0.0.1');
      const socketErrors: Error[] = [];
      socket.on('error', (err) => socketErrors.push(err));
      socket.pause();
      socket.write('GET /api/v0/events HTTP/1.1\r\nHost: 127.0.0.1\r\n\r\n');
      await vi.waitFor(() => expect(hub.size).toBe(1));

      const content = 'x'.repeat(100_000);
      let published = 0;
      while (hub.size > 0 && published < 2000) {
        published++;
        hub.publish({ id: `big${published}`, sender: 's', content, sequence: published, createdAtMs: NOW });
        await new Promise((resolve) => setTimeout(resolve, 1));
      }
      expect(hub.size).toBe(0);

      await vi.waitFor(async () => expect(await openConnections()).toBe(0), { timeout: 2000 });
      socket.destroy();
    });

    it('关停时事件流立即结束', async () => {
      await listen(app);
      const client = await openEventStream(port);
      await client.waitFor((t) => t.includes(': connected'));

      streams.abort();
      await client.ended;
      expect(hub.size).toBe(0);
    });
  });
});
