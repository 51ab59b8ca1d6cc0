import './core/env-loader';

import { createServer, type Server } from 'http';
import { createApp } from './app';
import { BroadcastHub, ChatService, SqliteMessageStore } from './chat';
import { loadConfig } from './core/config';
import { GracefulShutdownManager } from './core/gracefulShutdown';
import { createModuleLogger, setLogLevel } from './core/logger';
import { openDatabase } from './lib/db';

const log = createModuleLogger('index');

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

async function startServer(): Promise<void> {
  // 配置错误是唯一允许让进程以失败退出的错误，必须发生在监听端口之前
  const config = loadConfig();
  setLogLevel(config.app.logLevel);

  const database = openDatabase(config.storage.databasePath);
  const store = SqliteMessageStore.open(database.db);
  const hub = new BroadcastHub({ bufferSize: config.chat.listenerBufferSize });
  const service = new ChatService({ store, hub, limits: config.chat });
  const streams = new AbortController();

  const app = createApp({ service, config, shutdownSignal: streams.signal });
  const server = createServer(app);

  try {
    await listen(server, config.app.port, config.app.host);
  } catch (err) {
    database.close();
    throw err;
  }

  // ── 优雅关闭：事件流 → HTTP server → 写入队列 → 数据库 ─────────
  const shutdown = new GracefulShutdownManager({ timeout: config.http.shutdownTimeoutMs });
  shutdown.registerServer(server);
  shutdown.addHook('event-streams', 'beforeServerClose', () => {
    streams.abort();
    hub.close();
  }, 10);
  shutdown.addHook('write-queue', 'afterServerClose', () => service.drain(), 10);
  shutdown.addHook('database', 'afterServerClose', () => database.close(), 20);
  shutdown.registerSignalHandlers();

  log.info(
    { host: config.app.host, port: config.app.port, database: database.path, env: config.app.env },
    `${config.app.name} v${config.app.version} listening on http://${config.app.host}:${config.app.port}/`,
  );
}

startServer().catch((err: unknown) => {
  log.fatal({ err }, 'Server startup failed');
  process.exitCode = 1;
});
