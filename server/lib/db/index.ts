import { mkdirSync } from "fs";
import { dirname } from "path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "../../../drizzle/schema";
import { StorageUnavailableError } from "../../core/errors";
import { createModuleLogger } from "../../core/logger";

const log = createModuleLogger('database');

export type ChatDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: ChatDatabase;
  path: string;
  close(): void;
}

// ============================================================================
// SQLite 连接配置
// ============================================================================
// 单进程唯一写入者，不需要连接池：一个 better-sqlite3 连接即可。
//
//   journal_mode = WAL   — 读写互不阻塞，崩溃后可恢复
//   synchronous = FULL   — 每次提交都 fsync，"返回成功" 即 "已落盘"
//   busy_timeout = 5000  — 外部工具（sqlite3 CLI 备份等）持锁时等待而非立即报错
// ============================================================================

function ensureTables(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS messages (
      sequence INTEGER PRIMARY KEY,
      message_id TEXT NOT NULL UNIQUE,
      sender TEXT NOT NULL,
      content TEXT NOT NULL,
      created_at_ms INTEGER NOT NULL
    )
  `);
}

/**
 * 打开（必要时创建）数据库文件并建表。
 * `:memory:` 得到进程内数据库，仅用于开发和测试。
 */
export function openDatabase(path: string): DatabaseHandle {
  let sqlite: Database.Database;
  try {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    sqlite = new Database(path);
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('synchronous = FULL');
    sqlite.pragma('busy_timeout = 5000');
    ensureTables(sqlite);
  } catch (error) {
    throw new StorageUnavailableError('open', error, { path });
  }

  log.info({ path }, '[Database] SQLite opened');

  return {
    db: drizzle(sqlite, { schema }),
    path,
    close() {
      if (!sqlite.open) return;
      sqlite.close();
      log.info({ path }, '[Database] SQLite closed');
    },
  };
}
