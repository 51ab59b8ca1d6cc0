/**
 * 持久化消息存储
 *
 * 只追加：按客户端 id 幂等插入，按序号读取历史。
 * SQLite 事务是同步的，查重 → 分配序号 → 插入在同一个 IMMEDIATE 事务内完成，
 * 事务提交后才确认序号，失败的插入不会消耗序号。
 */

import { asc, count, desc, eq, gt } from 'drizzle-orm';
import { messages, type MessageRow } from '../../drizzle/schema';
import { StorageUnavailableError } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import type { ChatDatabase } from '../lib/db';
import { Sequencer, type Clock, type SequenceAssignment } from './sequencer';
import type { ChatMessage, InsertOutcome, SubmittedMessage } from './types';

const log = createModuleLogger('message-store');

export interface MessageStore {
  /** 同一 id 的并发调用中恰好一个得到 wasNew = true */
  insertIfAbsent(message: SubmittedMessage): Promise<InsertOutcome>;
  /** 全部消息，按序号升序 */
  listAll(): Promise<ChatMessage[]>;
  /** sequence > afterSequence 的消息，按序号升序 */
  listSince(afterSequence: number): Promise<ChatMessage[]>;
  count(): Promise<number>;
  /** 空库为 0 */
  lastSequence(): Promise<number>;
}

function toChatMessage(row: MessageRow): ChatMessage {
  return {
    id: row.messageId,
    sender: row.sender,
    content: row.content,
    sequence: row.sequence,
    createdAtMs: row.createdAtMs,
  };
}

export interface SqliteMessageStoreOptions {
  /** 测试中注入固定时钟 */
  clock?: Clock;
}

export class SqliteMessageStore implements MessageStore {
  private constructor(
    private readonly db: ChatDatabase,
    private readonly sequencer: Sequencer,
  ) {}

  /** 从已有数据恢复序号状态后返回存储实例 */
  static open(db: ChatDatabase, options: SqliteMessageStoreOptions = {}): SqliteMessageStore {
    let last: MessageRow | undefined;
    try {
      last = db.select().from(messages).orderBy(desc(messages.sequence)).limit(1).get();
    } catch (error) {
      throw new StorageUnavailableError('open', error);
    }

    const sequencer = new Sequencer(
      {
        lastSequence: last?.sequence ?? 0,
        lastCreatedAtMs: last?.createdAtMs ?? 0,
      },
      options.clock,
    );
    log.info({ lastSequence: sequencer.current.lastSequence }, 'Message store ready');
    return new SqliteMessageStore(db, sequencer);
  }

  async insertIfAbsent(message: SubmittedMessage): Promise<InsertOutcome> {
    let outcome: { existing: MessageRow } | { assignment: SequenceAssignment };
    try {
      outcome = this.db.transaction(
        (tx) => {
          const existing = tx
            .select()
            .from(messages)
            .where(eq(messages.messageId, message.id))
            .get();
          if (existing) {
            return { existing };
          }

          const assignment = this.sequencer.assign();
          tx.insert(messages)
            .values({
              sequence: assignment.sequence,
              messageId: message.id,
              sender: message.sender,
              content: message.content,
              createdAtMs: assignment.createdAtMs,
            })
            .run();
          return { assignment };
        },
        { behavior: 'immediate' },
      );
    } catch (error) {
      log.error({ err: error, messageId: message.id }, 'Insert failed');
      throw new StorageUnavailableError('insert', error, { messageId: message.id });
    }

    if ('existing' in outcome) {
      return { message: toChatMessage(outcome.existing), wasNew: false };
    }

    this.sequencer.confirm(outcome.assignment);
    return {
      message: { ...message, ...outcome.assignment },
      wasNew: true,
    };
  }

  async listAll(): Promise<ChatMessage[]> {
    return this.read('listAll', () =>
      this.db.select().from(messages).orderBy(asc(messages.sequence)).all(),
    );
  }

  async listSince(afterSequence: number): Promise<ChatMessage[]> {
    return this.read('listSince', () =>
      this.db
        .select()
        .from(messages)
        .where(gt(messages.sequence, afterSequence))
        .orderBy(asc(messages.sequence))
        .all(),
    );
  }

  async count(): Promise<number> {
    try {
      const row = this.db.select({ total: count() }).from(messages).get();
      return row?.total ?? 0;
    } catch (error) {
      throw new StorageUnavailableError('count', error);
    }
  }

  /** 已确认的最大序号（内存状态与库一致，无需查询） */
  async lastSequence(): Promise<number> {
    return this.sequencer.current.lastSequence;
  }

  private read(operation: string, query: () => MessageRow[]): ChatMessage[] {
    try {
      return query().map(toChatMessage);
    } catch (error) {
      log.error({ err: error }, `${operation} failed`);
      throw new StorageUnavailableError(operation, error);
    }
  }
}
