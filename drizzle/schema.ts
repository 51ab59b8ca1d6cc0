import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * 聊天消息表 — 只追加，不更新，不删除。
 * sequence 即提交顺序，同时作为 SSE 事件 id。
 */
export const messages = sqliteTable("messages", {
  /** 服务端分配的全局序号，从 1 开始、连续、严格递增 */
  sequence: integer("sequence").primaryKey(),
  /** 客户端生成的幂等键（通常为 UUID v7） */
  messageId: text("message_id").notNull().unique(),
  sender: text("sender").notNull(),
  content: text("content").notNull(),
  /** 服务端提交时间，毫秒时间戳；随 sequence 单调不减 */
  createdAtMs: integer("created_at_ms").notNull(),
});

export type MessageRow = typeof messages.$inferSelect;
