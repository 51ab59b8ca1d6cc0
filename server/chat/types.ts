/**
 * 聊天核心类型
 */

/** 客户端提交的消息（未校验前的形状由 zod schema 保证） */
export interface SubmittedMessage {
  /** 客户端生成的唯一标识，用作幂等键；重试时必须复用 */
  id: string;
  sender: string;
  content: string;
}

/** 已提交的消息：提交后不可变 */
export interface ChatMessage extends SubmittedMessage {
  /** 服务端分配的全局序号（从 1 开始、连续） */
  sequence: number;
  /** 服务端提交时间，毫秒时间戳 */
  createdAtMs: number;
}

export interface InsertOutcome {
  message: ChatMessage;
  /** false 表示 id 已存在，返回的是最初提交的那条消息 */
  wasNew: boolean;
}

/** 事件流中每条消息的对外 JSON 形状 */
export interface WireMessage {
  id: string;
  sender: string;
  content: string;
  timestamp_ms: number;
}

export function toWireMessage(message: ChatMessage): WireMessage {
  return {
    id: message.id,
    sender: message.sender,
    content: message.content,
    timestamp_ms: message.createdAtMs,
  };
}
