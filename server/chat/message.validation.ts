/**
 * 消息提交校验
 *
 * 上限来自配置（CHAT_MAX_*），因此 schema 由工厂函数按配置构建。
 * 未知字段直接忽略；content 原样保存，只在判断"是否为空"时 trim。
 */

import { z } from 'zod';
import { InvalidMessageError } from '../core/errors';
import type { SubmittedMessage } from './types';

export interface MessageLimits {
  maxIdLength: number;
  maxSenderLength: number;
  maxContentLength: number;
}

export const DEFAULT_MESSAGE_LIMITS: MessageLimits = {
  maxIdLength: 128,
  maxSenderLength: 100,
  maxContentLength: 4000,
};

/** 长度按 Unicode 码点计算，emoji 等代理对只算一个字符 */
function codePointLength(value: string): number {
  return [...value].length;
}

function atMost(max: number) {
  return (value: string) => codePointLength(value) <= max;
}

export function createMessageSchema(limits: MessageLimits = DEFAULT_MESSAGE_LIMITS) {
  return z.object({
    id: z
      .string({ required_error: 'id is required' })
      .min(1, 'id must not be empty')
      .refine(atMost(limits.maxIdLength), `id must be at most ${limits.maxIdLength} characters`),
    sender: z
      .string({ required_error: 'sender is required' })
      .trim()
      .min(1, 'sender must not be blank')
      .refine(atMost(limits.maxSenderLength), `sender must be at most ${limits.maxSenderLength} characters`),
    content: z
      .string({ required_error: 'content is required' })
      .min(1, 'content must not be empty')
      .refine(atMost(limits.maxContentLength), `content must be at most ${limits.maxContentLength} characters`)
      .refine((value) => value.trim().length > 0, 'content must not be blank'),
  });
}

export type MessageSchema = ReturnType<typeof createMessageSchema>;

export interface ValidationIssue {
  field: string;
  message: string;
}

/** 校验并规整提交内容；失败时抛出带逐字段问题列表的 InvalidMessageError */
export function parseSubmittedMessage(schema: MessageSchema, input: unknown): SubmittedMessage {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(body)',
    message: issue.message,
  }));
  throw new InvalidMessageError(
    issues.map((i) => `${i.field}: ${i.message}`).join('; '),
    { issues },
  );
}
