import type { ChatMessage } from '../types';

export function makeMessage(sequence: number, overrides: Partial<ChatMessage> = {}): ChatMessage {
  return {
    id: `m${sequence}`,
    sender: 'tester',
    content: `message ${sequence}`,
    sequence,
    createdAtMs: 1_000 + sequence,
    ...overrides,
  };
}

/** 读取 n 个元素后停止（不关闭源） */
export async function take<T>(source: AsyncIterable<T>, n: number): Promise<T[]> {
  const iterator = source[Symbol.asyncIterator]();
  const items: T[] = [];
  while (items.length < n) {
    const result = await iterator.next();
    if (result.done) break;
    items.push(result.value);
  }
  return items;
}

/** 读到结束；抛错时返回已读内容和错误 */
export async function drain<T>(source: AsyncIterable<T>): Promise<{ items: T[]; error?: unknown }> {
  const items: T[] = [];
  try {
    for await (const item of source) items.push(item);
    return { items };
  } catch (error) {
    return { items, error };
  }
}
