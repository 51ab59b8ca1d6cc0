/**
 * Server-Sent Events 帧编码
 *
 *   id: 3
 *   data: {"id":"...","sender":"...","content":"...","timestamp_ms":...}
 *   <空行>
 *
 * data 中的换行拆成多行 data:，由浏览器 EventSource 重新拼接。
 */

export const SSE_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  'Cache-Control': 'no-cache, no-transform',
  Connection: 'keep-alive',
  // 关闭 nginx 等反向代理的响应缓冲
  'X-Accel-Buffering': 'no',
};

export interface SseEvent {
  id?: string | number;
  event?: string;
  data: string;
}

function assertSingleLine(field: string, value: string): void {
  if (/[\r\n]/.test(value)) {
    throw new Error(`SSE ${field} must not contain line breaks`);
  }
}

export function encodeSseEvent(event: SseEvent): string {
  let frame = '';
  if (event.id !== undefined) {
    const id = String(event.id);
    assertSingleLine('id', id);
    frame += `id: ${id}\n`;
  }
  if (event.event !== undefined) {
    assertSingleLine('event', event.event);
    frame += `event: ${event.event}\n`;
  }
  for (const line of event.data.split(/\r\n|\r|\n/)) {
    frame += `data: ${line}\n`;
  }
  return frame + '\n';
}

/** 注释帧，客户端忽略，用作心跳保活 */
export function encodeSseComment(text: string): string {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => `: ${line}\n`)
    .join('') + '\n';
}

/**
 * 解析 Last-Event-ID（头部或 lastEventId 查询参数）。
 * 只接受非负整数；其他值视为未提供。
 */
export function parseLastEventId(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}
