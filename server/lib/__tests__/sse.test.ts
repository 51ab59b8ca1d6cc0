/**
 * SSE 帧编码测试
 */
import { describe, it, expect } from 'vitest';
import { encodeSseComment, encodeSseEvent, parseLastEventId } from '../sse';

describe('encodeSseEvent', () => {
  it('消息帧：id + 单行 data + 空行', () => {
    expect(encodeSseEvent({ id: 3, data: '{"id":"a"}' })).toBe('id: 3\ndata: {"id":"a"}\n\n');
  });

  it('错误帧带 event 字段', () => {
    expect(encodeSseEvent({ event: 'error', data: 'listener overrun' })).toBe(
      'event: error\ndata: listener overrun\n\n',
    );
  });

  it('多行 data 拆成多个 data 行', () => {
    expect(encodeSseEvent({ data: 'line 1\nline 2\r\nline 3' })).toBe(
      'data: line 1\ndata: line 2\ndata: line 3\n\n',
    );
  });

  it('id 和 event 不允许换行', () => {
    expect(() => encodeSseEvent({ id: '1\n2', data: 'x' })).toThrow('SSE id must not contain line breaks');
    expect(() => encodeSseEvent({ event: 'a\nb', data: 'x' })).toThrow('SSE event must not contain line breaks');
  });
});

describe('encodeSseComment', () => {
  it('注释帧以冒号开头', () => {
    expect(encodeSseComment('keep-alive')).toBe(': keep-alive\n\n');
  });
});

describe('parseLastEventId', () => {
  it.each([
    ['12', 12],
    [' 7 ', 7],
    ['0', 0],
  ])('"%s" → %d', (input, expected) => {
    expect(parseLastEventId(input)).toBe(expected);
  });

  it.each([undefined, '', 'abc', '-1', '1.5', '99999999999999999999'])('%s → undefined', (input) => {
    expect(parseLastEventId(input)).toBeUndefined();
  });
});
