/**
 * WriteQueue 单元测试
 */
import { describe, it, expect } from 'vitest';
import { ErrorCode, isAppError } from '../../core/errors';
import { WriteQueue } from '../writeQueue';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('WriteQueue', () => {
  it('任务串行执行，不会交叠', async () => {
    const queue = new WriteQueue();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([queue.run(task('a')), queue.run(task('b')), queue.run(task('c'))]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('失败只影响自己的调用方', async () => {
    const queue = new WriteQueue();
    const failing = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(() => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
    expect(queue.size).toBe(0);
  });

  it('drain 等待已入队任务并拒绝新任务', async () => {
    const queue = new WriteQueue();
    let finished = false;
    const running = queue.run(async () => {
      await tick();
      finished = true;
    });

    await queue.drain();
    expect(finished).toBe(true);
    await running;

    const rejected = await queue.run(() => 1).catch((err: unknown) => err);
    expect(isAppError(rejected) && rejected.code).toBe(ErrorCode.SERVICE_UNAVAILABLE);
  });
});
