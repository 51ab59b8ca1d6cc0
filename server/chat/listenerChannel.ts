/**
 * 有界单消费者通道
 *
 * 生产者 offer() 永不阻塞：缓冲区满时返回 false，由调用方决定如何处置。
 * 关闭后消费者先取完已缓冲的元素，再结束迭代（或抛出关闭原因）。
 */

export class ListenerChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiting: ((result: IteratorResult<T>) => void) | null = null;
  private rejectWaiting: ((error: Error) => void) | null = null;
  private ended = false;
  private failure: Error | null = null;
  private readonly resolveClosed: () => void;

  /** 通道关闭时兑现（无论正常还是带错误） */
  readonly closed: Promise<void>;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    let resolveClosed: () => void = () => undefined;
    this.closed = new Promise((resolve) => {
      resolveClosed = resolve;
    });
    this.resolveClosed = resolveClosed;
  }

  get isClosed(): boolean {
    return this.ended;
  }

  get buffered(): number {
    return this.buffer.length;
  }

  offer(value: T): boolean {
    if (this.ended) return false;

    if (this.waiting) {
      const deliver = this.waiting;
      this.waiting = null;
      this.rejectWaiting = null;
      deliver({ value, done: false });
      return true;
    }

    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push(value);
    return true;
  }

  /** 幂等；带 error 时消费者取完缓冲后收到该错误 */
  close(error?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = error ?? null;
    this.resolveClosed();

    if (this.waiting && this.rejectWaiting) {
      const deliver = this.waiting;
      const reject = this.rejectWaiting;
      this.waiting = null;
      this.rejectWaiting = null;
      if (this.failure) {
        reject(this.failure);
      } else {
        deliver({ value: undefined, done: true });
      }
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.ended) {
      return this.failure
        ? Promise.reject(this.failure)
        : Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiting) {
      return Promise.reject(new Error('ListenerChannel supports a single pending reader'));
    }
    return new Promise((resolve, reject) => {
      this.waiting = resolve;
      this.rejectWaiting = reject;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
