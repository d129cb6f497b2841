type Waiter<T> = {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
};

/**
 * Unbounded single-consumer channel. Workers `push`, the consumer awaits
 * `take()`; `close()` ends the stream once the buffer drains and `fail()`
 * surfaces an error to the consumer after buffered items.
 */
export class AsyncChannel<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;

  push(item: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed channel');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value: item });
      return;
    }
    this.buffer.push(item);
  }

  close(): void {
    this.closed = true;
    this.flushWaiters();
  }

  fail(error: unknown): void {
    this.failure = { error };
    this.close();
  }

  take(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ done: false, value: item });
    }
    if (this.closed) {
      return this.failure
        ? Promise.reject(this.failure.error)
        : Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private flushWaiters(): void {
    while (this.waiters.length > 0) {
      const waiter = this.waiters.shift();
      if (!waiter) {
        break;
      }
      if (this.failure) {
        waiter.reject(this.failure.error);
      } else {
        waiter.resolve({ done: true, value: undefined });
      }
    }
  }
}
