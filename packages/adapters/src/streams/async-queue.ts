/**
 * Unbounded push-to-pull bridge: producers `push`, one consumer iterates with
 * `for await`. `end()` finishes iteration after the buffered items drain;
 * `fail()` rejects the pending or next read. `onReturn` runs when the consumer
 * stops early (a `break` out of `for await`, or an explicit `return()`).
 */
export class AsyncQueue<T> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<{
    resolve: (result: IteratorResult<T, undefined>) => void;
    reject: (err: Error) => void;
  }> = [];
  private ended = false;
  private error: Error | null = null;

  constructor(private readonly onReturn?: () => void) {}

  get closed(): boolean {
    return this.ended || this.error !== null;
  }

  push(item: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
  }

  end(): void {
    if (this.closed) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  fail(err: Error): void {
    if (this.closed) return;
    this.error = err;
    for (const waiter of this.waiters.splice(0)) waiter.reject(err);
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item !== undefined) return Promise.resolve({ value: item, done: false });
    if (this.error) return Promise.reject(this.error);
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  return(): Promise<IteratorResult<T, undefined>> {
    const wasOpen = !this.closed;
    this.buffer.length = 0;
    this.end();
    if (wasOpen) this.onReturn?.();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
