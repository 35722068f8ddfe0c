/**
 * Unbounded async queue with a single consumer. Producers (key handlers,
 * network tasks) `send`; the event loop drains it with `for await`.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly queue: T[] = [];
  private waiters: ((r: IteratorResult<T, undefined>) => void)[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false once the channel is closed; the value is dropped. */
  send(value: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) waiter({ value, done: false });
    else this.queue.push(value);
    return true;
  }

  /** Pending values are still delivered, then iteration ends. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const w of this.waiters) w({ value: undefined, done: true });
    this.waiters = [];
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.queue.length > 0) {
      const [value] = this.queue.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
