/**
 * Status Channel
 *
 * Unbounded queue carrying events from a running conversion to whoever
 * observes it. The producer never waits; the consumer either polls on its
 * own schedule or iterates asynchronously.
 */

export class StatusChannel<T extends object> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }

  push(item: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed status channel');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return;
    }
    this.queue.push(item);
  }

  /**
   * Take everything queued so far without waiting
   */
  poll(): T[] {
    const drained = this.queue;
    this.queue = [];
    return drained;
  }

  /**
   * No more events will follow. Queued events stay readable.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.queue.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
