/**
 * Event Channel
 *
 * Single-consumer async queue. A producer pushes synchronously (e.g. from a
 * stream fragment callback) and the consumer pulls with `for await`.
 * Items come out in push order; iteration ends after close() once the
 * queue is drained.
 */

export class EventChannel<T> implements AsyncIterableIterator<T> {
  private queue: T[] = [];
  private closed = false;
  private waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;

  push(item: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed channel');
    }
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: item, done: false });
      return;
    }
    this.queue.push(item);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.queue.length > 0) {
      const [item] = this.queue.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('EventChannel supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
