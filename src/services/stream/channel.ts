// Stream channel
// Unbounded single-producer/single-consumer FIFO between a background
// producer and a foreground consumer. Closing from the consumer side is the
// cancellation signal: the next push fails and the producer stops.

export type StreamEvent =
  | { type: 'chunk'; text: string }
  | { type: 'error'; message: string }
  | { type: 'complete' };

type Waiter<T> = (item: T | undefined) => void;

export class StreamChannel<T> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waiter: Waiter<T> | null = null;
  private finished = false;
  private closed = false;
  private closeListeners: Array<() => void> = [];

  /** Producer side. Returns false once the consumer has gone away. */
  push(item: T): boolean {
    if (this.closed || this.finished) return false;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return true;
    }

    this.queue.push(item);
    return true;
  }

  /** Producer side: no more items will be pushed. */
  finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.wake();
  }

  /** Consumer side: disconnect. Queued items are dropped. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    this.wake();
    const listeners = this.closeListeners;
    this.closeListeners = [];
    for (const listener of listeners) listener();
  }

  /** Producer side: be told about a disconnect without waiting for a failed push. */
  onClose(listener: () => void): void {
    if (this.closed) {
      listener();
      return;
    }
    this.closeListeners.push(listener);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** True once nothing is queued and nothing more can arrive. */
  get isDone(): boolean {
    return this.closed || (this.finished && this.queue.length === 0);
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Non-blocking poll. `undefined` only means "nothing right now". */
  tryReceive(): T | undefined {
    return this.queue.shift();
  }

  /** Everything currently queued, in order. */
  drain(): T[] {
    const items = this.queue;
    this.queue = [];
    return items;
  }

  /** Await the next item; `undefined` once the channel is done. */
  receive(): Promise<T | undefined> {
    if (this.queue.length > 0) {
      return Promise.resolve(this.queue.shift());
    }
    if (this.isDone) {
      return Promise.resolve(undefined);
    }
    if (this.waiter) {
      return Promise.reject(new Error('StreamChannel supports a single consumer'));
    }
    return new Promise<T | undefined>(resolve => {
      this.waiter = resolve;
    });
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const item = await this.receive();
      if (item === undefined) return;
      yield item;
    }
  }

  private wake(): void {
    if (!this.waiter) return;
    const resolve = this.waiter;
    this.waiter = null;
    resolve(undefined);
  }
}
