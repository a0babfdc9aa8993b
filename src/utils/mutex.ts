// Promise-chain mutex
// Callers queue in FIFO order; the lock is released even when the critical section throws.

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get isLocked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(critical: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => current);

    await previous;
    this.holders++;
    try {
      return await critical();
    } finally {
      this.holders--;
      release();
    }
  }
}
