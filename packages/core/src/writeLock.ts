/**
 * Serializes index mutations. Each caller waits for the previous holder to
 * finish, including any file I/O it performs while holding the lock.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;

    // The executor runs synchronously, so `release` is assigned before `finally`.
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    this.tail = previous.then(() => next);
    this.pending += 1;

    await previous;
    try {
      return await fn();
    } finally {
      this.pending -= 1;
      release();
    }
  }

  /** Number of holders and waiters. */
  get queued(): number {
    return this.pending;
  }
}
