/**
 * FIFO mutex over a promise chain. Callers run one at a time in call order;
 * a rejected callback releases the lock like a resolved one.
 */
export class AsyncLock {
  private pending: Promise<void> = Promise.resolve();

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.pending;
    let release: () => void = () => undefined;

    this.pending = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
