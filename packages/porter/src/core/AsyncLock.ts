/**
 * Serializes async sections in this process. Waiters run in arrival order.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private held = 0;

  get pending(): number {
    return this.held;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => turn);
    this.held++;

    await previous;
    try {
      return await fn();
    } finally {
      this.held--;
      release();
    }
  }
}
