/**
 * Single-writer lock. Critical sections run one at a time in submission
 * order; a failing section releases the lock for the next one.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async run<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => { release = resolve; });
    this.pending++;
    try {
      await previous;
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  /** Sections queued or running. */
  status() {
    return { pending: this.pending, locked: this.pending > 0 };
  }
}
