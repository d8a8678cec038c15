/**
 * Promise-chain mutex
 *
 * Callers queue behind the previous holder; the critical section runs
 * only after every earlier one has settled.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
