/**
 * Per-owner exclusive lock
 *
 * Work for one owner runs strictly one after another; work for different
 * owners never waits on each other. A task that throws releases the lock
 * just like one that returns.
 */
export class OwnerLock {
  private tails: Map<string, Promise<void>> = new Map();

  async run<T>(ownerId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(ownerId) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(ownerId, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      // Last one out removes the entry
      if (this.tails.get(ownerId) === tail) {
        this.tails.delete(ownerId);
      }
    }
  }

  /**
   * Number of owners with work queued or running
   */
  get size(): number {
    return this.tails.size;
  }
}
