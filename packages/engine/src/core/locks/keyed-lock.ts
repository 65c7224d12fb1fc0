/**
 * Per-key async lock
 *
 * Operations sharing a key run one after another in call order; different
 * keys do not wait on each other. Used to serialize game closure against
 * transaction replacement for the same game.
 */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      // Drop the entry once nobody queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
