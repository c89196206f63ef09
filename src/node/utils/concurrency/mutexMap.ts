/**
 * Keyed async mutex.
 *
 * Operations sharing a key run one after another in call order; operations on
 * different keys run independently. A failed operation releases the lock and
 * its error reaches only its own caller.
 */
export class MutexMap<K> {
  private readonly tails = new Map<K, Promise<void>>();

  async withLock<T>(key: K, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
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
      // Drop the entry once nothing else queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Resolves once every operation queued so far for `key` has finished. */
  async drain(key: K): Promise<void> {
    await this.tails.get(key);
  }

  isLocked(key: K): boolean {
    return this.tails.has(key);
  }
}
