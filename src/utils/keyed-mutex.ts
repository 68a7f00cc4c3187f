/**
 * Promise-chain lock keyed by string.
 *
 * Waiters for the same key run one at a time, in the order they asked.
 * Different keys never block each other.
 */

export type Release = () => void;

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Wait for the key and return the function that frees it.
   * The release function is idempotent.
   */
  async acquire(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) {return;}
      released = true;
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
      unlock();
    };
  }

  /** Run `fn` while holding the key. */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** True while someone holds or waits for the key. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
