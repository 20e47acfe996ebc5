/**
 * Per-key mutual exclusion
 *
 * Shared counters (emergency cohort high-water mark, per-date token counter)
 * are only mutated inside `withLock(key, fn)`. Calls for one key run one at a
 * time in arrival order; calls for different keys never wait on each other.
 *
 * @module core/keyed-lock
 */

export interface KeyedLock {
  /**
   * Execute a function while holding the lock for `key`.
   * The lock is released whether `fn` resolves or rejects.
   */
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

/**
 * Single-process lock that chains work per key.
 * Idle keys are dropped so the map only holds keys with queued work.
 */
export class InMemoryKeyedLock implements KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with work queued or running
   */
  get activeKeys(): number {
    return this.tails.size;
  }
}
