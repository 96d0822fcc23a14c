/**
 * In-process keyed lock
 * Callers holding overlapping key sets run one after another; disjoint sets run freely.
 */

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run fn while holding every key. Keys are taken in sorted order so two
   * callers with overlapping sets cannot deadlock.
   */
  async withLock<T>(keys: readonly string[], fn: () => Promise<T>): Promise<T> {
    const sorted = [...new Set(keys)].sort();
    const releases: Array<() => void> = [];

    try {
      for (const key of sorted) {
        releases.push(await this.acquire(key));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  /** Number of keys currently held or waited on */
  get size(): number {
    return this.tails.size;
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}
