/**
 * Per-key async mutex.
 *
 * Each key holds the tail of a promise chain; `lock` waits for the
 * current tail and installs its own release as the new one. Keys with no
 * waiters are dropped so the map stays bounded by in-flight work.
 */
export class KeyedMutex {
  private readonly tails: Map<string, Promise<void>> = new Map();

  /** Resolves with a release function once `key` is free. */
  async lock(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
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

  /**
   * Runs `work` holding every key. Keys are taken in sorted order so two
   * callers sharing keys can never wait on each other in a cycle.
   */
  async runExclusive<T>(keys: readonly string[], work: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const releases: (() => void)[] = [];

    try {
      for (const key of ordered) {
        releases.push(await this.lock(key));
      }
      return await work();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  /** Number of keys currently held or awaited, for tests. */
  get size(): number {
    return this.tails.size;
  }
}
