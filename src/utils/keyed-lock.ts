/**
 * Keyed lock
 *
 * FIFO mutual exclusion per string key. `acquire` takes several keys at once
 * in sorted order so two callers locking overlapping key sets cannot deadlock.
 *
 * Usage:
 * ```typescript
 * const release = await locks.acquire(['venue:1', 'material:7']);
 * try {
 *   // check-then-act
 * } finally {
 *   release();
 * }
 * ```
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async acquire(keys: readonly string[]): Promise<() => void> {
    const ordered = [...new Set(keys)].sort();
    const releases: Array<() => void> = [];

    for (const key of ordered) {
      releases.push(await this.acquireOne(key));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      for (const release of releases.reverse()) {
        release();
      }
    };
  }

  /**
   * Number of keys currently held or waited on
   */
  get size(): number {
    return this.tails.size;
  }

  private async acquireOne(key: string): Promise<() => void> {
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
