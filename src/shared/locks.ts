/**
 * Per-key mutual exclusion. Callers on the same key run one at a time in
 * arrival order; different keys never wait on each other.
 *
 * Not reentrant: calling `run` for a key from inside that key's scope deadlocks.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
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

  /** Acquire several keys in sorted order so overlapping callers cannot deadlock. */
  async runMany<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const acquire = (index: number): Promise<T> =>
      index === ordered.length ? fn() : this.run(ordered[index], () => acquire(index + 1));
    return acquire(0);
  }
}
