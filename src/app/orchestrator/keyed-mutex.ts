/**
 * Per-key mutual exclusion.
 * Purpose: one in-flight sync per package while unrelated packages run in parallel.
 * Assumptions: single process; callers release through `runExclusive` only.
 * Usage: await locks.runExclusive(spec.name, () => syncOne(spec)).
 */

export class KeyedMutex {
  // Tail of the wait chain per key; removed once the last holder releases.
  private readonly tails = new Map<string, Promise<void>>();

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
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
}
