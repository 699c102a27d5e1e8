/**
 * Serializes async work per key. Calls for the same key run one after another
 * in arrival order; calls for different keys never wait on each other.
 */
export class KeyedLock {
  private locks: Map<string, Promise<void>> = new Map();

  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const pending = this.locks.get(key) || Promise.resolve();

    let release: () => void = () => undefined;
    const next = new Promise<void>(resolve => { release = resolve; });
    this.locks.set(key, next);

    try {
      await pending;
      return await fn();
    } finally {
      release();
      if (this.locks.get(key) === next) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }
}
