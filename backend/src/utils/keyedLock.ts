/**
 * Serializes async work per key inside one process. Callers for the same key
 * run one after another in arrival order; different keys never wait on each
 * other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  public async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
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

  public get size(): number {
    return this.tails.size;
  }
}
