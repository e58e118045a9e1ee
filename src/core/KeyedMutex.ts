/**
 * One holder at a time per key; waiters run in arrival order.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  public async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = prev.then(() => current);
    this.tails.set(key, tail);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  public isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
