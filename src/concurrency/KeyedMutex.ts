export type Release = () => void;

/**
 * Per-key mutual exclusion. `lock` queues behind the current holder;
 * `tryLock` gives up immediately when the key is held. Keys are independent.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys currently held or queued on. */
  get size(): number {
    return this.tails.size;
  }

  tryLock(key: string): Release | undefined {
    if (this.tails.has(key)) return undefined;
    let unlock: () => void = () => {};
    const tail = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    this.tails.set(key, tail);
    return this.releaser(key, tail, unlock);
  }

  async lock(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let unlock: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    await previous;
    return this.releaser(key, tail, unlock);
  }

  async runExclusive<R>(key: string, fn: () => Promise<R>): Promise<R> {
    const release = await this.lock(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(key: string, tail: Promise<void>, unlock: () => void): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      unlock();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }
}
