export type Release = () => void;

/** Per-key FIFO mutex; waiters on one key are granted in the order they called acquire. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<Release> {
    const previousTail = this.tails.get(key) ?? Promise.resolve();

    let releaseCurrent: (() => void) | null = null;
    const current = new Promise<void>((resolve) => {
      releaseCurrent = resolve;
    });

    const nextTail = previousTail.then(() => current);
    this.tails.set(key, nextTail);
    await previousTail;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      releaseCurrent?.();
      if (this.tails.get(key) === nextTail) {
        this.tails.delete(key);
      }
    };
  }

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
