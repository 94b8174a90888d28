export type Clock = () => number;

type Entry<V> = {
  value: V;
  expiresAt: number;
};

/**
 * Entry-count bounded cache with absolute per-entry expiry.
 * Map iteration order doubles as recency order: a hit re-inserts the key at the tail,
 * so the head is always the least recently used entry.
 */
export class LruCache<V> {
  private readonly entries = new Map<string, Entry<V>>();

  constructor(
    private readonly maxSize: number,
    private readonly now: Clock = Date.now
  ) {
    if (maxSize < 1) throw new Error("LruCache maxSize must be >= 1");
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  set(key: string, value: V, ttlSeconds: number): void {
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /** Sets only when no live entry exists; returns whether it wrote. */
  setIfAbsent(key: string, value: V, ttlSeconds: number): boolean {
    if (this.has(key)) return false;
    this.set(key, value, ttlSeconds);
    return true;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}
