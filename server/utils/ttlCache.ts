/**
 * TtlCache - size-bounded map whose entries expire after a fixed TTL.
 *
 * Map insertion order doubles as recency order: reads re-insert the entry,
 * so the first key is always the least recently used one.
 */
export interface TtlCacheOptions {
  maxSize: number;
  ttlMs: number;
  /** clock override for tests */
  now?: () => number;
}

interface Entry<V> {
  value: V;
  expiresAt: number;
}

export class TtlCache<K, V> {
  private readonly entries = new Map<K, Entry<V>>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: TtlCacheOptions) {
    this.maxSize = Math.max(1, opts.maxSize);
    this.ttlMs = opts.ttlMs;
    this.now = opts.now ?? Date.now;
  }

  get(key: K): V | undefined {
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

  set(key: K, value: V): this {
    this.entries.delete(key);
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
    return this;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Cached value, or the loader's result. Only results accepted by
   * `shouldCache` are stored (by default anything but null/undefined).
   */
  async getOrLoad(
    key: K,
    load: () => Promise<V>,
    shouldCache: (value: V) => boolean = (value) => value !== null && value !== undefined
  ): Promise<V> {
    const hit = this.get(key);
    if (hit !== undefined) return hit;

    const value = await load();
    if (shouldCache(value)) {
      this.set(key, value);
    }
    return value;
  }
}
