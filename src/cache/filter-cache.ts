export interface FilterCacheOptions {
  maxEntries: number;
  ttlMs: number;
  now?: () => number;
}

export interface CacheEntry<T> {
  key: string;
  value: T;
  insertedAt: number;
  expiresAt: number;
}

export interface FilterCacheStats {
  size: number;
  maxEntries: number;
  hits: number;
  misses: number;
  evictions: number;
}

/**
 * Bounded LRU cache with per-entry expiry.
 *
 * The backing Map's iteration order is the recency order: a hit re-inserts
 * the entry at the tail, so the head is always the least recently used.
 * Every operation is synchronous, which keeps capacity and recency checks
 * atomic with respect to other callers on the event loop.
 */
export class FilterCache<T = unknown[]> {
  private entries = new Map<string, CacheEntry<T>>();
  private inflight = new Map<string, Promise<T>>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private readonly now: () => number;

  constructor(private readonly options: FilterCacheOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${options.maxEntries}`);
    }
    this.now = options.now ?? Date.now;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    // Move to the tail: most recently used.
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  put(key: string, value: T, ttlMs = this.options.ttlMs): void {
    const now = this.now();

    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.options.maxEntries) {
      this.purgeExpired();
      if (this.entries.size >= this.options.maxEntries) {
        this.evictLeastRecentlyUsed();
      }
    }

    this.entries.set(key, { key, value, insertedAt: now, expiresAt: now + ttlMs });
  }

  /**
   * Returns the cached value, or runs `compute` once per key no matter how
   * many callers miss at the same time. Failures are not cached.
   */
  async getOrCompute(key: string, compute: () => Promise<T>, ttlMs?: number): Promise<{ value: T; fromCache: boolean }> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return { value: cached, fromCache: true };
    }

    let pending = this.inflight.get(key);
    if (!pending) {
      pending = compute()
        .then((value) => {
          this.put(key, value, ttlMs);
          return value;
        })
        .finally(() => {
          this.inflight.delete(key);
        });
      this.inflight.set(key, pending);
    }

    return { value: await pending, fromCache: false };
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && entry.expiresAt > this.now();
  }

  purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): FilterCacheStats {
    return {
      size: this.entries.size,
      maxEntries: this.options.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private evictLeastRecentlyUsed(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }
}
