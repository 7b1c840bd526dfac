export type Clock = () => number;

export type ExpiringCacheOptions = {
  ttlMs: number;
  /** Upper bound on stored entries; the oldest insertion goes first once reached. */
  maxEntries?: number;
  now?: Clock;
};

type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

type LoadOptions<T> = {
  /** Return false to hand the loaded value back without storing it. */
  shouldStore?: (value: T) => boolean;
};

const DEFAULT_MAX_ENTRIES = 5000;

/**
 * In-memory key/value cache with a fixed time-to-live per entry.
 *
 * Expired entries are evicted lazily: `get` removes a stale entry when it finds one, and
 * nothing runs on a timer. `pruneExpired` is exposed for callers that want to bound memory
 * on their own schedule. Values are structured-cloned on the way in and out, so callers
 * never share a reference with the stored copy.
 */
export class ExpiringCache<T> {
  private readonly map = new Map<string, CacheEntry<T>>();
  private readonly inflight = new Map<string, Promise<T>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: Clock;
  private generation = 0;

  constructor(options: ExpiringCacheOptions) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
      throw new RangeError(`Cache TTL must be a positive number of milliseconds, got ${options.ttlMs}`);
    }
    const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`Cache maxEntries must be a positive integer, got ${maxEntries}`);
    }

    this.ttlMs = options.ttlMs;
    this.maxEntries = maxEntries;
    this.now = options.now ?? Date.now;
  }

  get(key: string): T | null {
    const hit = this.map.get(key);
    if (!hit) return null;
    if (this.now() > hit.expiresAt) {
      this.map.delete(key);
      return null;
    }
    return structuredClone(hit.value);
  }

  set(key: string, value: T): void {
    // Re-inserting moves the key to the back of the eviction order.
    this.map.delete(key);

    if (this.map.size >= this.maxEntries) {
      this.pruneExpired();
    }
    if (this.map.size >= this.maxEntries) {
      const oldestKey = this.map.keys().next().value;
      if (oldestKey !== undefined) {
        this.map.delete(oldestKey);
      }
    }

    this.map.set(key, { value: structuredClone(value), expiresAt: this.now() + this.ttlMs });
  }

  /**
   * Returns the cached value for `key`, or runs `loader` and stores its result.
   * Concurrent misses for the same key share one load. A rejected load is not stored,
   * and neither is a load that was started before the last `clear()`.
   */
  async getOrLoad(key: string, loader: () => Promise<T>, options: LoadOptions<T> = {}): Promise<T> {
    const cached = this.get(key);
    if (cached !== null) {
      return cached;
    }

    const pending = this.inflight.get(key);
    if (pending) {
      return structuredClone(await pending);
    }

    const generation = this.generation;
    const load = loader();
    this.inflight.set(key, load);
    try {
      const value = await load;
      const shouldStore = options.shouldStore ? options.shouldStore(value) : true;
      if (shouldStore && generation === this.generation) {
        this.set(key, value);
      }
      return structuredClone(value);
    } finally {
      if (this.inflight.get(key) === load) {
        this.inflight.delete(key);
      }
    }
  }

  clear(): void {
    this.map.clear();
    this.inflight.clear();
    this.generation += 1;
  }

  /** Number of live entries. Drops expired ones first. */
  size(): number {
    this.pruneExpired();
    return this.map.size;
  }

  /** Number of stored entries, expired or not. */
  storedCount(): number {
    return this.map.size;
  }

  pruneExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.map.entries()) {
      if (now > entry.expiresAt) {
        this.map.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}
