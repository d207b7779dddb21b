/**
 * In-process cache with absolute expiration and a bounded item count
 */

interface CacheItem<T> {
  data: T;
  timestamp: number;
  expiration: number;
}

export interface MemoryCacheOptions {
  /** Oldest items are evicted beyond this count */
  maxItems: number;

  /** Time to live when `set` is not given one (milliseconds) */
  defaultTtl: number;

  /** How often expired items are swept (milliseconds); 0 disables the sweep */
  cleanupInterval: number;

  clock: () => number;
}

export interface CacheStats {
  items: number;
  hits: number;
  misses: number;
  evictions: number;
}

export class MemoryCache<T> {
  private options: MemoryCacheOptions;
  private cache: Map<string, CacheItem<T>> = new Map();
  private pending: Map<string, Promise<T>> = new Map();
  private cleanupTimer: NodeJS.Timeout | null = null;
  private stats = { hits: 0, misses: 0, evictions: 0 };

  constructor(options: Partial<MemoryCacheOptions> = {}) {
    this.options = {
      maxItems: 1000,
      defaultTtl: 300000,
      cleanupInterval: 60000,
      clock: Date.now,
      ...options
    };

    if (this.options.cleanupInterval > 0) {
      this.startCleanup();
    }
  }

  get(key: string): T | undefined {
    const item = this.cache.get(key);

    if (!item) {
      this.stats.misses++;
      return undefined;
    }

    const now = this.options.clock();
    if (now >= item.expiration) {
      this.cache.delete(key);
      this.stats.misses++;
      return undefined;
    }

    this.stats.hits++;
    return item.data;
  }

  set(key: string, data: T, ttl?: number): void {
    const now = this.options.clock();

    // Replacing a key does not count against the limit
    this.cache.delete(key);
    while (this.cache.size >= this.options.maxItems && this.cache.size > 0) {
      this.evictOldestItem();
    }

    this.cache.set(key, {
      data,
      timestamp: now,
      expiration: now + (ttl ?? this.options.defaultTtl)
    });
  }

  /**
   * Return the cached value, or create, store and return it.
   * Callers arriving while a value is being created share that creation
   * and see it as a hit. Failed factories leave nothing behind.
   */
  async getOrCreate(key: string, factory: () => Promise<T>, ttl?: number): Promise<{ value: T; hit: boolean }> {
    const inFlight = this.pending.get(key);
    if (inFlight) {
      return { value: await inFlight, hit: true };
    }

    const cached = this.get(key);
    if (cached !== undefined) {
      return { value: cached, hit: true };
    }

    const creation = factory();
    this.pending.set(key, creation);
    try {
      const value = await creation;
      this.set(key, value, ttl);
      return { value, hit: false };
    } finally {
      this.pending.delete(key);
    }
  }

  has(key: string): boolean {
    const item = this.cache.get(key);
    return item !== undefined && this.options.clock() < item.expiration;
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  getStats(): CacheStats {
    return { items: this.cache.size, ...this.stats };
  }

  /**
   * Drop every expired item
   */
  cleanup(): number {
    const now = this.options.clock();
    let removed = 0;

    for (const [key, item] of this.cache) {
      if (now >= item.expiration) {
        this.cache.delete(key);
        removed++;
      }
    }

    return removed;
  }

  dispose(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.cache.clear();
    this.pending.clear();
  }

  private evictOldestItem(): void {
    let oldestKey: string | undefined;
    let oldestTimestamp = Infinity;

    for (const [key, item] of this.cache) {
      if (item.timestamp < oldestTimestamp) {
        oldestTimestamp = item.timestamp;
        oldestKey = key;
      }
    }

    if (oldestKey !== undefined) {
      this.cache.delete(oldestKey);
      this.stats.evictions++;
    }
  }

  private startCleanup(): void {
    this.cleanupTimer = setInterval(() => this.cleanup(), this.options.cleanupInterval);
    this.cleanupTimer.unref();
  }
}
