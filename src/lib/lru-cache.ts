/**
 * LRU Cache Utility
 *
 * Bounded least-recently-used cache used for resolver lookups, parsed
 * template bodies and parsed Lua chunks. Each worker owns its caches, so
 * nothing here is shared across pages running in different pool lanes.
 *
 * @module lib/lru-cache
 */

/**
 * Configuration options for LRUCache
 */
export interface LRUCacheOptions<K = string, V = unknown> {
  /** Maximum number of entries the cache can hold */
  maxSize: number;
  /** Maximum total size (requires sizeCalculator) */
  maxBytes?: number;
  /** Optional callback when an entry is evicted */
  onEvict?: ((key: K, value: V) => void) | undefined;
  /** Size of a value, in whatever unit maxBytes is expressed */
  sizeCalculator?: ((value: V) => number) | undefined;
}

/** Hit/miss counters and occupancy */
export interface LRUCacheStats {
  size: number;
  capacity: number;
  bytes: number;
  hits: number;
  misses: number;
}

/**
 * LRU Cache implementation using Map's insertion order
 *
 * On each access the entry is deleted and re-inserted to move it to the
 * end; eviction removes entries from the beginning.
 *
 * @example
 * ```typescript
 * const cache = new LRUCache<string, Chunk>({ maxSize: 256 });
 * const chunk = cache.getOrCompute(source, () => parseChunk(source));
 * ```
 */
export class LRUCache<K = string, V = unknown> {
  private readonly maxSize: number;
  private readonly maxBytes: number;
  private readonly cache = new Map<K, { value: V; size: number }>();
  private readonly onEvict: ((key: K, value: V) => void) | undefined;
  private readonly sizeCalculator: ((value: V) => number) | undefined;
  private currentBytes = 0;
  private hits = 0;
  private misses = 0;

  constructor(options: LRUCacheOptions<K, V> | number) {
    if (typeof options === 'number') {
      this.maxSize = options;
      this.maxBytes = Infinity;
      this.onEvict = undefined;
      this.sizeCalculator = undefined;
    } else {
      this.maxSize = options.maxSize;
      this.maxBytes = options.maxBytes ?? Infinity;
      this.onEvict = options.onEvict;
      this.sizeCalculator = options.sizeCalculator;
    }

    if (this.maxSize < 1) {
      throw new Error('LRUCache maxSize must be at least 1');
    }
  }

  /**
   * Get a value and mark it as recently used
   */
  get(key: K): V | undefined {
    const entry = this.touch(key);
    return entry?.value;
  }

  /**
   * Return the cached value for `key`, computing and storing it on a miss.
   * Works for caches whose values may be `undefined` or `null`.
   */
  getOrCompute(key: K, compute: () => V): V {
    const entry = this.touch(key);
    if (entry) return entry.value;
    const value = compute();
    this.set(key, value);
    return value;
  }

  /**
   * Set a value, evicting least recently used entries when full
   */
  set(key: K, value: V): this {
    const size = this.sizeCalculator ? this.sizeCalculator(value) : 0;

    const existing = this.cache.get(key);
    if (existing) {
      this.currentBytes -= existing.size;
      this.cache.delete(key);
    }

    while (
      this.cache.size > 0 &&
      (this.cache.size >= this.maxSize || this.currentBytes + size > this.maxBytes)
    ) {
      this.evictOldest();
    }

    this.cache.set(key, { value, size });
    this.currentBytes += size;
    return this;
  }

  /**
   * Check if a key exists. Does not update recency.
   */
  has(key: K): boolean {
    return this.cache.has(key);
  }

  delete(key: K): boolean {
    const entry = this.cache.get(key);
    if (!entry) return false;
    this.cache.delete(key);
    this.currentBytes -= entry.size;
    this.onEvict?.(key, entry.value);
    return true;
  }

  clear(): void {
    if (this.onEvict) {
      for (const [key, entry] of this.cache) {
        this.onEvict(key, entry.value);
      }
    }
    this.cache.clear();
    this.currentBytes = 0;
  }

  get size(): number {
    return this.cache.size;
  }

  get capacity(): number {
    return this.maxSize;
  }

  getStats(): LRUCacheStats {
    return {
      size: this.cache.size,
      capacity: this.maxSize,
      bytes: this.currentBytes,
      hits: this.hits,
      misses: this.misses,
    };
  }

  /**
   * Look up an entry, count the hit or miss, and move it to the end
   */
  private touch(key: K): { value: V; size: number } | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry;
  }

  private evictOldest(): void {
    const next = this.cache.entries().next();
    if (next.done) return;
    const [oldestKey, entry] = next.value;
    this.cache.delete(oldestKey);
    this.currentBytes -= entry.size;
    this.onEvict?.(oldestKey, entry.value);
  }
}
