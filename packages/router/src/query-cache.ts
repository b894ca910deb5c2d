/**
 * Bounded in-memory LRU cache for query results.
 *
 * Entries live in a Map in recency order: reads move an entry to the end,
 * and when the cache is full the first (least recently used) entry goes.
 * With a TTL, entries older than `ttlMs` are treated as absent.
 */

const DEFAULT_MAX_ENTRIES = 1000;

export interface QueryCacheOptions {
  /** @default 1000 */
  maxEntries?: number;

  /** Entry lifetime in milliseconds; no expiry when omitted */
  ttlMs?: number;

  /** Millisecond clock, for tests */
  now?: () => number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
  size: number;
  maxEntries: number;
}

interface Entry<T> {
  value: T;
  storedAt: number;
}

/**
 * Example:
 * ```typescript
 * const cache = new QueryCache<BarRow[]>({ maxEntries: 500, ttlMs: 60_000 });
 *
 * cache.set(key, rows);
 * cache.get(key); // rows, now most recently used
 * ```
 */
export class QueryCache<T> {
  private entries = new Map<string, Entry<T>>();
  private maxEntries: number;
  private ttlMs: number | undefined;
  private now: () => number;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(options: QueryCacheOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      this.misses += 1;
      return undefined;
    }

    if (this.ttlMs !== undefined && this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      this.expirations += 1;
      this.misses += 1;
      return undefined;
    }

    // Move to end (most recently used)
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits += 1;
    return entry.value;
  }

  set(key: string, value: T): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next().value;
      if (oldest !== undefined) {
        this.entries.delete(oldest);
        this.evictions += 1;
      }
    }

    this.entries.set(key, { value, storedAt: this.now() });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drop every entry. Counters are kept.
   */
  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
      size: this.entries.size,
      maxEntries: this.maxEntries,
    };
  }
}
