/**
 * Result Cache
 *
 * In-memory TTL cache for finished wallet analyses. Entries expire lazily on
 * read; when full, the entry created first is evicted to make room (creation
 * order, not recency of use).
 */

import { serviceLoggers } from "../utils/logger";

/**
 * Configuration options for the cache
 */
export interface ResultCacheConfig {
  /**
   * When false, get always misses and set does nothing
   * @default true
   */
  enabled?: boolean;

  /**
   * Default TTL in seconds
   * @default 300 (5 minutes)
   */
  ttlSeconds?: number;

  /**
   * Maximum number of entries
   * @default 1000
   */
  maxSize?: number;
}

/**
 * Cache entry with value and metadata
 */
export interface CacheEntry<T> {
  /** The cached value */
  value: T;

  /** Timestamp (ms) when the entry was created */
  createdAt: number;

  /** TTL in seconds used for this entry */
  ttl: number;
}

/**
 * Cache statistics
 */
export interface ResultCacheStats {
  enabled: boolean;
  size: number;
  maxSize: number;
  /** Default TTL in seconds */
  ttl: number;
  /** size / maxSize, between 0 and 1 */
  utilization: number;
}

const DEFAULT_CONFIG: Required<ResultCacheConfig> = {
  enabled: true,
  ttlSeconds: 300,
  maxSize: 1000,
};

/**
 * Cache key for a wallet analysis
 */
export function analysisCacheKey(address: string): string {
  return `analysis:${address}`;
}

/**
 * An entry is expired once strictly more than its TTL has passed
 */
export function isExpired<T>(entry: CacheEntry<T>, now: number = Date.now()): boolean {
  return now - entry.createdAt > entry.ttl * 1000;
}

/**
 * Bounded TTL cache
 *
 * @example
 * ```typescript
 * const cache = new ResultCache<WalletAnalysis>({ ttlSeconds: 300, maxSize: 1000 });
 * cache.set(analysisCacheKey(address), analysis);
 * const hit = cache.get(analysisCacheKey(address));
 * ```
 */
export class ResultCache<T> {
  private readonly config: Required<ResultCacheConfig>;
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(config: ResultCacheConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.maxSize < 1) {
      throw new RangeError(`maxSize must be at least 1, got: ${this.config.maxSize}`);
    }
  }

  /**
   * Get a live value; an expired entry is removed and reported as a miss
   */
  get(key: string): T | undefined {
    if (!this.config.enabled) {
      return undefined;
    }

    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (isExpired(entry)) {
      this.entries.delete(key);
      serviceLoggers.cache.debug("Cache entry expired", { key });
      return undefined;
    }

    serviceLoggers.cache.debug("Cache hit", { key });
    return entry.value;
  }

  /**
   * Store a value, evicting the oldest-created entry when at capacity
   */
  set(key: string, value: T, ttlSeconds: number = this.config.ttlSeconds): void {
    if (!this.config.enabled) {
      return;
    }

    if (!this.entries.has(key) && this.entries.size >= this.config.maxSize) {
      this.evictOldest();
    }

    this.entries.set(key, { value, createdAt: Date.now(), ttl: ttlSeconds });
    serviceLoggers.cache.debug("Cache set", { key, ttl: ttlSeconds });
  }

  /**
   * Remove one entry; returns whether it existed
   */
  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
    serviceLoggers.cache.info("Cache cleared");
  }

  /**
   * Remove all expired entries
   * @returns Number of entries removed
   */
  cleanupExpired(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      serviceLoggers.cache.debug("Removed expired cache entries", { removed });
    }
    return removed;
  }

  /**
   * Current statistics; expired entries are swept first
   */
  getStats(): ResultCacheStats {
    this.cleanupExpired();
    return {
      enabled: this.config.enabled,
      size: this.entries.size,
      maxSize: this.config.maxSize,
      ttl: this.config.ttlSeconds,
      utilization: this.entries.size / this.config.maxSize,
    };
  }

  /**
   * Number of stored entries, expired ones included
   */
  get size(): number {
    return this.entries.size;
  }

  private evictOldest(): void {
    let oldestKey: string | undefined;
    let oldestCreatedAt = Infinity;

    for (const [key, entry] of this.entries) {
      if (entry.createdAt < oldestCreatedAt) {
        oldestCreatedAt = entry.createdAt;
        oldestKey = key;
      }
    }

    if (oldestKey !== undefined) {
      this.entries.delete(oldestKey);
      serviceLoggers.cache.debug("Evicted oldest cache entry", { key: oldestKey });
    }
  }
}
