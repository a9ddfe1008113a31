/**
 * TtlCache - Bounded in-memory response cache with TTL freshness and LRU eviction
 *
 * Shared by every widget data source so repeated dashboard polls do not hit
 * free public APIs more often than their TTL allows.
 *
 * Behavior:
 * - Fresh hit (age < ttl): value returned, key moved to most-recently-used,
 *   fetcher not called
 * - Miss or stale: fetcher called; the result replaces the entry and the
 *   least-recently-used entries are evicted while size > maxEntries
 * - Fetch failure: the stale value is served if one exists, otherwise `null`.
 *   Errors are logged and never propagated.
 *
 * Entries are never dropped because of age alone; only size eviction or
 * explicit invalidation removes them, so a stale value stays available as a
 * fallback.
 *
 * Lookup/reorder and insert/evict run synchronously and therefore cannot
 * interleave on the event loop. The fetcher runs outside them, so a slow
 * upstream never blocks other keys. There is no in-flight deduplication:
 * concurrent misses on the same key may each call their fetcher, and the
 * last one to finish wins.
 */

import { createLogger, getErrorMessage } from '@homelab/utils';
import { DEFAULT_CACHE_MAX_ENTRIES, DEFAULT_CACHE_TTL_MS, type CacheOptions } from '@homelab/types';

const logger = createLogger('TtlCache');

/**
 * Metadata stored alongside each cached value
 */
interface CacheEntry<V> {
  value: V;
  /** Timestamp when the entry was stored (ms since epoch) */
  cachedAt: number;
}

/**
 * TtlCache<V> - TTL/LRU cache keyed by string
 *
 * @example
 * ```ts
 * const cache = new TtlCache<CryptoPrice[]>({ maxEntries: 50 });
 *
 * const prices = await cache.getOrFetch('crypto_bitcoin,ethereum', () => loadPrices(), 120_000);
 * ```
 */
export class TtlCache<V> {
  /** Map iteration order is LRU → MRU */
  private readonly entries = new Map<string, CacheEntry<V>>();

  private readonly defaultTtl: number;
  private readonly maxEntries: number;

  constructor(options: CacheOptions = {}) {
    this.defaultTtl = options.defaultTtl ?? DEFAULT_CACHE_TTL_MS;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES);
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /**
   * Return the cached value for `key` if it is younger than `ttl`, otherwise
   * call `fetchFn` and store its result.
   *
   * @param ttl - Freshness window in ms (defaults to the cache's defaultTtl)
   * @returns The fresh or fetched value, the stale value when the fetch
   * failed, or `null` when there is nothing to serve
   */
  async getOrFetch(key: string, fetchFn: () => Promise<V>, ttl?: number): Promise<V | null> {
    const maxAge = ttl ?? this.defaultTtl;

    const entry = this.entries.get(key);
    if (entry && Date.now() - entry.cachedAt < maxAge) {
      this.touch(key, entry);
      return entry.value;
    }

    let value: V;
    try {
      value = await fetchFn();
    } catch (error) {
      const stale = this.entries.get(key);
      if (stale) {
        logger.warn(`Fetch failed for "${key}", serving stale value:`, getErrorMessage(error));
        this.touch(key, stale);
        return stale.value;
      }
      logger.warn(`Fetch failed for "${key}" with nothing cached:`, getErrorMessage(error));
      return null;
    }

    this.set(key, value);
    return value;
  }

  /**
   * Read a value without fetching and without changing recency.
   * Stale values are returned too.
   */
  peek(key: string): V | undefined {
    return this.entries.get(key)?.value;
  }

  /**
   * Store a value as fresh and mark it most-recently-used.
   */
  set(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { value, cachedAt: Date.now() });
    this.evictIfNeeded();
  }

  /**
   * @returns `true` if an entry was removed
   */
  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Remove every entry whose key matches `predicate`.
   *
   * @returns Number of entries removed
   *
   * @example
   * ```ts
   * cache.invalidateBy((key) => key.startsWith('weather_'));
   * ```
   */
  invalidateBy(predicate: (key: string) => boolean): number {
    let count = 0;
    for (const key of [...this.entries.keys()]) {
      if (predicate(key)) {
        this.entries.delete(key);
        count++;
      }
    }

    if (count > 0) {
      logger.debug(`Invalidated ${count} cache entries`);
    }

    return count;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Keys ordered from least- to most-recently-used.
   */
  keys(): string[] {
    return [...this.entries.keys()];
  }

  // ---------------------------------------------------------------------------
  // Internal helpers
  // ---------------------------------------------------------------------------

  private touch(key: string, entry: CacheEntry<V>): void {
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  private evictIfNeeded(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
      logger.debug(`Evicted "${oldest.value}"`);
    }
  }
}
