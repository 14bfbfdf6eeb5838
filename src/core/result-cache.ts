/**
 * Result Cache (LRU with TTL, scoped)
 *
 * Short-term cache for store results, partitioned by an isolation scope
 * (tenant/project). Repeated reads are answered without reaching the store.
 *
 * Features:
 * - LRU eviction across all scopes (least recently accessed first)
 * - Per-entry TTL with lazy expiry on read and active expiry in cleanup()
 * - Scope-wide invalidation for write paths
 * - Hit/miss/eviction statistics
 *
 * LRU Eviction Logic:
 * - Map iteration order === insertion order (oldest first)
 * - On get()/set(): move entry to end (most recently used)
 * - On evict: delete first entry (least recently used)
 *
 * Every method runs to completion synchronously, so the maintenance loop and
 * request handlers never observe a half-updated map.
 */

import type { Logger } from 'pino';
import type { CacheEntry, CacheLookup, CacheStats } from '../types/cache.js';
import { safeDivide } from '../utils/math-helpers.js';
import { lazyLog } from '../utils/logger.js';

/**
 * Result cache configuration
 */
export interface ResultCacheConfig {
  /** Maximum number of entries across all scopes (LRU capacity) */
  maxEntries: number;

  /** TTL applied when set() is called without one (seconds) */
  defaultTtlSeconds: number;

  /** Optional logical clock; defaults to Date.now() */
  now?: () => number;

  /** Logger instance (optional) */
  logger?: Logger;
}

const SCOPE_SEPARATOR = '\u0000';

function compositeKey(scope: string, key: string): string {
  return `${scope}${SCOPE_SEPARATOR}${key}`;
}

export class ResultCache<V = unknown> {
  private readonly maxEntries: number;
  private readonly defaultTtlSeconds: number;
  private readonly now: () => number;
  private readonly logger?: Logger;

  /**
   * LRU storage keyed by scope + key
   *
   * IMPORTANT: Map preserves insertion order.
   * - Oldest entries appear first during iteration
   * - Moving entry to end: delete() then set()
   */
  private readonly entries = new Map<string, CacheEntry<V>>();

  /** Composite keys held per scope (for scope-wide invalidation) */
  private readonly scopes = new Map<string, Set<string>>();

  private stats = {
    hits: 0,
    misses: 0,
    evictions: 0,
    expirations: 0,
  };

  constructor(config: ResultCacheConfig) {
    this.maxEntries = config.maxEntries;
    this.defaultTtlSeconds = config.defaultTtlSeconds;
    this.now = config.now ?? Date.now;
    this.logger = config.logger;

    this.logger?.debug(
      { maxEntries: this.maxEntries, defaultTtlSeconds: this.defaultTtlSeconds },
      'ResultCache initialized'
    );
  }

  /**
   * Number of entries currently held (expired ones included until swept)
   */
  public get size(): number {
    return this.entries.size;
  }

  /**
   * Get a cached value
   *
   * Misses when the entry is unknown or expired; an expired entry is removed
   * on the spot. A hit refreshes lastAccessedAt and LRU position.
   */
  public get(scope: string, key: string): CacheLookup<V> {
    const id = compositeKey(scope, key);
    const entry = this.entries.get(id);

    if (!entry) {
      this.stats.misses++;
      return { hit: false };
    }

    const now = this.now();
    if (now >= entry.expiresAt) {
      this.remove(id, entry);
      this.stats.expirations++;
      this.stats.misses++;
      this.logger?.debug({ scope, key, age: now - entry.createdAt }, 'Cache entry expired');
      return { hit: false };
    }

    entry.lastAccessedAt = now;
    entry.accessCount++;

    this.entries.delete(id);
    this.entries.set(id, entry);

    this.stats.hits++;
    return { hit: true, value: entry.value };
  }

  /**
   * Store a value
   *
   * Replacing an existing key never evicts. Inserting a new key at capacity
   * evicts the least recently accessed entry, whatever its scope.
   *
   * @param ttlSeconds - Time to live; defaults to the configured TTL
   */
  public set(scope: string, key: string, value: V, ttlSeconds?: number): void {
    const now = this.now();
    const ttl = ttlSeconds ?? this.defaultTtlSeconds;
    const id = compositeKey(scope, key);

    const existing = this.entries.get(id);
    if (existing) {
      this.entries.delete(id);
    } else {
      while (this.entries.size >= this.maxEntries) {
        if (!this.evictLRU()) {
          break;
        }
      }
    }

    const entry: CacheEntry<V> = {
      key,
      scope,
      value,
      createdAt: now,
      expiresAt: now + ttl * 1000,
      lastAccessedAt: now,
      accessCount: 0,
    };

    this.entries.set(id, entry);
    let scoped = this.scopes.get(scope);
    if (!scoped) {
      scoped = new Set();
      this.scopes.set(scope, scoped);
    }
    scoped.add(id);
  }

  /**
   * Invalidate one key, or every entry of a scope when key is omitted
   *
   * @returns Number of entries removed
   */
  public invalidate(scope: string, key?: string): number {
    if (key !== undefined) {
      const id = compositeKey(scope, key);
      const entry = this.entries.get(id);
      if (!entry) {
        return 0;
      }
      this.remove(id, entry);
      return 1;
    }

    const scoped = this.scopes.get(scope);
    if (!scoped) {
      return 0;
    }

    const removed = scoped.size;
    for (const id of scoped) {
      this.entries.delete(id);
    }
    this.scopes.delete(scope);

    this.logger?.debug({ scope, removed }, 'Cache scope invalidated');
    return removed;
  }

  /**
   * Remove all expired entries (active expiry)
   *
   * @returns Number of entries removed
   */
  public cleanup(): number {
    const now = this.now();
    let removed = 0;

    for (const [id, entry] of Array.from(this.entries.entries())) {
      if (now >= entry.expiresAt) {
        this.remove(id, entry);
        removed++;
      }
    }

    this.stats.expirations += removed;

    if (removed > 0) {
      lazyLog(
        this.logger,
        'debug',
        () => ({ removed, remaining: this.entries.size, scopes: this.scopes.size }),
        'Expired cache entries removed'
      );
    }

    return removed;
  }

  /**
   * Drop entries of a scope, or of every scope when omitted. Statistics are kept.
   */
  public clear(scope?: string): void {
    if (scope !== undefined) {
      this.invalidate(scope);
      return;
    }

    this.entries.clear();
    this.scopes.clear();
  }

  /**
   * Cache statistics
   *
   * Counters (hits, misses, evictions, expirations) are global; entry
   * figures are restricted to the scope when one is given.
   */
  public getStats(scope?: string): CacheStats {
    const now = this.now();
    let totalEntries = 0;
    let expiredCount = 0;
    let totalAccesses = 0;

    for (const entry of this.entries.values()) {
      if (scope !== undefined && entry.scope !== scope) {
        continue;
      }
      totalEntries++;
      totalAccesses += entry.accessCount;
      if (now >= entry.expiresAt) {
        expiredCount++;
      }
    }

    return {
      scope: scope ?? null,
      totalEntries,
      expiredCount,
      activeEntries: totalEntries - expiredCount,
      totalAccesses,
      maxEntries: this.maxEntries,
      defaultTtlSeconds: this.defaultTtlSeconds,
      hits: this.stats.hits,
      misses: this.stats.misses,
      evictions: this.stats.evictions,
      expirations: this.stats.expirations,
      hitRate: safeDivide(this.stats.hits, this.stats.hits + this.stats.misses),
    };
  }

  /**
   * Keys of a scope from least to most recently used
   */
  public keys(scope: string): string[] {
    const result: string[] = [];
    for (const entry of this.entries.values()) {
      if (entry.scope === scope) {
        result.push(entry.key);
      }
    }
    return result;
  }

  /**
   * Evict the least recently used entry
   *
   * @returns false when there was nothing to evict
   */
  private evictLRU(): boolean {
    const oldest = this.entries.entries().next();
    if (oldest.done) {
      return false;
    }

    const [id, entry] = oldest.value;
    this.remove(id, entry);
    this.stats.evictions++;

    this.logger?.debug(
      { scope: entry.scope, key: entry.key, idleMs: this.now() - entry.lastAccessedAt },
      'Evicted LRU cache entry'
    );
    return true;
  }

  private remove(id: string, entry: CacheEntry<V>): void {
    this.entries.delete(id);
    const scoped = this.scopes.get(entry.scope);
    if (scoped) {
      scoped.delete(id);
      if (scoped.size === 0) {
        this.scopes.delete(entry.scope);
      }
    }
  }
}
