/**
 * Result Cache Types
 *
 * Type definitions for the scoped short-term result cache.
 *
 * @module types/cache
 */

/**
 * Cache entry stored by ResultCache
 */
export interface CacheEntry<V = unknown> {
  /** Caller key (unique within its scope) */
  key: string;

  /** Isolation scope (tenant/project) */
  scope: string;

  /** Opaque cached result */
  value: V;

  /** Creation timestamp (ms since epoch) */
  createdAt: number;

  /** Expiration timestamp (ms since epoch); never served at or after it */
  expiresAt: number;

  /** Last read or write (ms since epoch); governs LRU order */
  lastAccessedAt: number;

  /** Number of reads served from this entry */
  accessCount: number;
}

/**
 * Result of a cache lookup
 */
export type CacheLookup<V> = { hit: true; value: V } | { hit: false };

/**
 * Cache statistics, either global or for a single scope
 */
export interface CacheStats {
  scope: string | null;
  totalEntries: number;
  expiredCount: number;
  activeEntries: number;
  totalAccesses: number;
  maxEntries: number;
  defaultTtlSeconds: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
  hitRate: number;
}
