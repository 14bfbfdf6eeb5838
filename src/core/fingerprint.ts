/**
 * Cache Key Fingerprinting
 *
 * Derives deterministic cache keys from an operation and its arguments.
 * Arguments are canonicalized (object keys sorted recursively, undefined
 * members dropped) before hashing, so `{ a: 1, b: 2 }` and `{ b: 2, a: 1 }`
 * map to the same key.
 */

import { createHash } from 'node:crypto';

/**
 * Canonical JSON serialization with recursively sorted object keys
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : canonicalize(item)));
  }

  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) {
        sorted[key] = canonicalize(member);
      }
    }
    return sorted;
  }

  return value;
}

/**
 * Derive the cache key for an operation
 *
 * Scope is deliberately not part of the key: ResultCache partitions by
 * scope itself.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function deriveCacheKey(operation: string, args: unknown): string {
  const payload = canonicalJson({ operation, args });
  return createHash('sha256').update(payload).digest('hex');
}
