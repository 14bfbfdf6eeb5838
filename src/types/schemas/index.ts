/**
 * Zod schema exports
 *
 * These schemas provide runtime validation for configuration and for every
 * public runtime entry point.
 *
 * @example
 * ```typescript
 * import { CacheLookupSchema } from 'adaptive-store-runtime';
 *
 * const result = CacheLookupSchema.safeParse({ scope: 'tenant-a', key: 'k', ttlSeconds: -1 });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Config schemas
export * from './config.js';

// Runtime boundary schemas
export * from './operations.js';
