/**
 * Runtime Boundary Schemas
 *
 * Zod schemas for the arguments of the public runtime entry points. The
 * core components are total over well-shaped input; malformed input (an
 * empty scope, a non-positive TTL or limit) is rejected here instead.
 *
 * @module schemas/operations
 */

import { z } from 'zod';
import { NonEmptyString, NonNegativeNumber, OperationKindSchema, PositiveInteger, ScopeSchema } from './common.js';

/**
 * Cache lookup arguments
 */
export const CacheLookupSchema = z.object({
  scope: ScopeSchema,
  key: NonEmptyString,
  ttlSeconds: z.number().finite('TTL must be finite').positive('TTL must be positive').optional(),
});

/**
 * Cache invalidation arguments
 */
export const CacheInvalidateSchema = z.object({
  scope: ScopeSchema,
  key: NonEmptyString.optional(),
});

/**
 * Operation shape used for pattern signatures and smell checks
 */
export const OperationShapeSchema = z.object({
  target: NonEmptyString,
  filter: z.record(z.unknown()).optional(),
  resultLimit: PositiveInteger.optional(),
  batchSize: z.number().int('Must be an integer').min(0, 'Must be non-negative').optional(),
});

/**
 * recordOperation arguments
 */
export const RecordOperationSchema = z.object({
  scope: ScopeSchema,
  kind: OperationKindSchema,
  durationMs: NonNegativeNumber,
  success: z.boolean(),
  pattern: z.union([NonEmptyString, OperationShapeSchema]),
});

/**
 * Hot trail query arguments
 */
export const HotTrailsQuerySchema = z.object({
  scope: ScopeSchema,
  limit: PositiveInteger,
});

/**
 * Job registration arguments (the interval itself is checked by the scheduler)
 */
export const ScheduleJobSchema = z.object({
  name: z.string().trim().min(1, 'Job name cannot be empty'),
});

/**
 * Store operation arguments
 */
export const StoreOperationArgsSchema = z.object({
  collection: NonEmptyString,
  where: z.record(z.unknown()).optional(),
  queryTexts: z.array(z.string()).optional(),
  nResults: PositiveInteger.optional(),
  ids: z.array(z.string()).optional(),
  documents: z.array(z.string()).optional(),
  metadatas: z.array(z.record(z.unknown())).optional(),
});
