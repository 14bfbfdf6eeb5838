/**
 * API Validators
 *
 * Boundary checks for the public runtime entry points. Each assert
 * function throws a ValidationError naming the first offending field;
 * validateX functions return every problem instead.
 */

import type { ZodType } from 'zod';
import type { OperationKind, OperationShape, StoreOperationArgs } from '../types/store.js';
import {
  CacheInvalidateSchema,
  CacheLookupSchema,
  HotTrailsQuerySchema,
  RecordOperationSchema,
  ScheduleJobSchema,
  StoreOperationArgsSchema,
} from '../types/schemas/operations.js';
import { zodErrorToRuntimeError } from './errors.js';

/**
 * Validation result type
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function assertSchema(schema: ZodType, value: unknown): void {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw zodErrorToRuntimeError(result.error);
  }
}

function validateSchema(schema: ZodType, value: unknown): ValidationResult {
  const result = schema.safeParse(value);
  if (result.success) {
    return { valid: true, errors: [] };
  }
  return {
    valid: false,
    errors: result.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field}: ${issue.message}`;
    }),
  };
}

export function assertCacheLookup(scope: string, key: string, ttlSeconds?: number): void {
  assertSchema(CacheLookupSchema, { scope, key, ttlSeconds });
}

export function assertCacheInvalidate(scope: string, key?: string): void {
  assertSchema(CacheInvalidateSchema, { scope, key });
}

export function assertRecordOperation(
  scope: string,
  kind: OperationKind,
  durationMs: number,
  success: boolean,
  pattern: string | OperationShape
): void {
  assertSchema(RecordOperationSchema, { scope, kind, durationMs, success, pattern });
}

export function assertHotTrailsQuery(scope: string, limit: number): void {
  assertSchema(HotTrailsQuerySchema, { scope, limit });
}

export function assertScope(scope: string): void {
  assertSchema(CacheInvalidateSchema, { scope });
}

export function assertJobName(name: string): void {
  assertSchema(ScheduleJobSchema, { name });
}

export function assertStoreOperationArgs(args: StoreOperationArgs): void {
  assertSchema(StoreOperationArgsSchema, args);
}

/**
 * Validate store operation arguments, collecting every error
 */
export function validateStoreOperationArgs(args: StoreOperationArgs): ValidationResult {
  return validateSchema(StoreOperationArgsSchema, args);
}
