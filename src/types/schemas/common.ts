/**
 * Common Zod schema primitives
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Isolation scope (tenant/project)
 */
export const ScopeSchema = z.string().trim().min(1, 'Scope cannot be empty');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative number validator
 */
export const NonNegativeNumber = z.number().finite('Must be finite').min(0, 'Must be non-negative');

/**
 * Operation kind enum
 */
export const OperationKindSchema = z.enum(['query', 'insert', 'update', 'delete']);
