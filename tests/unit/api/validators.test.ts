import { describe, it, expect } from 'vitest';
import {
  assertCacheInvalidate,
  assertCacheLookup,
  assertHotTrailsQuery,
  assertJobName,
  assertRecordOperation,
  assertScope,
  assertStoreOperationArgs,
  validateStoreOperationArgs,
} from '../../../src/api/validators.js';
import { AdaptiveRuntimeError } from '../../../src/api/errors.js';

const captureError = (fn: () => void): AdaptiveRuntimeError => {
  try {
    fn();
  } catch (err) {
    if (err instanceof AdaptiveRuntimeError) {
      return err;
    }
    throw err;
  }
  throw new Error('Expected a validation error');
};

describe('API Validators', () => {
  describe('scope', () => {
    it('rejects an empty or blank scope', () => {
      const error = captureError(() => assertScope('   '));

      expect(error.code).toBe('ValidationError');
      expect(error.message).toBe("Validation error on field 'scope': Scope cannot be empty");
      expect(error.details?.field).toBe('scope');
    });

    it('accepts a named scope', () => {
      expect(() => assertScope('tenant-a')).not.toThrow();
    });
  });

  describe('cache lookups', () => {
    it('rejects non-positive TTLs', () => {
      expect(captureError(() => assertCacheLookup('tenant-a', 'k', -1)).message).toBe(
        "Validation error on field 'ttlSeconds': TTL must be positive"
      );
      expect(captureError(() => assertCacheLookup('tenant-a', 'k', 0)).message).toBe(
        "Validation error on field 'ttlSeconds': TTL must be positive"
      );
    });

    it('accepts an omitted TTL', () => {
      expect(() => assertCacheLookup('tenant-a', 'k')).not.toThrow();
    });

    it('rejects an empty key', () => {
      expect(captureError(() => assertCacheLookup('tenant-a', '')).message).toBe(
        "Validation error on field 'key': Cannot be empty"
      );
      expect(captureError(() => assertCacheInvalidate('tenant-a', '')).message).toBe(
        "Validation error on field 'key': Cannot be empty"
      );
    });
  });

  describe('hot trail queries', () => {
    it('requires a positive integer limit', () => {
      expect(captureError(() => assertHotTrailsQuery('tenant-a', 0)).message).toBe(
        "Validation error on field 'limit': Must be a positive integer"
      );
      expect(captureError(() => assertHotTrailsQuery('tenant-a', 1.5)).message).toBe(
        "Validation error on field 'limit': Must be an integer"
      );
    });
  });

  describe('recorded operations', () => {
    it('rejects negative durations', () => {
      expect(captureError(() => assertRecordOperation('tenant-a', 'query', -1, true, 'query:a:*')).message).toBe(
        "Validation error on field 'durationMs': Must be non-negative"
      );
    });

    it('accepts a signature or a shape', () => {
      expect(() => assertRecordOperation('tenant-a', 'query', 0, true, 'query:a:*')).not.toThrow();
      expect(() =>
        assertRecordOperation('tenant-a', 'insert', 3, false, { target: 'articles', batchSize: 10 })
      ).not.toThrow();
    });
  });

  describe('job names', () => {
    it('rejects blank names', () => {
      expect(captureError(() => assertJobName(' ')).message).toBe(
        "Validation error on field 'name': Job name cannot be empty"
      );
    });
  });

  describe('store operation arguments', () => {
    it('collects every problem', () => {
      expect(validateStoreOperationArgs({ collection: '', nResults: 0 })).toEqual({
        valid: false,
        errors: ['collection: Cannot be empty', 'nResults: Must be a positive integer'],
      });
    });

    it('accepts well-formed arguments', () => {
      const args = { collection: 'articles', where: { year: 2024 }, queryTexts: ['vector stores'], nResults: 5 };

      expect(validateStoreOperationArgs(args)).toEqual({ valid: true, errors: [] });
      expect(() => assertStoreOperationArgs(args)).not.toThrow();
    });
  });
});
