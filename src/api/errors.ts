/**
 * Runtime error utilities.
 *
 * Provides a consistent error type for every public surface of the adaptive
 * runtime and helpers to convert lower-level failures (job actions, probes,
 * schema validation) into AdaptiveRuntimeError instances callers can reason
 * about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to runtime consumers.
 *
 * Eviction at capacity is not an error and has no code here: it is the
 * normal path of ResultCache.set().
 */
export type RuntimeErrorCode =
  | 'ConfigurationError'
  | 'ValidationError'
  | 'DuplicateJob'
  | 'JobExecutionError'
  | 'WatchdogFailure'
  | 'RuntimeError';

/**
 * Plain error shape (for JSON responses, logs and job snapshots).
 */
export interface RuntimeErrorShape {
  code: RuntimeErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class AdaptiveRuntimeError extends Error implements RuntimeErrorShape {
  public readonly code: RuntimeErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: RuntimeErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AdaptiveRuntimeError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): RuntimeErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Invalid threshold, interval or option at setup time. Fatal: raised
 * immediately, never replaced by a default.
 */
export class ConfigurationError extends AdaptiveRuntimeError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('ConfigurationError', message, issues.length > 0 ? { issues } : undefined);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A scheduled job's action threw or rejected. Recorded on the job and
 * logged; never propagated out of the scheduler loop.
 */
export class JobExecutionError extends AdaptiveRuntimeError {
  public readonly jobName: string;

  constructor(jobName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('JobExecutionError', `Job "${jobName}" failed: ${reason}`, { jobName });
    this.name = 'JobExecutionError';
    this.jobName = jobName;
    this.cause = cause;
  }
}

/**
 * Backing store stayed unreachable after the bounded recovery attempts.
 */
export class WatchdogFailureError extends AdaptiveRuntimeError {
  public readonly attempts: number;

  constructor(message: string, attempts: number, lastReason?: string) {
    super('WatchdogFailure', message, { attempts, ...(lastReason && { lastReason }) });
    this.name = 'WatchdogFailureError';
    this.attempts = attempts;
  }
}

/**
 * Map unknown errors into AdaptiveRuntimeError instances.
 *
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toRuntimeError(
  error: unknown,
  fallbackCode: RuntimeErrorCode = 'RuntimeError'
): AdaptiveRuntimeError {
  if (error instanceof AdaptiveRuntimeError) {
    return error;
  }

  if (error instanceof Error) {
    return new AdaptiveRuntimeError(fallbackCode, error.message, { name: error.name });
  }

  return new AdaptiveRuntimeError(fallbackCode, 'Unknown runtime error', {
    value: String(error),
  });
}

/**
 * Convenience helper for boundary validation failures.
 */
export function createValidationError(
  message: string,
  details?: Record<string, unknown>
): AdaptiveRuntimeError {
  return new AdaptiveRuntimeError('ValidationError', message, details);
}

/**
 * Convert a Zod validation error into a ValidationError.
 *
 * @example
 * ```typescript
 * const result = CacheLookupSchema.safeParse({ scope: '', key: 'k', ttlSeconds: 5 });
 * if (!result.success) {
 *   throw zodErrorToRuntimeError(result.error);
 * }
 * // Throws: "Validation error on field 'scope': Scope cannot be empty"
 * ```
 */
export function zodErrorToRuntimeError(error: ZodError): AdaptiveRuntimeError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return createValidationError(message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}

/**
 * Format Zod issues as `field message` lines (configuration reports).
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${field} ${issue.message}`;
  });
}
