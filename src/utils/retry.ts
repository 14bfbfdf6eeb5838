/**
 * Exponential backoff retry utilities.
 *
 * Bounded retry helper used for recovery actions (store reconnect/restart).
 * Supports exponential backoff with optional jitter, a retry predicate and
 * abort signal support.
 */

export interface RetryConfig {
  /** Total attempts, first call included */
  maxAttempts: number;
  /** Wait before the second attempt */
  initialDelayMs: number;
  /** Upper bound for any single wait */
  maxDelayMs: number;
  /** Growth factor of the wait after each failed attempt (>= 1) */
  backoffMultiplier: number;
  /** Random spread of each wait, 0-1 (0 = none) */
  jitter?: number;
  /** Return false to stop after this failure; every failure retries when omitted */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  signal?: AbortSignal;
  onRetry?: (context: RetryAttemptContext) => void;
  /** Replaced in tests to avoid real waits */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RetryAttemptContext {
  attempt: number;
  delayMs: number;
  error: unknown;
}

/**
 * Thrown when the signal fires before or between attempts
 */
export class RetryAbortedError extends Error {
  constructor(message = 'Retry aborted') {
    super(message);
    this.name = 'RetryAbortedError';
  }
}

/**
 * Error thrown when every attempt failed.
 */
export class RetryExhaustedError extends Error {
  public readonly attempts: number;
  public readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Retry attempts exhausted after ${attempts} attempt(s): ${reason}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Wait `ms`, rejecting with RetryAbortedError as soon as the signal fires
 */
export async function abortableDelay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new RetryAbortedError();
  }

  if (ms <= 0) {
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RetryAbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function nextDelay(current: number, multiplier: number, max: number): number {
  if (!Number.isFinite(current) || current < 0) {
    return max;
  }
  return Math.min(max, Math.max(current, Math.round(current * multiplier)));
}

/**
 * Execute an async function with retries and exponential backoff.
 *
 * @throws RetryExhaustedError when every attempt failed or a failure was not retryable
 * @throws RetryAbortedError when the signal fired
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig
): Promise<T> {
  if (config.maxAttempts < 1) {
    throw new RangeError('maxAttempts must be >= 1');
  }
  if (config.initialDelayMs < 0) {
    throw new RangeError('initialDelayMs must be >= 0');
  }
  if (config.maxDelayMs < config.initialDelayMs) {
    throw new RangeError('maxDelayMs must be >= initialDelayMs');
  }
  if (config.backoffMultiplier < 1) {
    throw new RangeError('backoffMultiplier must be >= 1');
  }

  const sleep = config.sleep ?? abortableDelay;
  const jitter = Math.min(Math.max(config.jitter ?? 0, 0), 1);

  let attempt = 0;
  let delayMs = config.initialDelayMs;
  let lastError: unknown;

  while (attempt < config.maxAttempts) {
    attempt += 1;

    if (config.signal?.aborted) {
      throw new RetryAbortedError();
    }

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) {
        break;
      }

      if (config.shouldRetry && !config.shouldRetry(error, attempt)) {
        break;
      }

      // delayMs=1000, jitter=0.5 → 500-1500ms
      const computedDelay = jitter > 0
        ? Math.floor(delayMs * (1 - jitter + 2 * jitter * Math.random()))
        : delayMs;

      config.onRetry?.({ attempt, delayMs: computedDelay, error });

      await sleep(computedDelay, config.signal);

      delayMs = nextDelay(delayMs, config.backoffMultiplier, config.maxDelayMs);
    }
  }

  throw new RetryExhaustedError(attempt, lastError);
}
