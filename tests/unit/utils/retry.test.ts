import { describe, it, expect, vi } from 'vitest';
import {
  retryWithBackoff,
  abortableDelay,
  RetryAbortedError,
  RetryExhaustedError,
  type RetryConfig,
} from '../../../src/utils/retry.js';

const createConfig = (overrides: Partial<RetryConfig> = {}): { config: RetryConfig; delays: number[] } => {
  const delays: number[] = [];
  const config: RetryConfig = {
    maxAttempts: 3,
    initialDelayMs: 100,
    maxDelayMs: 1_000,
    backoffMultiplier: 2,
    sleep: async (ms) => {
      delays.push(ms);
    },
    ...overrides,
  };
  return { config, delays };
};

describe('retryWithBackoff', () => {
  it('returns the first successful result without sleeping', async () => {
    const { config, delays } = createConfig();
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(retryWithBackoff(fn, config)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(1);
    expect(delays).toEqual([]);
  });

  it('retries until an attempt succeeds', async () => {
    const { config, delays } = createConfig();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('recovered');

    await expect(retryWithBackoff(fn, config)).resolves.toBe('recovered');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(delays).toEqual([100]);
  });

  it('throws RetryExhaustedError after maxAttempts', async () => {
    const { config } = createConfig();
    const fn = vi.fn().mockRejectedValue(new Error('permanent failure'));

    const error = await retryWithBackoff(fn, config).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.message).toBe('Retry attempts exhausted after 3 attempt(s): permanent failure');
      expect(error.attempts).toBe(3);
    }
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('grows the delay exponentially up to the maximum', async () => {
    const { config, delays } = createConfig({ maxAttempts: 4, maxDelayMs: 300 });

    await expect(retryWithBackoff(() => Promise.reject(new Error('down')), config)).rejects.toBeInstanceOf(
      RetryExhaustedError
    );
    expect(delays).toEqual([100, 200, 300]);
  });

  it('stops early when shouldRetry declines', async () => {
    const { config, delays } = createConfig({ shouldRetry: () => false });
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));

    await expect(retryWithBackoff(fn, config)).rejects.toThrow(
      'Retry attempts exhausted after 1 attempt(s): fatal'
    );
    expect(delays).toEqual([]);
  });

  it('reports each retry', async () => {
    const onRetry = vi.fn();
    const { config } = createConfig({ onRetry });
    const failure = new Error('flaky');

    await retryWithBackoff(
      async (attempt) => {
        if (attempt < 3) throw failure;
        return attempt;
      },
      config
    );

    expect(onRetry.mock.calls).toEqual([
      [{ attempt: 1, delayMs: 100, error: failure }],
      [{ attempt: 2, delayMs: 200, error: failure }],
    ]);
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const { config } = createConfig({ signal: controller.signal });
    const fn = vi.fn().mockResolvedValue('never');

    await expect(retryWithBackoff(fn, config)).rejects.toBeInstanceOf(RetryAbortedError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('validates its configuration', async () => {
    const fn = (): Promise<string> => Promise.resolve('ok');

    await expect(retryWithBackoff(fn, createConfig({ maxAttempts: 0 }).config)).rejects.toBeInstanceOf(RangeError);
    await expect(
      retryWithBackoff(fn, createConfig({ initialDelayMs: 500, maxDelayMs: 100 }).config)
    ).rejects.toThrow('maxDelayMs must be >= initialDelayMs');
    await expect(retryWithBackoff(fn, createConfig({ backoffMultiplier: 0.5 }).config)).rejects.toThrow(
      'backoffMultiplier must be >= 1'
    );
  });
});

describe('abortableDelay', () => {
  it('rejects when aborted while waiting', async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      const pending = abortableDelay(10_000, controller.signal);

      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(RetryAbortedError);
    } finally {
      vi.useRealTimers();
    }
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    try {
      const pending = abortableDelay(1_000);

      await vi.advanceTimersByTimeAsync(1_000);

      await expect(pending).resolves.toBeUndefined();
    } finally {
      vi.useRealTimers();
    }
  });
});
