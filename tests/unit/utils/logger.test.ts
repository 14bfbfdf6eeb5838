import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, lazyLog, resolveLogLevel } from '../../../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('prefers an explicit level', () => {
    vi.stubEnv('ADAPTIVE_RUNTIME_LOG_LEVEL', 'debug');

    expect(resolveLogLevel('warn')).toBe('warn');
  });

  it('falls back to the environment, then info', () => {
    vi.stubEnv('ADAPTIVE_RUNTIME_LOG_LEVEL', 'TRACE');
    expect(resolveLogLevel()).toBe('trace');

    vi.stubEnv('ADAPTIVE_RUNTIME_LOG_LEVEL', 'loud');
    expect(resolveLogLevel('chatty')).toBe('info');
  });

  it('creates a logger at the requested level', () => {
    const logger = createLogger('ResultCache', 'silent');

    expect(logger.level).toBe('silent');
    expect(logger.isLevelEnabled('error')).toBe(false);
  });

  it('builds the context only when the level is enabled', () => {
    const logger = createLogger('ResultCache', 'info');
    const debug = vi.spyOn(logger, 'debug');
    const build = vi.fn(() => ({ entries: 3 }));

    lazyLog(logger, 'debug', build, 'Cache swept');
    lazyLog(undefined, 'error', build, 'Cache swept');

    expect(build).not.toHaveBeenCalled();
    expect(debug).not.toHaveBeenCalled();
  });
});
