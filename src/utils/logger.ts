/**
 * Logger factory
 *
 * Structured JSON logging through pino. The level comes from the caller,
 * the ADAPTIVE_RUNTIME_LOG_LEVEL environment variable, or 'info'.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

/**
 * Resolve the effective log level
 */
export function resolveLogLevel(level?: string): LevelWithSilent {
  if (isLevel(level)) {
    return level;
  }
  const envLevel = process.env.ADAPTIVE_RUNTIME_LOG_LEVEL?.toLowerCase();
  return isLevel(envLevel) ? envLevel : 'info';
}

/**
 * Create a logger instance
 *
 * @param component - Component name (e.g., 'MaintenanceScheduler')
 * @param level - Optional level override
 *
 * @example
 * ```typescript
 * const logger = createLogger('AdaptiveRuntime', 'debug');
 * logger.info({ scope: 'tenant-a' }, 'Runtime started');
 * ```
 */
export function createLogger(component: string, level?: string): Logger {
  return pino({
    name: component,
    level: resolveLogLevel(level),
    base: { component },
  });
}

/**
 * Lazy log helper: the context object is only built when the level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ entries: cache.size }), 'Cache swept');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: 'trace' | 'debug' | 'info' | 'warn' | 'error',
  contextBuilder: () => Record<string, unknown>,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
