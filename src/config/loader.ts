/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { LevelWithSilent } from 'pino';
import type { IntervalSpec } from '../types/scheduling.js';
import type { ScalingThresholds } from '../types/scaling.js';
import {
  RuntimeConfigFileSchema,
  RuntimeConfigSchema,
  type RuntimeConfig,
  type RuntimeEnvironment,
} from '../types/schemas/config.js';
import { ConfigurationError, formatZodIssues } from '../api/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';

type PlainObject = Record<string, unknown>;

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects (arrays and scalars in source replace target)
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Default configuration file location
 *
 * ADAPTIVE_RUNTIME_CONFIG overrides the packaged config/runtime.yaml.
 */
export function resolveConfigPath(configPath?: string): string {
  return configPath ?? process.env.ADAPTIVE_RUNTIME_CONFIG ?? join(findPackageRoot(), 'config', 'runtime.yaml');
}

function resolveEnvironment(environment?: RuntimeEnvironment): RuntimeEnvironment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Load configuration from YAML file and apply the environment overrides
 *
 * The result is not validated yet; see validateConfig().
 *
 * @throws ConfigurationError when the file is missing or is not a YAML mapping
 */
export function loadConfig(configPath?: string, environment?: RuntimeEnvironment): PlainObject {
  const finalPath = resolveConfigPath(configPath);

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/runtime.yaml exists or set ADAPTIVE_RUNTIME_CONFIG.`
      );
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to load configuration from ${finalPath}: ${reason}`);
  }

  const file = RuntimeConfigFileSchema.safeParse(parsed);
  if (!file.success) {
    throw new ConfigurationError(
      `Configuration file ${finalPath} must be a mapping`,
      formatZodIssues(file.error)
    );
  }

  const { environments, ...base } = file.data;
  const overrides = environments?.[resolveEnvironment(environment)];

  return overrides ? deepMerge(base, overrides) : base;
}

/**
 * Validate configuration values
 *
 * @throws ConfigurationError listing every invalid field
 */
export function validateConfig(config: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const issues = formatZodIssues(parseResult.error);
    throw new ConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, issues);
  }
  return parseResult.data;
}

/**
 * Load and validate a configuration file
 */
export function loadRuntimeConfig(configPath?: string, environment?: RuntimeEnvironment): RuntimeConfig {
  return validateConfig(loadConfig(configPath, environment));
}

/**
 * Build a validated configuration from the defaults plus overrides
 *
 * @example
 * ```typescript
 * const config = buildConfig({ cache: { max_entries: 2 } });
 * ```
 */
export function buildConfig(overrides: DeepPartial<RuntimeConfig> = {}): RuntimeConfig {
  return validateConfig(deepMerge(DEFAULT_CONFIG, overrides));
}

/**
 * Component options derived from a validated configuration
 */
export interface RuntimeOptions {
  cache: {
    maxEntries: number;
    defaultTtlSeconds: number;
  };
  trails: {
    reinforcementAmount: number;
    weightCeiling: number;
    decayFactor: number;
    decayIntervalMs: number;
    pruneFloor: number;
    smellVolumeThreshold: number;
    smellThrashingIntervalMs: number;
    volumeRecentWindowMs: number;
    volumeSustainedWindowMs: number;
  };
  health: {
    windowMs: number;
    bucketMs: number;
    softErrorRate: number;
    hardErrorRate: number;
    softResourcePercent: number;
    hardResourcePercent: number;
    diskPath: string;
  };
  scheduler: {
    tickIntervalMs: number;
    jobs: {
      healthSnapshot: IntervalSpec;
      cacheCleanup: IntervalSpec;
      trailDecay: IntervalSpec;
    };
  };
  watchdog: {
    enabled: boolean;
    checkIntervalMs: number;
    maxRecoveryAttempts: number;
    recoveryInitialDelayMs: number;
    recoveryMaxDelayMs: number;
    storePath: string | null;
    debounceMs: number;
  };
  scaling: ScalingThresholds;
  operationSmells: {
    maxResultLimit: number;
    maxBatchSize: number;
    maxFilterLength: number;
    maxHistory: number;
  };
  logLevel: LevelWithSilent;
}

/**
 * Map snake_case configuration to camelCase component options
 */
export function toRuntimeOptions(config: RuntimeConfig): RuntimeOptions {
  return {
    cache: {
      maxEntries: config.cache.max_entries,
      defaultTtlSeconds: config.cache.default_ttl_seconds,
    },
    trails: {
      reinforcementAmount: config.trails.reinforcement_amount,
      weightCeiling: config.trails.weight_ceiling,
      decayFactor: config.trails.decay_factor,
      decayIntervalMs: config.trails.decay_interval_ms,
      pruneFloor: config.trails.prune_floor,
      smellVolumeThreshold: config.trails.smell.volume_threshold,
      smellThrashingIntervalMs: config.trails.smell.thrashing_interval_ms,
      volumeRecentWindowMs: config.trails.volume.recent_window_ms,
      volumeSustainedWindowMs: config.trails.volume.sustained_window_ms,
    },
    health: {
      windowMs: config.health.window_ms,
      bucketMs: config.health.bucket_ms,
      softErrorRate: config.health.soft_error_rate,
      hardErrorRate: config.health.hard_error_rate,
      softResourcePercent: config.health.soft_resource_percent,
      hardResourcePercent: config.health.hard_resource_percent,
      diskPath: config.health.disk_path,
    },
    scheduler: {
      tickIntervalMs: config.scheduler.tick_interval_ms,
      jobs: {
        healthSnapshot: config.scheduler.jobs.health_snapshot,
        cacheCleanup: config.scheduler.jobs.cache_cleanup,
        trailDecay: config.scheduler.jobs.trail_decay,
      },
    },
    watchdog: {
      enabled: config.watchdog.enabled,
      checkIntervalMs: config.watchdog.check_interval_ms,
      maxRecoveryAttempts: config.watchdog.max_recovery_attempts,
      recoveryInitialDelayMs: config.watchdog.recovery_initial_delay_ms,
      recoveryMaxDelayMs: config.watchdog.recovery_max_delay_ms,
      storePath: config.watchdog.store_path,
      debounceMs: config.watchdog.debounce_ms,
    },
    scaling: {
      softResourcePercent: config.scaling.soft_resource_percent,
      hardResourcePercent: config.scaling.hard_resource_percent,
      idleResourcePercent: config.scaling.idle_resource_percent,
      risingMargin: config.scaling.rising_margin,
      lowVolumePerMinute: config.scaling.low_volume_per_minute,
    },
    operationSmells: {
      maxResultLimit: config.operation_smells.max_result_limit,
      maxBatchSize: config.operation_smells.max_batch_size,
      maxFilterLength: config.operation_smells.max_filter_length,
      maxHistory: config.operation_smells.max_history,
    },
    logLevel: config.logging.level,
  };
}
