/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration, with cross-field
 * validation. Every option is required: a missing or invalid value is a
 * ConfigurationError, never a silent default.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { ConfigurationError } from '../../api/errors.js';
import { parseIntervalSpec } from '../../scheduling/interval-spec.js';

/**
 * Interval specification (milliseconds, duration string, alias or cron)
 */
export const IntervalSpecSchema = z
  .union([z.number().int().positive('must be positive'), z.string().min(1, 'cannot be empty')])
  .superRefine((value, ctx) => {
    try {
      parseIntervalSpec(value);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) {
        throw err;
      }
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
    }
  });

/**
 * Result Cache Configuration
 */
export const CacheConfigSchema = z.object({
  max_entries: z.number().int().positive('Max entries must be positive'),
  default_ttl_seconds: z.number().positive('Default TTL must be positive'),
});

/**
 * Trail Tracker Configuration
 */
export const TrailsConfigSchema = z
  .object({
    reinforcement_amount: z.number().positive('must be positive'),
    weight_ceiling: z.number().positive('must be positive'),
    decay_factor: z.number().gt(0, 'must be > 0').lt(1, 'must be < 1'),
    decay_interval_ms: z.number().int().positive('must be positive'),
    prune_floor: z.number().min(0, 'must be >= 0'),
    smell: z.object({
      volume_threshold: z.number().int().min(1, 'must be >= 1'),
      thrashing_interval_ms: z.number().int().positive('must be positive'),
    }),
    volume: z
      .object({
        recent_window_ms: z.number().int().min(60_000, 'must be >= 60000ms'),
        sustained_window_ms: z.number().int().min(60_000, 'must be >= 60000ms'),
      })
      .refine((data) => data.sustained_window_ms >= data.recent_window_ms, {
        message: 'must be >= recent_window_ms',
        path: ['sustained_window_ms'],
      }),
  })
  .refine((data) => data.prune_floor < data.weight_ceiling, {
    message: 'must be < weight_ceiling',
    path: ['prune_floor'],
  });

/**
 * Health Aggregator Configuration
 */
export const HealthConfigSchema = z
  .object({
    window_ms: z.number().int().positive('Window must be positive'),
    bucket_ms: z.number().int().positive('Bucket must be positive'),
    soft_error_rate: z.number().gt(0, 'must be > 0').max(1, 'must be <= 1'),
    hard_error_rate: z.number().gt(0, 'must be > 0').max(1, 'must be <= 1'),
    soft_resource_percent: z.number().gt(0, 'must be > 0').max(100, 'must be <= 100'),
    hard_resource_percent: z.number().gt(0, 'must be > 0').max(100, 'must be <= 100'),
    disk_path: z.string().min(1, 'Disk path cannot be empty'),
  })
  .refine((data) => data.bucket_ms <= data.window_ms, {
    message: 'must be <= window_ms',
    path: ['bucket_ms'],
  })
  .refine((data) => data.soft_error_rate < data.hard_error_rate, {
    message: 'must be < hard_error_rate',
    path: ['soft_error_rate'],
  })
  .refine((data) => data.soft_resource_percent < data.hard_resource_percent, {
    message: 'must be < hard_resource_percent',
    path: ['soft_resource_percent'],
  });

/**
 * Maintenance Scheduler Configuration
 */
export const SchedulerConfigSchema = z.object({
  tick_interval_ms: z.number().int().positive('Tick interval must be positive'),
  jobs: z.object({
    health_snapshot: IntervalSpecSchema,
    cache_cleanup: IntervalSpecSchema,
    trail_decay: IntervalSpecSchema,
  }),
});

/**
 * Store Watchdog Configuration
 */
export const WatchdogConfigSchema = z
  .object({
    enabled: z.boolean(),
    check_interval_ms: z.number().int().positive('must be positive'),
    max_recovery_attempts: z.number().int().min(1, 'must be >= 1'),
    recovery_initial_delay_ms: z.number().int().min(0, 'must be >= 0'),
    recovery_max_delay_ms: z.number().int().positive('must be positive'),
    store_path: z.string().min(1, 'Store path cannot be empty').nullable(),
    debounce_ms: z.number().int().min(0, 'must be >= 0'),
  })
  .refine((data) => data.recovery_max_delay_ms >= data.recovery_initial_delay_ms, {
    message: 'must be >= recovery_initial_delay_ms',
    path: ['recovery_max_delay_ms'],
  });

/**
 * Scaling Advisor Configuration
 */
export const ScalingConfigSchema = z
  .object({
    soft_resource_percent: z.number().gt(0, 'must be > 0').max(100, 'must be <= 100'),
    hard_resource_percent: z.number().gt(0, 'must be > 0').max(100, 'must be <= 100'),
    idle_resource_percent: z.number().gt(0, 'must be > 0').max(100, 'must be <= 100'),
    rising_margin: z.number().min(0, 'must be >= 0'),
    low_volume_per_minute: z.number().min(0, 'must be >= 0'),
  })
  .refine((data) => data.idle_resource_percent < data.soft_resource_percent, {
    message: 'must be < soft_resource_percent',
    path: ['idle_resource_percent'],
  })
  .refine((data) => data.soft_resource_percent < data.hard_resource_percent, {
    message: 'must be < hard_resource_percent',
    path: ['soft_resource_percent'],
  });

/**
 * Operation Smell Configuration
 */
export const OperationSmellsConfigSchema = z.object({
  max_result_limit: z.number().int().positive('must be positive'),
  max_batch_size: z.number().int().positive('must be positive'),
  max_filter_length: z.number().int().positive('must be positive'),
  max_history: z.number().int().positive('must be positive'),
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
});

/**
 * Runtime Configuration Schema
 *
 * Defines the complete structure for runtime.yaml (after environment
 * overrides are merged in).
 */
export const RuntimeConfigSchema = z.object({
  cache: CacheConfigSchema,
  trails: TrailsConfigSchema,
  health: HealthConfigSchema,
  scheduler: SchedulerConfigSchema,
  watchdog: WatchdogConfigSchema,
  scaling: ScalingConfigSchema,
  operation_smells: OperationSmellsConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * Shape of the YAML file before environment overrides are merged
 *
 * Overrides are only checked for being objects here; the merged result is
 * validated as a whole.
 */
export const RuntimeConfigFileSchema = z
  .object({
    environments: z
      .object({
        production: z.record(z.unknown()).optional(),
        development: z.record(z.unknown()).optional(),
        test: z.record(z.unknown()).optional(),
      })
      .optional(),
  })
  .passthrough();

/**
 * Type inference for RuntimeConfig
 */
export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

export type RuntimeEnvironment = 'production' | 'development' | 'test';
