/**
 * Default Configuration
 *
 * Mirrors config/runtime.yaml (base section). Used when the runtime is
 * built in-process without a configuration file, and as the base that
 * buildConfig() merges overrides into.
 */

import type { RuntimeConfig } from '../types/schemas/config.js';

export const DEFAULT_CONFIG: RuntimeConfig = {
  cache: {
    max_entries: 1_000,
    default_ttl_seconds: 300, // 5 minutes
  },
  trails: {
    reinforcement_amount: 0.1,
    weight_ceiling: 1.0,
    decay_factor: 0.9,
    decay_interval_ms: 60_000,
    prune_floor: 0.01,
    smell: {
      volume_threshold: 20,
      thrashing_interval_ms: 1_000,
    },
    volume: {
      recent_window_ms: 300_000, // 5 minutes
      sustained_window_ms: 1_800_000, // 30 minutes
    },
  },
  health: {
    window_ms: 300_000,
    bucket_ms: 10_000,
    soft_error_rate: 0.1,
    hard_error_rate: 0.5,
    soft_resource_percent: 80,
    hard_resource_percent: 95,
    disk_path: '.',
  },
  scheduler: {
    tick_interval_ms: 1_000,
    jobs: {
      health_snapshot: '5m',
      cache_cleanup: 'hourly',
      trail_decay: 60_000,
    },
  },
  watchdog: {
    enabled: false,
    check_interval_ms: 30_000,
    max_recovery_attempts: 3,
    recovery_initial_delay_ms: 1_000,
    recovery_max_delay_ms: 30_000,
    store_path: null,
    debounce_ms: 5_000,
  },
  scaling: {
    soft_resource_percent: 80,
    hard_resource_percent: 95,
    idle_resource_percent: 30,
    rising_margin: 0.2,
    low_volume_per_minute: 5,
  },
  operation_smells: {
    max_result_limit: 100,
    max_batch_size: 1_000,
    max_filter_length: 500,
    max_history: 1_000,
  },
  logging: {
    level: 'info',
  },
};
