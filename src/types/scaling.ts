/**
 * Scaling Advisor Types
 *
 * @module types/scaling
 */

import type { HealthStatus, ResourceSnapshot } from './health.js';
import type { VolumeSignal } from './trails.js';

export type ScalingDirection = 'scale-up' | 'scale-down' | 'hold';

/**
 * Snapshot pair the advisor reads
 */
export interface ScalingInput {
  health: {
    status: HealthStatus;
    resources: ResourceSnapshot | null;
  };
  volume: VolumeSignal;
}

/**
 * Thresholds the advisor compares signals against
 */
export interface ScalingThresholds {
  /** Resource percentage where the degraded band starts */
  softResourcePercent: number;

  /** Resource percentage where the node counts as critical */
  hardResourcePercent: number;

  /** Resource percentage under which the node counts as idle */
  idleResourcePercent: number;

  /** Relative growth of the recent volume over the previous one that counts as rising */
  risingMargin: number;

  /** Per-minute peak rate at or under which volume counts as low */
  lowVolumePerMinute: number;
}

/**
 * Signals a recommendation was derived from
 */
export interface ScalingSignals {
  peakResourcePercent: number | null;
  peakResource: 'cpu' | 'memory' | 'disk' | null;
  volumeRising: boolean;
  volumeLowSustained: boolean;
  healthStatus: HealthStatus;
}

export interface ScalingRecommendation {
  direction: ScalingDirection;
  confidence: number;
  reasons: string[];
  signals: ScalingSignals;
}
