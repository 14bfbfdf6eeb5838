/**
 * Trail Tracker Types
 *
 * @module types/trails
 */

import type { OperationKind } from './store.js';

/**
 * Descriptive metadata attached to a trail on first observation
 */
export interface TrailMetadata {
  operationKind?: OperationKind;
  target?: string;
  firstSeenAt?: number;
}

/**
 * Reinforcement trail for one (scope, pattern) pair
 */
export interface Trail {
  scope: string;
  pattern: string;
  weight: number;
  hitCount: number;
  firstReinforcedAt: number;
  lastReinforcedAt: number;
  /** Time of the last decay sweep that touched this trail */
  lastDecayedAt: number | null;
  metadata: TrailMetadata;
}

/**
 * Entry of a hot-trail ranking
 */
export interface HotTrail {
  pattern: string;
  weight: number;
  hitCount: number;
  lastReinforcedAt: number;
  metadata: TrailMetadata;
}

/**
 * Trail flagged as thrashing: many identical operations in rapid succession
 */
export interface TrailSmell {
  kind: 'thrashing';
  scope: string;
  pattern: string;
  hitCount: number;
  averageIntervalMs: number;
  suggestion: string;
}

/**
 * Result of a decay sweep
 */
export interface DecayResult {
  decayed: number;
  pruned: number;
  /** Most decay cycles applied to a single trail in this sweep (0 without trails) */
  cycles: number;
}

/**
 * Global operation volume derived from reinforcement counts
 */
export interface VolumeSignal {
  /** Reinforcements per minute over the recent window */
  recentPerMinute: number;

  /** Reinforcements per minute over the window preceding the recent one */
  previousPerMinute: number;

  /** Highest per-minute rate over the sustained window */
  sustainedPeakPerMinute: number;

  /** Whether the tracker has existed for the whole sustained window */
  coversSustainedWindow: boolean;

  /** Trails currently held across all scopes */
  activeTrails: number;
}

/**
 * Per-scope usage summary
 */
export interface ScopeTrailSummary {
  scope: string;
  trailCount: number;
  totalHits: number;
  hitsByOperation: Partial<Record<OperationKind, number>>;
  topTarget: string | null;
}
