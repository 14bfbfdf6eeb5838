/**
 * Trail Tracker
 *
 * Learns which operation patterns are "hot" per scope. Each observation
 * reinforces the (scope, pattern) trail by a fixed amount, clamped to a
 * ceiling so bursty traffic cannot grow a weight without bound. The
 * maintenance loop calls decay() once per decay interval; trails whose
 * weight falls below the prune floor are dropped, which bounds memory to
 * active patterns.
 *
 * Trails that collect many hits at a very short average interval are
 * flagged as thrashing (the same operation repeated in rapid succession,
 * usually a caching or query-shape problem).
 */

import type { Logger } from 'pino';
import type {
  DecayResult,
  HotTrail,
  ScopeTrailSummary,
  Trail,
  TrailMetadata,
  TrailSmell,
  VolumeSignal,
} from '../types/trails.js';
import type { OperationKind } from '../types/store.js';
import { RollingWindow } from '../utils/rolling-window.js';
import { safeDivide, safeSum } from '../utils/math-helpers.js';

const MINUTE_MS = 60_000;

/**
 * Trail tracker configuration
 */
export interface TrailTrackerConfig {
  /** Weight added per reinforcement */
  reinforcementAmount: number;

  /** Ceiling a weight is clamped to on reinforcement */
  weightCeiling: number;

  /** Multiplicative factor applied per decay cycle (0 < factor < 1) */
  decayFactor: number;

  /** Length of one decay cycle (milliseconds) */
  decayIntervalMs: number;

  /** Trails below this weight are pruned during decay */
  pruneFloor: number;

  /** Smell heuristic: hit count a trail must exceed */
  smellVolumeThreshold: number;

  /** Smell heuristic: average interval (ms) under which hits count as thrashing */
  smellThrashingIntervalMs: number;

  /** Window of the "recent" volume rate (milliseconds) */
  volumeRecentWindowMs: number;

  /** Window over which volume must stay low to count as sustained (milliseconds) */
  volumeSustainedWindowMs: number;

  /** Optional logical clock; defaults to Date.now() */
  now?: () => number;

  /** Logger instance (optional) */
  logger?: Logger;
}

/**
 * Default trail tracker configuration
 */
export function createDefaultTrailConfig(): Omit<TrailTrackerConfig, 'now' | 'logger'> {
  return {
    reinforcementAmount: 0.1,
    weightCeiling: 1.0,
    decayFactor: 0.9,
    decayIntervalMs: 60_000,
    pruneFloor: 0.01,
    smellVolumeThreshold: 20,
    smellThrashingIntervalMs: 1_000,
    volumeRecentWindowMs: 5 * MINUTE_MS,
    volumeSustainedWindowMs: 30 * MINUTE_MS,
  };
}

interface VolumeBucket {
  count: number;
}

function compareHot(a: Trail, b: Trail): number {
  if (b.weight !== a.weight) {
    return b.weight - a.weight;
  }
  if (b.hitCount !== a.hitCount) {
    return b.hitCount - a.hitCount;
  }
  return b.lastReinforcedAt - a.lastReinforcedAt;
}

export class TrailTracker {
  private readonly config: TrailTrackerConfig;
  private readonly now: () => number;
  private readonly logger?: Logger;

  /** scope -> pattern -> trail */
  private readonly trails = new Map<string, Map<string, Trail>>();

  /** Per-minute reinforcement counts across all scopes */
  private readonly volume: RollingWindow<VolumeBucket>;

  private readonly createdAt: number;
  private trailCount = 0;

  constructor(config: TrailTrackerConfig) {
    this.config = config;
    this.now = config.now ?? Date.now;
    this.logger = config.logger;
    this.createdAt = this.now();

    this.volume = new RollingWindow<VolumeBucket>({
      spanMs: Math.max(config.volumeSustainedWindowMs, config.volumeRecentWindowMs * 2),
      bucketMs: MINUTE_MS,
      create: () => ({ count: 0 }),
      now: this.now,
    });
  }

  /**
   * Record an observation of a pattern
   *
   * @returns The trail after reinforcement
   */
  public reinforce(scope: string, pattern: string, metadata: TrailMetadata = {}): Trail {
    const now = this.now();
    let scoped = this.trails.get(scope);
    if (!scoped) {
      scoped = new Map();
      this.trails.set(scope, scoped);
    }

    let trail = scoped.get(pattern);
    if (!trail) {
      trail = {
        scope,
        pattern,
        weight: 0,
        hitCount: 0,
        firstReinforcedAt: now,
        lastReinforcedAt: now,
        lastDecayedAt: null,
        metadata: { ...metadata, firstSeenAt: now },
      };
      scoped.set(pattern, trail);
      this.trailCount++;
    }

    trail.weight = Math.min(this.config.weightCeiling, trail.weight + this.config.reinforcementAmount);
    trail.hitCount++;
    trail.lastReinforcedAt = now;

    this.volume.current().count++;

    return { ...trail, metadata: { ...trail.metadata } };
  }

  /**
   * Apply decay to every trail and prune the ones below the floor
   *
   * Each trail decays by decayFactor per decay interval elapsed since its
   * own last update (reinforcement or previous sweep), and by at least one
   * cycle per sweep. A trail reinforced just before a late sweep is charged
   * only for its own idle time.
   */
  public decay(): DecayResult {
    const now = this.now();

    let decayed = 0;
    let pruned = 0;
    let maxCycles = 0;

    for (const [scope, scoped] of this.trails) {
      for (const [pattern, trail] of scoped) {
        const updatedAt = Math.max(trail.lastReinforcedAt, trail.lastDecayedAt ?? trail.lastReinforcedAt);
        const cycles = Math.max(1, (now - updatedAt) / this.config.decayIntervalMs);
        maxCycles = Math.max(maxCycles, cycles);

        trail.weight *= Math.pow(this.config.decayFactor, cycles);
        trail.lastDecayedAt = now;

        if (trail.weight < this.config.pruneFloor) {
          scoped.delete(pattern);
          pruned++;
        } else {
          decayed++;
        }
      }
      if (scoped.size === 0) {
        this.trails.delete(scope);
      }
    }

    this.trailCount -= pruned;

    if (pruned > 0) {
      this.logger?.debug({ decayed, pruned, cycles: maxCycles }, 'Trail decay pruned stale patterns');
    }

    return { decayed, pruned, cycles: maxCycles };
  }

  /**
   * Hottest trails of a scope
   *
   * Ordered by weight (descending), then hitCount (descending), then most
   * recent reinforcement.
   */
  public hotTrails(scope: string, limit: number, minWeight = 0): HotTrail[] {
    const scoped = this.trails.get(scope);
    if (!scoped || limit <= 0) {
      return [];
    }

    return Array.from(scoped.values())
      .filter((trail) => trail.weight >= minWeight)
      .sort(compareHot)
      .slice(0, limit)
      .map((trail) => ({
        pattern: trail.pattern,
        weight: trail.weight,
        hitCount: trail.hitCount,
        lastReinforcedAt: trail.lastReinforcedAt,
        metadata: { ...trail.metadata },
      }));
  }

  /**
   * Flag thrashing patterns of a scope
   *
   * Heuristic: hitCount above smellVolumeThreshold while the average
   * interval between reinforcements is under smellThrashingIntervalMs.
   */
  public detectSmells(scope: string): TrailSmell[] {
    const scoped = this.trails.get(scope);
    if (!scoped) {
      return [];
    }

    const smells: TrailSmell[] = [];
    for (const trail of scoped.values()) {
      if (trail.hitCount <= this.config.smellVolumeThreshold) {
        continue;
      }

      const averageIntervalMs = safeDivide(
        trail.lastReinforcedAt - trail.firstReinforcedAt,
        trail.hitCount - 1
      );

      if (averageIntervalMs < this.config.smellThrashingIntervalMs) {
        smells.push({
          kind: 'thrashing',
          scope,
          pattern: trail.pattern,
          hitCount: trail.hitCount,
          averageIntervalMs,
          suggestion:
            trail.metadata.operationKind === 'query'
              ? 'Identical query repeated in rapid succession; cache the result or batch the callers'
              : 'Identical operation repeated in rapid succession; batch the writes',
        });
      }
    }

    return smells.sort((a, b) => b.hitCount - a.hitCount);
  }

  /**
   * Operation volume across all scopes
   */
  public volumeSignal(): VolumeSignal {
    const recentWindow = this.config.volumeRecentWindowMs;
    const recentMinutes = recentWindow / MINUTE_MS;

    const recent = safeSum(this.volume.values(recentWindow).map((b) => b.count));
    const previous = safeSum(this.volume.values(recentWindow, recentWindow).map((b) => b.count));
    const sustained = this.volume.values(this.config.volumeSustainedWindowMs).map((b) => b.count);

    return {
      recentPerMinute: safeDivide(recent, recentMinutes),
      previousPerMinute: safeDivide(previous, recentMinutes),
      sustainedPeakPerMinute: sustained.length > 0 ? Math.max(...sustained) : 0,
      coversSustainedWindow: this.now() - this.createdAt >= this.config.volumeSustainedWindowMs,
      activeTrails: this.trailCount,
    };
  }

  /**
   * Usage summary of a scope
   */
  public scopeSummary(scope: string): ScopeTrailSummary {
    const scoped = this.trails.get(scope);
    const hitsByOperation: Partial<Record<OperationKind, number>> = {};
    const hitsByTarget = new Map<string, number>();
    let totalHits = 0;

    for (const trail of scoped?.values() ?? []) {
      totalHits += trail.hitCount;
      const kind = trail.metadata.operationKind;
      if (kind) {
        hitsByOperation[kind] = (hitsByOperation[kind] ?? 0) + trail.hitCount;
      }
      const target = trail.metadata.target;
      if (target) {
        hitsByTarget.set(target, (hitsByTarget.get(target) ?? 0) + trail.hitCount);
      }
    }

    let topTarget: string | null = null;
    let topHits = 0;
    for (const [target, hits] of hitsByTarget) {
      if (hits > topHits) {
        topTarget = target;
        topHits = hits;
      }
    }

    return {
      scope,
      trailCount: scoped?.size ?? 0,
      totalHits,
      hitsByOperation,
      topTarget,
    };
  }

  /**
   * Current state of one trail (copy), if it exists
   */
  public getTrail(scope: string, pattern: string): Trail | undefined {
    const trail = this.trails.get(scope)?.get(pattern);
    return trail ? { ...trail, metadata: { ...trail.metadata } } : undefined;
  }

  public get size(): number {
    return this.trailCount;
  }
}
