/**
 * Adaptive Runtime
 *
 * Public entry points over the runtime components. Components are built
 * once by createAdaptiveRuntime() and passed in by reference; the facade
 * holds no module-level state.
 *
 * Boundary validation happens here: the components themselves are total
 * over well-shaped input.
 */

import type { Logger } from 'pino';
import type { CacheStats } from '../types/cache.js';
import type { HealthReport } from '../types/health.js';
import type { ScalingRecommendation, ScalingThresholds } from '../types/scaling.js';
import type { IntervalSpec, JobAction, JobRunReport, JobSnapshot } from '../types/scheduling.js';
import type { OperationSmell, OperationSmellReport } from '../types/smells.js';
import type { OperationKind, OperationShape } from '../types/store.js';
import type { HotTrail, ScopeTrailSummary, TrailSmell } from '../types/trails.js';
import type { RuntimeConfig } from '../types/schemas/config.js';
import { ResultCache } from '../core/result-cache.js';
import { TrailTracker } from '../core/trail-tracker.js';
import { OperationSmellMonitor } from '../core/operation-smells.js';
import { patternSignature } from '../core/pattern-signature.js';
import { HealthAggregator } from '../monitoring/health-aggregator.js';
import { HostResourceSampler, type ResourceSampler } from '../monitoring/resource-sampler.js';
import { MaintenanceScheduler } from '../scheduling/maintenance-scheduler.js';
import { FileStoreProbe, StoreWatchdog, type StoreProbe } from '../scheduling/store-watchdog.js';
import { recommendScaling } from '../scaling/scaling-advisor.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { toRuntimeOptions, validateConfig } from '../config/loader.js';
import { createLogger } from '../utils/logger.js';
import { ConfigurationError, createValidationError } from '../api/errors.js';
import {
  assertCacheInvalidate,
  assertCacheLookup,
  assertHotTrailsQuery,
  assertJobName,
  assertRecordOperation,
  assertScope,
} from '../api/validators.js';

/**
 * Components the runtime delegates to
 */
export interface AdaptiveRuntimeComponents<V> {
  cache: ResultCache<V>;
  trails: TrailTracker;
  health: HealthAggregator;
  scheduler: MaintenanceScheduler;
  smells: OperationSmellMonitor;
  scalingThresholds: ScalingThresholds;
  watchdog?: StoreWatchdog;
  logger?: Logger;
}

/**
 * Outcome of recordOperation()
 */
export interface RecordedOperation {
  /** Trail key the operation reinforced */
  pattern: string;

  /** Trail weight after reinforcement */
  weight: number;

  /** Shape smells raised by this operation */
  smells: OperationSmell[];
}

const SCOPE_SEPARATOR = '\u0000';

export class AdaptiveRuntime<V = unknown> {
  private readonly cache: ResultCache<V>;
  private readonly trails: TrailTracker;
  private readonly health: HealthAggregator;
  private readonly scheduler: MaintenanceScheduler;
  private readonly smells: OperationSmellMonitor;
  private readonly scalingThresholds: ScalingThresholds;
  private readonly watchdog?: StoreWatchdog;
  private readonly logger?: Logger;

  /** Computations in flight, keyed by scope + key */
  private readonly inFlight = new Map<string, Promise<V>>();

  /** Scopes with computations pending; the generation is bumped on invalidation */
  private readonly scopeFills = new Map<string, { pending: number; generation: number }>();

  constructor(components: AdaptiveRuntimeComponents<V>) {
    this.cache = components.cache;
    this.trails = components.trails;
    this.health = components.health;
    this.scheduler = components.scheduler;
    this.smells = components.smells;
    this.scalingThresholds = components.scalingThresholds;
    this.watchdog = components.watchdog;
    this.logger = components.logger;
  }

  /**
   * Return the cached value, or compute, cache and return it
   *
   * Concurrent misses on the same key share one computation. A value
   * computed while its scope was invalidated is returned but not cached.
   * A failed computation caches nothing and rejects every waiter.
   *
   * @throws AdaptiveRuntimeError (ValidationError) on an empty scope or key,
   *   or a TTL that is not positive
   */
  public async cacheLookupOrCompute(
    scope: string,
    key: string,
    ttlSeconds: number | undefined,
    compute: () => V | Promise<V>
  ): Promise<V> {
    assertCacheLookup(scope, key, ttlSeconds);

    const lookup = this.cache.get(scope, key);
    if (lookup.hit) {
      return lookup.value;
    }

    const id = `${scope}${SCOPE_SEPARATOR}${key}`;
    const pending = this.inFlight.get(id);
    if (pending) {
      return pending;
    }

    const fills = this.scopeFills.get(scope) ?? { pending: 0, generation: 0 };
    fills.pending++;
    this.scopeFills.set(scope, fills);

    const generation = fills.generation;
    const run: Promise<V> = (async () => {
      const value = await compute();
      if (fills.generation === generation) {
        this.cache.set(scope, key, value, ttlSeconds);
      } else {
        this.logger?.debug({ scope }, 'Scope invalidated during computation, result not cached');
      }
      return value;
    })().finally(() => {
      if (this.inFlight.get(id) === run) {
        this.inFlight.delete(id);
      }
      fills.pending--;
      if (fills.pending === 0) {
        this.scopeFills.delete(scope);
      }
    });

    this.inFlight.set(id, run);
    return run;
  }

  /**
   * Invalidate one cached key, or the whole scope
   *
   * @returns Number of entries removed
   */
  public invalidate(scope: string, key?: string): number {
    assertCacheInvalidate(scope, key);

    const fills = this.scopeFills.get(scope);
    if (fills) {
      fills.generation++;
    }
    const prefix = `${scope}${SCOPE_SEPARATOR}`;
    for (const id of Array.from(this.inFlight.keys())) {
      if (key === undefined ? id.startsWith(prefix) : id === `${prefix}${key}`) {
        this.inFlight.delete(id);
      }
    }

    return this.cache.invalidate(scope, key);
  }

  /**
   * Report one store operation to the health, trail and smell layers
   *
   * `pattern` is either a ready-made signature or an operation shape, from
   * which the signature is derived and shape smells are checked.
   */
  public recordOperation(
    scope: string,
    kind: OperationKind,
    durationMs: number,
    success: boolean,
    pattern: string | OperationShape,
    errorMessage?: string
  ): RecordedOperation {
    assertRecordOperation(scope, kind, durationMs, success, pattern);

    const shape = typeof pattern === 'string' ? null : pattern;
    this.health.record(kind, durationMs, success, errorMessage, shape?.target);

    const signature = typeof pattern === 'string' ? pattern : patternSignature(kind, pattern);
    const trail = this.trails.reinforce(scope, signature, {
      operationKind: kind,
      ...(shape && { target: shape.target }),
    });
    const smells = shape ? this.smells.analyze(scope, kind, shape) : [];

    return { pattern: signature, weight: trail.weight, smells };
  }

  public getHealth(): HealthReport {
    return this.health.status();
  }

  public getHotTrails(scope: string, limit: number): HotTrail[] {
    assertHotTrailsQuery(scope, limit);
    return this.trails.hotTrails(scope, limit);
  }

  public getSmells(scope: string): TrailSmell[] {
    assertScope(scope);
    return this.trails.detectSmells(scope);
  }

  /**
   * Shape smell totals, for one scope or all of them
   */
  public getSmellReport(scope?: string): OperationSmellReport {
    if (scope !== undefined) {
      assertScope(scope);
    }
    return this.smells.getReport(scope);
  }

  public getScopeSummary(scope: string): ScopeTrailSummary {
    assertScope(scope);
    return this.trails.scopeSummary(scope);
  }

  public getCacheStats(scope?: string): CacheStats {
    return this.cache.getStats(scope);
  }

  /**
   * Recommendation from the latest health and volume snapshots
   *
   * Never cached: every call reads the current state.
   */
  public getScalingRecommendation(): ScalingRecommendation {
    const report = this.health.status();
    return recommendScaling(
      {
        health: { status: report.status, resources: report.resources },
        volume: this.trails.volumeSignal(),
      },
      this.scalingThresholds
    );
  }

  /**
   * @throws AdaptiveRuntimeError (DuplicateJob) when the name is taken
   * @throws AdaptiveRuntimeError (ValidationError) on an empty name or an
   *   unparseable interval
   */
  public scheduleJob(name: string, intervalSpec: IntervalSpec, action: JobAction): JobSnapshot {
    assertJobName(name);
    try {
      return this.scheduler.schedule(name, intervalSpec, action);
    } catch (err) {
      if (err instanceof ConfigurationError) {
        throw createValidationError(err.message, { field: 'intervalSpec' });
      }
      throw err;
    }
  }

  /**
   * Computations still pending, including ones detached by an invalidation
   */
  public getPendingFills(): { scopes: number; computations: number } {
    let computations = 0;
    for (const fills of this.scopeFills.values()) {
      computations += fills.pending;
    }
    return { scopes: this.scopeFills.size, computations };
  }

  public unscheduleJob(name: string): boolean {
    return this.scheduler.unschedule(name);
  }

  public listJobs(): JobSnapshot[] {
    return this.scheduler.listJobs();
  }

  /**
   * Run a job immediately, outside its schedule
   *
   * @returns null when the job is unknown or already running
   */
  public runJobNow(name: string): Promise<JobRunReport | null> {
    return this.scheduler.runNow(name);
  }

  public getScheduler(): MaintenanceScheduler {
    return this.scheduler;
  }

  public getWatchdog(): StoreWatchdog | undefined {
    return this.watchdog;
  }

  public start(): void {
    this.scheduler.start();
  }

  /**
   * Stop the maintenance loop and the watchdog, waiting for work in flight
   */
  public async stop(): Promise<void> {
    await this.scheduler.stop();
  }
}

/**
 * Collaborators supplied by the host process
 */
export interface CreateAdaptiveRuntimeOptions {
  /** Validated again on construction; defaults to DEFAULT_CONFIG */
  config?: RuntimeConfig;

  /** Logical clock shared by every component */
  now?: () => number;

  logger?: Logger;

  /** Resource source; defaults to host metrics */
  sampler?: ResourceSampler;

  /** Watchdog probe; defaults to a file probe on watchdog.store_path */
  probe?: StoreProbe;

  /** Recovery action; required when the watchdog is enabled */
  recover?: () => void | Promise<void>;

  /** Backoff sleep of the watchdog; replaced in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const DEFAULT_JOB_NAMES = {
  healthSnapshot: 'health-snapshot',
  cacheCleanup: 'cache-cleanup',
  trailDecay: 'trail-decay',
} as const;

/**
 * Build the components, register the default maintenance jobs and attach
 * the watchdog
 *
 * The loop is not started; call start() on the returned runtime.
 *
 * @throws ConfigurationError on invalid configuration, or an enabled
 *   watchdog without a probe or recovery action
 */
export function createAdaptiveRuntime<V = unknown>(
  options: CreateAdaptiveRuntimeOptions = {}
): AdaptiveRuntime<V> {
  const config = validateConfig(options.config ?? DEFAULT_CONFIG);
  const opts = toRuntimeOptions(config);
  const now = options.now ?? Date.now;
  const logger = options.logger ?? createLogger('AdaptiveRuntime', opts.logLevel);

  const cache = new ResultCache<V>({
    ...opts.cache,
    now,
    logger: logger.child({ component: 'ResultCache' }),
  });
  const trails = new TrailTracker({
    ...opts.trails,
    now,
    logger: logger.child({ component: 'TrailTracker' }),
  });
  const smells = new OperationSmellMonitor({
    ...opts.operationSmells,
    now,
    logger: logger.child({ component: 'OperationSmellMonitor' }),
  });
  const health = new HealthAggregator({
    windowMs: opts.health.windowMs,
    bucketMs: opts.health.bucketMs,
    softErrorRate: opts.health.softErrorRate,
    hardErrorRate: opts.health.hardErrorRate,
    softResourcePercent: opts.health.softResourcePercent,
    hardResourcePercent: opts.health.hardResourcePercent,
    sampler:
      options.sampler ??
      new HostResourceSampler({ diskPath: opts.health.diskPath, now, logger: logger.child({ component: 'ResourceSampler' }) }),
    now,
    logger: logger.child({ component: 'HealthAggregator' }),
  });
  const scheduler = new MaintenanceScheduler({
    tickIntervalMs: opts.scheduler.tickIntervalMs,
    now,
    logger: logger.child({ component: 'MaintenanceScheduler' }),
  });

  scheduler.schedule(DEFAULT_JOB_NAMES.healthSnapshot, opts.scheduler.jobs.healthSnapshot, async () => {
    await health.snapshotResources();
    const report = health.status();
    if (report.status !== 'healthy') {
      logger.warn({ status: report.status, issues: report.issues }, 'Health check reported issues');
    }
  });
  scheduler.schedule(DEFAULT_JOB_NAMES.cacheCleanup, opts.scheduler.jobs.cacheCleanup, () => {
    const removed = cache.cleanup();
    logger.debug({ removed, remaining: cache.size }, 'Cache cleanup completed');
  });
  scheduler.schedule(DEFAULT_JOB_NAMES.trailDecay, opts.scheduler.jobs.trailDecay, () => {
    trails.decay();
  });

  let watchdog: StoreWatchdog | undefined;
  if (opts.watchdog.enabled) {
    const storePath = opts.watchdog.storePath;
    const probe =
      options.probe ??
      (storePath === null ? undefined : new FileStoreProbe(storePath, { debounceMs: opts.watchdog.debounceMs, now }));
    if (!probe) {
      throw new ConfigurationError('watchdog.enabled requires watchdog.store_path or a probe', [
        'watchdog.store_path is required when no probe is supplied',
      ]);
    }
    if (!options.recover) {
      throw new ConfigurationError('watchdog.enabled requires a recovery action', [
        'recover is required when the watchdog is enabled',
      ]);
    }

    watchdog = new StoreWatchdog({
      checkIntervalMs: opts.watchdog.checkIntervalMs,
      maxRecoveryAttempts: opts.watchdog.maxRecoveryAttempts,
      recoveryInitialDelayMs: opts.watchdog.recoveryInitialDelayMs,
      recoveryMaxDelayMs: opts.watchdog.recoveryMaxDelayMs,
      probe,
      recover: options.recover,
      sink: health,
      now,
      logger: logger.child({ component: 'StoreWatchdog' }),
      sleep: options.sleep,
    });
    scheduler.attachWatchdog(watchdog);
  }

  return new AdaptiveRuntime<V>({
    cache,
    trails,
    health,
    scheduler,
    smells,
    scalingThresholds: opts.scaling,
    watchdog,
    logger,
  });
}
