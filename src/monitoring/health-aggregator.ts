/**
 * Health Aggregator
 *
 * Counts store operations, errors and latencies in a rolling window of time
 * buckets, holds the latest host resource snapshot, and classifies overall
 * health:
 *
 * - unhealthy: error rate >= hard ceiling, any resource >= hard ceiling,
 *   or the backing store escalated as unreachable by the watchdog
 * - degraded: error rate or any resource >= soft ceiling
 * - healthy: otherwise
 *
 * record() and status() are synchronous, so a report is always built from
 * a consistent view of the counters.
 */

import type { Logger } from 'pino';
import type { OperationKind } from '../types/store.js';
import type {
  BackendHealthSink,
  BackendState,
  HealthReport,
  HealthStatus,
  HealthWindowTotals,
  LastErrorInfo,
  ResourceSnapshot,
} from '../types/health.js';
import type { ResourceSampler } from './resource-sampler.js';
import { RollingWindow } from '../utils/rolling-window.js';
import { formatPercent, safeDivide } from '../utils/math-helpers.js';

/**
 * Health aggregator configuration
 */
export interface HealthAggregatorConfig {
  /** Rolling window the error rate is computed over (milliseconds) */
  windowMs: number;

  /** Bucket width inside the window (milliseconds) */
  bucketMs: number;

  /** Error ratio (0-1) at which health becomes degraded */
  softErrorRate: number;

  /** Error ratio (0-1) at which health becomes unhealthy */
  hardErrorRate: number;

  /** Resource percentage (0-100) at which health becomes degraded */
  softResourcePercent: number;

  /** Resource percentage (0-100) at which health becomes unhealthy */
  hardResourcePercent: number;

  /** Source of host resource snapshots */
  sampler: ResourceSampler;

  /** Optional logical clock; defaults to Date.now() */
  now?: () => number;

  /** Logger instance (optional) */
  logger?: Logger;
}

interface HealthBucket {
  query: number;
  insert: number;
  update: number;
  delete: number;
  errors: number;
  latencySumMs: number;
  latencyMaxMs: number;
  targets: Set<string>;
}

const SEVERITY: Record<HealthStatus, number> = { healthy: 0, degraded: 1, unhealthy: 2 };

function worse(a: HealthStatus, b: HealthStatus): HealthStatus {
  return SEVERITY[b] > SEVERITY[a] ? b : a;
}

/**
 * Format uptime as `1d 2h 3m 4s` (zero-valued leading units omitted)
 */
export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${secs}s`);

  return parts.join(' ');
}

export class HealthAggregator implements BackendHealthSink {
  private readonly config: HealthAggregatorConfig;
  private readonly now: () => number;
  private readonly logger?: Logger;
  private readonly startedAt: number;
  private readonly window: RollingWindow<HealthBucket>;

  private resources: ResourceSnapshot | null = null;
  private lastError: LastErrorInfo | null = null;
  private backend: BackendState = { reachable: true, reason: null, since: null };

  constructor(config: HealthAggregatorConfig) {
    this.config = config;
    this.now = config.now ?? Date.now;
    this.logger = config.logger;
    this.startedAt = this.now();

    this.window = new RollingWindow<HealthBucket>({
      spanMs: config.windowMs,
      bucketMs: config.bucketMs,
      create: () => ({
        query: 0,
        insert: 0,
        update: 0,
        delete: 0,
        errors: 0,
        latencySumMs: 0,
        latencyMaxMs: 0,
        targets: new Set<string>(),
      }),
      now: this.now,
    });
  }

  /**
   * Record one store operation in the current bucket
   *
   * @param target - Collection the operation addressed, when known
   */
  public record(
    kind: OperationKind,
    durationMs: number,
    success: boolean,
    errorMessage?: string,
    target?: string
  ): void {
    const bucket = this.window.current();
    bucket[kind]++;
    if (target !== undefined) {
      bucket.targets.add(target);
    }
    bucket.latencySumMs += durationMs;
    if (durationMs > bucket.latencyMaxMs) {
      bucket.latencyMaxMs = durationMs;
    }

    if (!success) {
      bucket.errors++;
      this.lastError = {
        message: errorMessage ?? `${kind} operation failed`,
        timestamp: new Date(this.now()).toISOString(),
      };
    }
  }

  /**
   * Capture host resource utilization
   *
   * The sampler is awaited before any state changes; the snapshot is then
   * swapped in a single assignment.
   */
  public async snapshotResources(): Promise<ResourceSnapshot> {
    const snapshot = await this.config.sampler.sample();
    this.resources = snapshot;

    this.logger?.debug(
      {
        cpuPercent: snapshot.cpuPercent,
        memoryPercent: snapshot.memoryPercent,
        diskPercent: snapshot.diskPercent,
      },
      'Resource snapshot captured'
    );

    return snapshot;
  }

  public getResources(): ResourceSnapshot | null {
    return this.resources ? { ...this.resources } : null;
  }

  /**
   * Totals over the rolling window
   */
  public windowTotals(): HealthWindowTotals {
    const totals = {
      queries: 0,
      inserts: 0,
      updates: 0,
      deletes: 0,
      errors: 0,
      latencySumMs: 0,
      maxLatencyMs: 0,
    };
    const targets = new Set<string>();

    for (const bucket of this.window.values(this.config.windowMs)) {
      totals.queries += bucket.query;
      totals.inserts += bucket.insert;
      totals.updates += bucket.update;
      totals.deletes += bucket.delete;
      totals.errors += bucket.errors;
      totals.latencySumMs += bucket.latencySumMs;
      totals.maxLatencyMs = Math.max(totals.maxLatencyMs, bucket.latencyMaxMs);
      for (const target of bucket.targets) {
        targets.add(target);
      }
    }

    const operations = totals.queries + totals.inserts + totals.updates + totals.deletes;

    return {
      windowMs: this.config.windowMs,
      queries: totals.queries,
      inserts: totals.inserts,
      updates: totals.updates,
      deletes: totals.deletes,
      errors: totals.errors,
      operations,
      errorRate: safeDivide(totals.errors, operations),
      avgLatencyMs: safeDivide(totals.latencySumMs, operations),
      maxLatencyMs: totals.maxLatencyMs,
      collectionsAccessed: targets.size,
    };
  }

  /**
   * Classify health and list the issues behind it
   */
  public status(): HealthReport {
    const window = this.windowTotals();
    const issues: string[] = [];
    let status: HealthStatus = 'healthy';

    const { softErrorRate, hardErrorRate, softResourcePercent, hardResourcePercent } = this.config;

    if (window.errorRate >= hardErrorRate) {
      status = worse(status, 'unhealthy');
      issues.push(
        `Error rate ${formatPercent(window.errorRate)} at or above hard ceiling ${formatPercent(hardErrorRate)}`
      );
    } else if (window.errorRate >= softErrorRate) {
      status = worse(status, 'degraded');
      issues.push(`High error rate: ${formatPercent(window.errorRate)}`);
    }

    if (this.resources) {
      const metrics: Array<[string, number]> = [
        ['CPU', this.resources.cpuPercent],
        ['memory', this.resources.memoryPercent],
        ['disk', this.resources.diskPercent],
      ];

      for (const [label, percent] of metrics) {
        if (percent >= hardResourcePercent) {
          status = worse(status, 'unhealthy');
          issues.push(`Critical ${label} usage: ${percent.toFixed(1)}%`);
        } else if (percent >= softResourcePercent) {
          status = worse(status, 'degraded');
          issues.push(`High ${label} usage: ${percent.toFixed(1)}%`);
        }
      }
    }

    if (!this.backend.reachable) {
      status = 'unhealthy';
      issues.push(`Backing store unreachable: ${this.backend.reason ?? 'unknown reason'}`);
    }

    const uptimeSeconds = this.uptimeSeconds();

    return {
      status,
      issues,
      uptimeSeconds,
      uptimeHuman: formatUptime(uptimeSeconds),
      window,
      resources: this.getResources(),
      lastError: this.lastError ? { ...this.lastError } : null,
      backend: { ...this.backend },
      timestamp: new Date(this.now()).toISOString(),
    };
  }

  public uptimeSeconds(): number {
    return (this.now() - this.startedAt) / 1000;
  }

  public reportBackendUnavailable(reason: string): void {
    if (this.backend.reachable) {
      this.logger?.error({ reason }, 'Backing store marked unreachable');
    }
    this.backend = {
      reachable: false,
      reason,
      since: this.backend.reachable ? this.now() : this.backend.since,
    };
  }

  public reportBackendRecovered(): void {
    if (!this.backend.reachable) {
      this.logger?.info(
        { downForMs: this.backend.since === null ? null : this.now() - this.backend.since },
        'Backing store reachable again'
      );
    }
    this.backend = { reachable: true, reason: null, since: null };
  }

  /**
   * Drop counters and the last error (resource snapshot and backend state stay)
   */
  public reset(): void {
    this.window.reset();
    this.lastError = null;
  }
}
