/**
 * Store Watchdog
 *
 * Observes the backing store's liveness on its own timer, independent of
 * the job table. A failed probe triggers the recovery action (reconnect or
 * restart) under a bounded exponential backoff; each attempt is confirmed
 * by a re-probe. When every attempt fails the watchdog escalates into the
 * health sink (status becomes unhealthy) and keeps watching; a later
 * healthy probe clears the escalation.
 *
 * Probes and recovery actions are awaited outside any in-memory critical
 * section. stop() aborts a pending backoff sleep and waits for the check in
 * flight.
 */

import { stat } from 'node:fs/promises';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { BackendHealthSink } from '../types/health.js';
import { WatchdogFailureError } from '../api/errors.js';
import { TimerGuard } from '../utils/timer-guard.js';
import { RetryAbortedError, RetryExhaustedError, retryWithBackoff } from '../utils/retry.js';

export interface StoreProbeResult {
  ok: boolean;
  reason?: string;
  /** The store's backing file changed since the previous probe */
  changed?: boolean;
}

/**
 * Liveness check of the backing store
 */
export interface StoreProbe {
  probe(): Promise<StoreProbeResult>;
  describe(): string;
}

export interface FileStoreProbeOptions {
  /** Minimum time between two reported modifications (default: 5000) */
  debounceMs?: number;
  now?: () => number;
}

/**
 * Probe for file-backed stores: the file must exist. Modifications are
 * reported at most once per debounce window.
 */
export class FileStoreProbe implements StoreProbe {
  private readonly path: string;
  private readonly debounceMs: number;
  private readonly now: () => number;
  private lastMtimeMs: number | null = null;
  private lastChangeAt: number | null = null;

  constructor(path: string, options: FileStoreProbeOptions = {}) {
    this.path = path;
    this.debounceMs = options.debounceMs ?? 5000;
    this.now = options.now ?? Date.now;
  }

  public describe(): string {
    return `file:${this.path}`;
  }

  public async probe(): Promise<StoreProbeResult> {
    let mtimeMs: number;
    try {
      mtimeMs = (await stat(this.path)).mtimeMs;
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? String(err.code) : 'unknown';
      return {
        ok: false,
        reason: code === 'ENOENT' ? `Store file missing: ${this.path}` : `Store file unreadable (${code}): ${this.path}`,
      };
    }

    const previous = this.lastMtimeMs;
    this.lastMtimeMs = mtimeMs;
    if (previous === null || previous === mtimeMs) {
      return { ok: true };
    }

    const now = this.now();
    if (this.lastChangeAt !== null && now - this.lastChangeAt < this.debounceMs) {
      return { ok: true };
    }
    this.lastChangeAt = now;
    return { ok: true, changed: true };
  }
}

/**
 * Probe wrapping a ping function (connection-backed stores)
 *
 * The ping resolves `true` when reachable; `false` or a rejection counts
 * as unreachable.
 */
export class CallbackStoreProbe implements StoreProbe {
  private readonly name: string;
  private readonly ping: () => boolean | Promise<boolean>;

  constructor(name: string, ping: () => boolean | Promise<boolean>) {
    this.name = name;
    this.ping = ping;
  }

  public describe(): string {
    return this.name;
  }

  public async probe(): Promise<StoreProbeResult> {
    try {
      return (await this.ping()) ? { ok: true } : { ok: false, reason: `${this.name} did not respond` };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return { ok: false, reason: `${this.name} ping failed: ${reason}` };
    }
  }
}

export type WatchdogState = 'unknown' | 'reachable' | 'recovering' | 'escalated';

export interface WatchdogSnapshot {
  target: string;
  state: WatchdogState;
  checks: number;
  recoveries: number;
  escalations: number;
  lastCheckAt: number | null;
  lastReason: string | null;
}

export interface StoreWatchdogConfig {
  /** Period between liveness checks (milliseconds) */
  checkIntervalMs: number;

  /** Recovery attempts before escalating */
  maxRecoveryAttempts: number;

  /** Backoff before the second recovery attempt (milliseconds) */
  recoveryInitialDelayMs: number;

  /** Backoff ceiling (milliseconds) */
  recoveryMaxDelayMs: number;

  probe: StoreProbe;

  /** Reconnect or restart the store */
  recover: () => void | Promise<void>;

  /** Receives escalations and recoveries (usually the HealthAggregator) */
  sink?: BackendHealthSink;

  now?: () => number;
  logger?: Logger;

  /** Backoff sleep; replaced in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface StoreWatchdogEvents {
  unreachable: (reason: string) => void;
  recovered: (attempts: number) => void;
  escalated: (error: WatchdogFailureError) => void;
  changed: (target: string) => void;
}

export class StoreWatchdog extends EventEmitter<StoreWatchdogEvents> {
  private readonly config: StoreWatchdogConfig;
  private readonly now: () => number;
  private readonly logger?: Logger;
  private readonly timer = new TimerGuard('store-watchdog');

  private running = false;
  private abort: AbortController | null = null;
  private inFlight: Promise<WatchdogState> | null = null;

  private state: WatchdogState = 'unknown';
  private checks = 0;
  private recoveries = 0;
  private escalations = 0;
  private lastCheckAt: number | null = null;
  private lastReason: string | null = null;

  constructor(config: StoreWatchdogConfig) {
    super();
    this.config = config;
    this.now = config.now ?? Date.now;
    this.logger = config.logger;
  }

  public start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.abort = new AbortController();
    this.arm();
    this.logger?.info(
      { target: this.config.probe.describe(), checkIntervalMs: this.config.checkIntervalMs },
      'Store watchdog started'
    );
  }

  public async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.timer.clear();
    this.abort?.abort();

    if (this.inFlight) {
      await this.inFlight;
    }
    this.abort = null;
    this.logger?.info({ target: this.config.probe.describe() }, 'Store watchdog stopped');
  }

  public isRunning(): boolean {
    return this.running;
  }

  public getSnapshot(): WatchdogSnapshot {
    return {
      target: this.config.probe.describe(),
      state: this.state,
      checks: this.checks,
      recoveries: this.recoveries,
      escalations: this.escalations,
      lastCheckAt: this.lastCheckAt,
      lastReason: this.lastReason,
    };
  }

  /**
   * Run one liveness check (with recovery when the probe fails)
   *
   * Concurrent calls share the check in flight.
   *
   * @returns State after the check
   */
  public check(): Promise<WatchdogState> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const run = this.runCheck().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private arm(): void {
    this.timer.set(() => {
      this.check()
        .catch((err: unknown) => {
          this.logger?.error({ err }, 'Store watchdog check failed');
        })
        .finally(() => {
          if (this.running) {
            this.arm();
          }
        });
    }, this.config.checkIntervalMs);
  }

  private async runCheck(): Promise<WatchdogState> {
    const target = this.config.probe.describe();
    const result = await this.runProbe();
    this.checks++;
    this.lastCheckAt = this.now();

    if (result.ok) {
      if (result.changed) {
        this.logger?.info({ target }, 'Store modification detected');
        this.emit('changed', target);
      }
      this.markReachable(0);
      return this.state;
    }

    const reason = result.reason ?? 'probe failed';
    this.lastReason = reason;
    this.logger?.warn({ target, reason }, 'Backing store unreachable, attempting recovery');
    this.emit('unreachable', reason);

    const previous = this.state;
    this.state = 'recovering';

    try {
      const attempts = await retryWithBackoff(
        async (attempt) => {
          await this.config.recover();
          const confirm = await this.runProbe();
          if (!confirm.ok) {
            throw new Error(confirm.reason ?? 'probe failed after recovery');
          }
          return attempt;
        },
        {
          maxAttempts: this.config.maxRecoveryAttempts,
          initialDelayMs: this.config.recoveryInitialDelayMs,
          maxDelayMs: this.config.recoveryMaxDelayMs,
          backoffMultiplier: 2,
          signal: this.abort?.signal,
          sleep: this.config.sleep,
          onRetry: ({ attempt, delayMs, error }) => {
            this.logger?.debug({ target, attempt, delayMs, err: error }, 'Store recovery attempt failed');
          },
        }
      );

      this.recoveries++;
      this.markReachable(attempts);
      return this.state;
    } catch (err) {
      if (err instanceof RetryAbortedError) {
        this.state = previous;
        this.logger?.info({ target }, 'Store recovery abandoned on shutdown');
        return this.state;
      }
      if (err instanceof RetryExhaustedError) {
        const lastReason = err.lastError instanceof Error ? err.lastError.message : reason;
        this.escalate(err.attempts, lastReason);
        return this.state;
      }
      throw err;
    }
  }

  /**
   * A rejecting probe counts as a failed check
   */
  private async runProbe(): Promise<StoreProbeResult> {
    try {
      return await this.config.probe.probe();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return { ok: false, reason: `${this.config.probe.describe()} probe failed: ${reason}` };
    }
  }

  private markReachable(attempts: number): void {
    const wasDown = this.state === 'escalated' || this.state === 'recovering';
    this.state = 'reachable';
    this.lastReason = null;

    if (wasDown) {
      this.config.sink?.reportBackendRecovered();
      this.logger?.info({ target: this.config.probe.describe(), attempts }, 'Backing store recovered');
      this.emit('recovered', attempts);
    }
  }

  private escalate(attempts: number, reason: string): void {
    this.state = 'escalated';
    this.escalations++;
    this.lastReason = reason;

    const error = new WatchdogFailureError(
      `Backing store ${this.config.probe.describe()} still unreachable after ${attempts} recovery attempt(s)`,
      attempts,
      reason
    );
    this.config.sink?.reportBackendUnavailable(reason);
    this.logger?.error({ err: error, attempts, reason }, 'Store recovery exhausted, escalating');
    this.emit('escalated', error);
  }
}
