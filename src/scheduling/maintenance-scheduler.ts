/**
 * Maintenance Scheduler
 *
 * Runs named maintenance jobs (cache cleanup, resource snapshots, trail
 * decay, caller-supplied work) from a single cooperative tick loop.
 *
 * Per-job lifecycle:
 *   idle -> due (nextRunAt reached) -> running -> idle
 *                                      running -> failed -> idle
 *
 * - Due jobs run sequentially within a tick; a slow job delays the jobs
 *   after it until it returns.
 * - A failing job records lastError, is logged and emitted, and stays
 *   scheduled. Failures never abort the loop.
 * - nextRunAt is recomputed after every run, whatever the outcome.
 * - stop() is observed within one tick and waits for the job in flight;
 *   jobs are never interrupted.
 *
 * The loop is a chained timeout rather than setInterval, so ticks never
 * overlap when a job is slow. tick() is public: tests drive a bounded
 * number of ticks with an injected clock instead of real timers.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type {
  IntervalSpec,
  JobAction,
  JobRunReport,
  JobSnapshot,
  JobState,
  JobErrorInfo,
  ParsedInterval,
} from '../types/scheduling.js';
import { AdaptiveRuntimeError, JobExecutionError } from '../api/errors.js';
import { TimerGuard } from '../utils/timer-guard.js';
import { firstRunAt, nextRunAfter, parseIntervalSpec } from './interval-spec.js';
import type { StoreWatchdog } from './store-watchdog.js';

/**
 * Scheduler configuration
 */
export interface MaintenanceSchedulerConfig {
  /** Tick period of the loop (milliseconds) */
  tickIntervalMs: number;

  /** Optional logical clock; defaults to Date.now() */
  now?: () => number;

  /** Logger instance (optional) */
  logger?: Logger;
}

/**
 * Scheduler events
 */
export interface MaintenanceSchedulerEvents {
  'job:completed': (report: JobRunReport) => void;
  'job:failed': (report: JobRunReport, error: JobExecutionError) => void;
  tick: (ranJobs: number) => void;
  stopped: () => void;
}

interface ScheduledJob {
  name: string;
  interval: ParsedInterval;
  action: JobAction;
  state: JobState;
  nextRunAt: number;
  lastRunAt: number | null;
  lastDurationMs: number | null;
  lastError: JobErrorInfo | null;
  runCount: number;
  failureCount: number;
}

export class MaintenanceScheduler extends EventEmitter<MaintenanceSchedulerEvents> {
  private readonly config: MaintenanceSchedulerConfig;
  private readonly now: () => number;
  private readonly logger?: Logger;
  private readonly jobs = new Map<string, ScheduledJob>();
  private readonly tickTimer = new TimerGuard('maintenance-tick');

  private running = false;
  private stopRequested = false;
  private inFlight: Promise<number> | null = null;
  private watchdog?: StoreWatchdog;

  constructor(config: MaintenanceSchedulerConfig) {
    super();
    this.config = config;
    this.now = config.now ?? Date.now;
    this.logger = config.logger;
  }

  /**
   * Register a job
   *
   * @throws AdaptiveRuntimeError (DuplicateJob) when the name is taken
   * @throws ConfigurationError when the interval cannot be parsed
   */
  public schedule(name: string, intervalSpec: IntervalSpec, action: JobAction): JobSnapshot {
    if (this.jobs.has(name)) {
      throw new AdaptiveRuntimeError('DuplicateJob', `Job "${name}" is already scheduled`, { name });
    }

    const interval = parseIntervalSpec(intervalSpec);
    const job: ScheduledJob = {
      name,
      interval,
      action,
      state: 'idle',
      nextRunAt: firstRunAt(interval, this.now()),
      lastRunAt: null,
      lastDurationMs: null,
      lastError: null,
      runCount: 0,
      failureCount: 0,
    };

    this.jobs.set(name, job);
    this.logger?.info(
      { job: name, interval: interval.description, nextRunAt: new Date(job.nextRunAt).toISOString() },
      'Maintenance job scheduled'
    );

    return this.snapshot(job);
  }

  /**
   * Remove a job. Idempotent: unknown names are a no-op.
   *
   * A job that is running finishes its current run.
   *
   * @returns Whether a job was removed
   */
  public unschedule(name: string): boolean {
    const removed = this.jobs.delete(name);
    if (removed) {
      this.logger?.info({ job: name }, 'Maintenance job unscheduled');
    }
    return removed;
  }

  public hasJob(name: string): boolean {
    return this.jobs.has(name);
  }

  /**
   * Snapshot of every job, in registration order
   */
  public listJobs(): JobSnapshot[] {
    return Array.from(this.jobs.values(), (job) => this.snapshot(job));
  }

  /**
   * Attach the store watchdog whose lifecycle follows the loop
   */
  public attachWatchdog(watchdog: StoreWatchdog): void {
    this.watchdog = watchdog;
    if (this.running) {
      watchdog.start();
    }
  }

  public isRunning(): boolean {
    return this.running;
  }

  /**
   * Start the tick loop (and the attached watchdog)
   */
  public start(): void {
    if (this.running) {
      this.logger?.warn('MaintenanceScheduler already started');
      return;
    }

    this.running = true;
    this.stopRequested = false;
    this.armTick();
    this.watchdog?.start();

    this.logger?.info(
      { tickIntervalMs: this.config.tickIntervalMs, jobs: this.jobs.size },
      'MaintenanceScheduler started'
    );
  }

  /**
   * Signal shutdown and wait for the job in flight to finish
   */
  public async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.stopRequested = true;
    this.tickTimer.clear();

    if (this.inFlight) {
      await this.inFlight;
    }

    if (this.watchdog) {
      await this.watchdog.stop();
    }

    this.running = false;
    this.logger?.info('MaintenanceScheduler stopped');
    this.emit('stopped');
  }

  /**
   * Run every due job once, sequentially
   *
   * Concurrent calls share the tick already in flight.
   *
   * @returns Number of jobs that ran
   */
  public tick(): Promise<number> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const run = this.runDueJobs().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  /**
   * Run a job immediately, outside its schedule. Its nextRunAt is kept.
   */
  public async runNow(name: string): Promise<JobRunReport | null> {
    const job = this.jobs.get(name);
    if (!job || job.state === 'running' || job.state === 'failed') {
      return null;
    }
    return this.execute(job, false);
  }

  private armTick(): void {
    this.tickTimer.set(() => {
      this.tick()
        .catch((err: unknown) => {
          // runDueJobs isolates job failures; reaching here is a scheduler defect
          this.logger?.error({ err }, 'Maintenance tick failed');
        })
        .finally(() => {
          if (this.running && !this.stopRequested) {
            this.armTick();
          }
        });
    }, this.config.tickIntervalMs);
  }

  private async runDueJobs(): Promise<number> {
    const now = this.now();
    const due: ScheduledJob[] = [];
    for (const job of this.jobs.values()) {
      if (job.state === 'idle' && now >= job.nextRunAt) {
        job.state = 'due';
        due.push(job);
      }
    }

    let ran = 0;
    for (const job of due) {
      if (this.stopRequested) {
        job.state = 'idle';
        continue;
      }
      // unscheduled or run manually since the tick started
      if (this.jobs.get(job.name) !== job || job.state !== 'due') {
        continue;
      }

      await this.execute(job, true);
      ran++;
    }

    this.safeEmit(() => this.emit('tick', ran));
    return ran;
  }

  private async execute(job: ScheduledJob, scheduled: boolean): Promise<JobRunReport> {
    const scheduledAt = job.nextRunAt;
    const startedAt = this.now();
    job.state = 'running';

    let failure: JobExecutionError | null = null;
    try {
      await job.action();
    } catch (err) {
      failure = new JobExecutionError(job.name, err);
    }

    const finishedAt = this.now();
    job.state = failure ? 'failed' : 'idle';
    job.runCount++;
    job.lastRunAt = startedAt;
    job.lastDurationMs = finishedAt - startedAt;
    if (scheduled) {
      job.nextRunAt = nextRunAfter(job.interval, scheduledAt, finishedAt);
    }

    const report: JobRunReport = {
      name: job.name,
      outcome: failure ? 'failed' : 'completed',
      startedAt,
      durationMs: job.lastDurationMs,
      nextRunAt: job.nextRunAt,
    };

    if (failure) {
      job.failureCount++;
      job.lastError = { message: failure.message, at: finishedAt };
      report.error = failure.message;
      this.logger?.error(
        { job: job.name, err: failure.cause, failureCount: job.failureCount },
        'Maintenance job failed'
      );
      const error = failure;
      this.safeEmit(() => this.emit('job:failed', report, error));
      job.state = 'idle';
    } else {
      this.logger?.debug(
        { job: job.name, durationMs: report.durationMs, nextRunAt: new Date(job.nextRunAt).toISOString() },
        'Maintenance job completed'
      );
      this.safeEmit(() => this.emit('job:completed', report));
    }

    return report;
  }

  private safeEmit(emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.logger?.error({ err }, 'Error in scheduler event handler');
    }
  }

  private snapshot(job: ScheduledJob): JobSnapshot {
    return {
      name: job.name,
      interval: job.interval.description,
      state: job.state,
      nextRunAt: job.nextRunAt,
      lastRunAt: job.lastRunAt,
      lastDurationMs: job.lastDurationMs,
      lastError: job.lastError ? { ...job.lastError } : null,
      runCount: job.runCount,
      failureCount: job.failureCount,
    };
  }
}
