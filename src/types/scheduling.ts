/**
 * Maintenance Scheduler Types
 *
 * @module types/scheduling
 */

/**
 * Interval specification accepted by the scheduler
 *
 * - number: fixed period in milliseconds
 * - string: duration (`30s`, `5m`, `1h`, `1d`), alias (`hourly`, `daily`,
 *   `weekly`), `every_N_unit`, or a cron expression
 * - object: explicit fixed period or cron expression
 */
export type IntervalSpec = number | string | { everyMs: number } | { cron: string };

/**
 * Parsed interval specification
 */
export type ParsedInterval =
  | { kind: 'fixed'; periodMs: number; description: string }
  | { kind: 'cron'; expression: string; description: string };

/**
 * Parameterless unit of work
 */
export type JobAction = () => void | Promise<void>;

/**
 * Job lifecycle: idle -> due -> running -> idle, or running -> failed -> idle.
 * `failed` lasts while the failure is logged and emitted; the job stays scheduled.
 */
export type JobState = 'idle' | 'due' | 'running' | 'failed';

export interface JobErrorInfo {
  message: string;
  at: number;
}

/**
 * Inspection snapshot of a scheduled job
 */
export interface JobSnapshot {
  name: string;
  interval: string;
  state: JobState;
  nextRunAt: number;
  lastRunAt: number | null;
  lastDurationMs: number | null;
  lastError: JobErrorInfo | null;
  runCount: number;
  failureCount: number;
}

export type JobOutcome = 'completed' | 'failed';

export interface JobRunReport {
  name: string;
  outcome: JobOutcome;
  startedAt: number;
  durationMs: number;
  nextRunAt: number;
  error?: string;
}
