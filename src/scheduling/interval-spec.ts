/**
 * Interval Specifications
 *
 * Parses the schedule notations accepted by the maintenance scheduler and
 * computes the next run time for each:
 *
 * - `60000` / `{ everyMs: 60000 }`: fixed period in milliseconds
 * - `'30s'`, `'5m'`, `'1h'`, `'1d'`, `'500ms'`: fixed durations
 * - `'hourly'`, `'daily'`, `'weekly'`: fixed aliases
 * - `'every_30_minutes'`, `'every_2_hours'`: fixed periods
 * - `'0 3 * * *'` / `{ cron: '0 3 * * *' }`: cron expressions
 *
 * Fixed periods are anchored to the previous scheduled time, so a late or
 * failed run never shifts subsequent runs.
 */

import cronParser from 'cron-parser';
import type { IntervalSpec, ParsedInterval } from '../types/scheduling.js';
import { ConfigurationError } from '../api/errors.js';

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  sec: 1_000,
  second: 1_000,
  seconds: 1_000,
  m: 60_000,
  min: 60_000,
  minute: 60_000,
  minutes: 60_000,
  h: 3_600_000,
  hour: 3_600_000,
  hours: 3_600_000,
  d: 86_400_000,
  day: 86_400_000,
  days: 86_400_000,
};

const ALIASES: Record<string, number> = {
  hourly: 3_600_000,
  daily: 86_400_000,
  weekly: 7 * 86_400_000,
};

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/i;
const EVERY_PATTERN = /^every_(\d+)_([a-z]+)$/i;

function fixed(periodMs: number, description: string): ParsedInterval {
  if (!Number.isFinite(periodMs) || periodMs <= 0) {
    throw new ConfigurationError(`Invalid interval "${description}": period must be a positive number of milliseconds`);
  }
  return { kind: 'fixed', periodMs, description };
}

function cron(expression: string): ParsedInterval {
  try {
    cronParser.parseExpression(expression);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid cron expression "${expression}": ${reason}`);
  }
  return { kind: 'cron', expression, description: `cron(${expression})` };
}

/**
 * Parse an interval specification
 *
 * @throws ConfigurationError when the notation is not recognized
 */
export function parseIntervalSpec(spec: IntervalSpec): ParsedInterval {
  if (typeof spec === 'number') {
    return fixed(spec, `${spec}ms`);
  }

  if (typeof spec === 'object') {
    if ('cron' in spec) {
      return cron(spec.cron.trim());
    }
    return fixed(spec.everyMs, `${spec.everyMs}ms`);
  }

  const text = spec.trim();
  const lower = text.toLowerCase();

  const alias = ALIASES[lower];
  if (alias !== undefined) {
    return fixed(alias, lower);
  }

  const duration = DURATION_PATTERN.exec(text);
  if (duration) {
    const unit = UNIT_MS[duration[2].toLowerCase()] ?? 0;
    return fixed(Number(duration[1]) * unit, text);
  }

  const every = EVERY_PATTERN.exec(text);
  if (every) {
    const unit = UNIT_MS[every[2].toLowerCase()];
    if (unit === undefined) {
      throw new ConfigurationError(`Invalid interval "${text}": unknown unit "${every[2]}"`);
    }
    return fixed(Number(every[1]) * unit, text);
  }

  if (text.split(/\s+/).length >= 5) {
    return cron(text);
  }

  throw new ConfigurationError(`Unrecognized interval specification "${text}"`);
}

/**
 * First run time of a newly scheduled job
 */
export function firstRunAt(interval: ParsedInterval, now: number): number {
  if (interval.kind === 'fixed') {
    return now + interval.periodMs;
  }
  return nextCronRun(interval.expression, now);
}

/**
 * Run time following a run that was due at `scheduledAt`
 *
 * Fixed periods advance from the scheduled time (not the finish time) and
 * skip whole periods that were missed while the loop was stalled.
 */
export function nextRunAfter(interval: ParsedInterval, scheduledAt: number, now: number): number {
  if (interval.kind === 'fixed') {
    let next = scheduledAt + interval.periodMs;
    if (next <= now) {
      const missed = Math.floor((now - next) / interval.periodMs) + 1;
      next += missed * interval.periodMs;
    }
    return next;
  }
  return nextCronRun(interval.expression, Math.max(scheduledAt, now));
}

function nextCronRun(expression: string, after: number): number {
  const parsed = cronParser.parseExpression(expression, { currentDate: new Date(after) });
  return parsed.next().getTime();
}
