import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MaintenanceScheduler } from '../../../src/scheduling/maintenance-scheduler.js';
import { AdaptiveRuntimeError, JobExecutionError } from '../../../src/api/errors.js';
import type { JobRunReport } from '../../../src/types/scheduling.js';

describe('MaintenanceScheduler', () => {
  describe('manual ticks', () => {
    let now: number;
    let scheduler: MaintenanceScheduler;

    beforeEach(() => {
      now = 0;
      scheduler = new MaintenanceScheduler({ tickIntervalMs: 1_000, now: () => now });
    });

    it('runs a job once its next run time is reached', async () => {
      const action = vi.fn();
      const scheduled = scheduler.schedule('cleanup', 60_000, action);
      expect(scheduled.nextRunAt).toBe(60_000);
      expect(scheduled.interval).toBe('60000ms');

      now = 59_999;
      await expect(scheduler.tick()).resolves.toBe(0);
      expect(action).not.toHaveBeenCalled();

      now = 60_000;
      await expect(scheduler.tick()).resolves.toBe(1);
      expect(action).toHaveBeenCalledTimes(1);

      const [job] = scheduler.listJobs();
      expect(job).toMatchObject({
        name: 'cleanup',
        state: 'idle',
        nextRunAt: 120_000,
        lastRunAt: 60_000,
        lastDurationMs: 0,
        runCount: 1,
        failureCount: 0,
        lastError: null,
      });
    });

    it('keeps a failing job scheduled and records the error', async () => {
      const failed: Array<[JobRunReport, JobExecutionError]> = [];
      scheduler.on('job:failed', (report, error) => failed.push([report, error]));
      scheduler.schedule('flaky', 60_000, () => {
        throw new Error('boom');
      });

      now = 60_000;
      await scheduler.tick();

      const [job] = scheduler.listJobs();
      expect(job?.lastError).toEqual({ message: 'Job "flaky" failed: boom', at: 60_000 });
      expect(job?.failureCount).toBe(1);
      expect(job?.nextRunAt).toBe(120_000);
      expect(scheduler.hasJob('flaky')).toBe(true);

      expect(failed).toHaveLength(1);
      expect(failed[0]?.[0]).toMatchObject({ name: 'flaky', outcome: 'failed', error: 'Job "flaky" failed: boom' });
      expect(failed[0]?.[1].jobName).toBe('flaky');
    });

    it('keeps the last error after a later success', async () => {
      let fail = true;
      scheduler.schedule('flaky', 60_000, () => {
        if (fail) throw new Error('boom');
      });

      now = 60_000;
      await scheduler.tick();
      fail = false;
      now = 120_000;
      await scheduler.tick();

      const [job] = scheduler.listJobs();
      expect(job?.runCount).toBe(2);
      expect(job?.failureCount).toBe(1);
      expect(job?.lastError?.message).toBe('Job "flaky" failed: boom');
    });

    it('does not shift the schedule after a failure', async () => {
      scheduler.schedule('flaky', 60_000, async () => {
        now += 5_000;
        throw new Error('slow failure');
      });

      now = 60_000;
      await scheduler.tick();

      expect(scheduler.listJobs()[0]?.nextRunAt).toBe(120_000);
    });

    it('rejects duplicate names', () => {
      scheduler.schedule('cleanup', 60_000, () => undefined);

      expect(() => scheduler.schedule('cleanup', 30_000, () => undefined)).toThrow(AdaptiveRuntimeError);
      try {
        scheduler.schedule('cleanup', 30_000, () => undefined);
      } catch (err) {
        expect(err).toBeInstanceOf(AdaptiveRuntimeError);
        if (err instanceof AdaptiveRuntimeError) {
          expect(err.code).toBe('DuplicateJob');
          expect(err.message).toBe('Job "cleanup" is already scheduled');
        }
      }
    });

    it('unschedules idempotently', () => {
      scheduler.schedule('cleanup', 60_000, () => undefined);

      expect(scheduler.unschedule('cleanup')).toBe(true);
      expect(scheduler.unschedule('cleanup')).toBe(false);
      expect(scheduler.unschedule('never-scheduled')).toBe(false);
      expect(scheduler.listJobs()).toEqual([]);
    });

    it('runs due jobs in registration order and emits events', async () => {
      const order: string[] = [];
      const ticks: number[] = [];
      scheduler.on('job:completed', (report) => order.push(report.name));
      scheduler.on('tick', (ran) => ticks.push(ran));
      scheduler.schedule('first', 1_000, () => undefined);
      scheduler.schedule('second', 1_000, () => undefined);
      scheduler.schedule('later', 5_000, () => undefined);

      now = 1_000;
      await scheduler.tick();

      expect(order).toEqual(['first', 'second']);
      expect(ticks).toEqual([2]);
    });

    it('marks queued jobs due and a failing job failed until its failure is reported', async () => {
      const seen: Array<[string, string | undefined]> = [];
      const stateOf = (name: string): string | undefined =>
        scheduler.listJobs().find((job) => job.name === name)?.state;
      scheduler.schedule('first', 1_000, () => {
        seen.push(['first', stateOf('first')]);
        seen.push(['second', stateOf('second')]);
      });
      scheduler.schedule('second', 1_000, () => {
        throw new Error('boom');
      });
      scheduler.on('job:failed', (report) => seen.push([`${report.name} reported`, stateOf(report.name)]));

      now = 1_000;
      await scheduler.tick();

      expect(seen).toEqual([
        ['first', 'running'],
        ['second', 'due'],
        ['second reported', 'failed'],
      ]);
      expect(scheduler.listJobs().map((job) => job.state)).toEqual(['idle', 'idle']);
    });

    it('survives a throwing event listener', async () => {
      scheduler.on('job:completed', () => {
        throw new Error('listener bug');
      });
      scheduler.schedule('cleanup', 1_000, () => undefined);

      now = 1_000;

      await expect(scheduler.tick()).resolves.toBe(1);
    });

    it('shares a tick already in flight', async () => {
      const first = scheduler.tick();
      const second = scheduler.tick();

      expect(second).toBe(first);
      await expect(first).resolves.toBe(0);
    });

    it('runNow keeps the scheduled time', async () => {
      const action = vi.fn();
      scheduler.schedule('cleanup', 60_000, action);

      now = 10;
      const report = await scheduler.runNow('cleanup');

      expect(report).toMatchObject({ name: 'cleanup', outcome: 'completed', nextRunAt: 60_000 });
      expect(action).toHaveBeenCalledTimes(1);
      expect(scheduler.listJobs()[0]?.nextRunAt).toBe(60_000);
      await expect(scheduler.runNow('missing')).resolves.toBeNull();
    });
  });

  describe('timer loop', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('ticks until stopped', async () => {
      const scheduler = new MaintenanceScheduler({ tickIntervalMs: 1_000 });
      const action = vi.fn();
      scheduler.schedule('snapshot', '5s', action);

      scheduler.start();
      expect(scheduler.isRunning()).toBe(true);

      await vi.advanceTimersByTimeAsync(5_000);
      expect(action).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(5_000);
      expect(action).toHaveBeenCalledTimes(2);

      await scheduler.stop();
      expect(scheduler.isRunning()).toBe(false);

      await vi.advanceTimersByTimeAsync(20_000);
      expect(action).toHaveBeenCalledTimes(2);
    });

    it('waits for the job in flight when stopping', async () => {
      const scheduler = new MaintenanceScheduler({ tickIntervalMs: 1_000 });
      let release: () => void = () => undefined;
      scheduler.schedule('slow', 1_000, () => new Promise<void>((resolve) => {
        release = resolve;
      }));
      const stopped = vi.fn();
      scheduler.on('stopped', stopped);

      scheduler.start();
      await vi.advanceTimersByTimeAsync(1_000);

      let done = false;
      const stopping = scheduler.stop().then(() => {
        done = true;
      });
      await vi.advanceTimersByTimeAsync(0);
      expect(done).toBe(false);
      expect(scheduler.listJobs()[0]?.state).toBe('running');

      release();
      await stopping;

      expect(done).toBe(true);
      expect(stopped).toHaveBeenCalledTimes(1);
      expect(scheduler.listJobs()[0]).toMatchObject({ state: 'idle', runCount: 1 });
    });
  });
});
