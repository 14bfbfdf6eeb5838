import { describe, it, expect, beforeEach } from 'vitest';
import { HealthAggregator, formatUptime } from '../../../src/monitoring/health-aggregator.js';
import { StaticResourceSampler } from '../../../src/monitoring/resource-sampler.js';

const QUIET_HOST = { cpuPercent: 10, memoryPercent: 20, diskPercent: 30, memoryAvailableMb: 4096 };

describe('HealthAggregator', () => {
  let now: number;
  let sampler: StaticResourceSampler;
  let health: HealthAggregator;

  const recordMany = (total: number, failures: number, durationMs = 5): void => {
    for (let i = 0; i < total; i += 1) {
      health.record('query', durationMs, i >= failures, i < failures ? 'timeout' : undefined);
    }
  };

  beforeEach(() => {
    now = 0;
    sampler = new StaticResourceSampler(QUIET_HOST, () => now);
    health = new HealthAggregator({
      windowMs: 60_000,
      bucketMs: 10_000,
      softErrorRate: 0.1,
      hardErrorRate: 0.5,
      softResourcePercent: 80,
      hardResourcePercent: 95,
      sampler,
      now: () => now,
    });
  });

  describe('error rate', () => {
    it('is healthy with no traffic', () => {
      const report = health.status();

      expect(report.status).toBe('healthy');
      expect(report.issues).toEqual([]);
      expect(report.window.errorRate).toBe(0);
    });

    it('degrades at exactly the soft ceiling', () => {
      recordMany(10, 1);

      const report = health.status();

      expect(report.status).toBe('degraded');
      expect(report.issues).toEqual(['High error rate: 10.0%']);
    });

    it('stays healthy just under the soft ceiling', () => {
      recordMany(11, 1);

      expect(health.status().status).toBe('healthy');
    });

    it('is degraded between the ceilings', () => {
      recordMany(10, 4);

      expect(health.status().status).toBe('degraded');
    });

    it('is unhealthy at the hard ceiling', () => {
      recordMany(10, 5);

      const report = health.status();

      expect(report.status).toBe('unhealthy');
      expect(report.issues).toEqual(['Error rate 50.0% at or above hard ceiling 50.0%']);
    });

    it('forgets operations that left the window', () => {
      recordMany(10, 5);

      now = 50_000;
      expect(health.windowTotals().operations).toBe(10);

      now = 60_000;
      expect(health.windowTotals().operations).toBe(0);
      expect(health.status().status).toBe('healthy');
    });
  });

  describe('window totals', () => {
    it('counts each kind and tracks latency', () => {
      health.record('query', 10, true);
      health.record('insert', 30, true);
      health.record('update', 20, true);
      health.record('delete', 20, false);

      expect(health.windowTotals()).toEqual({
        windowMs: 60_000,
        queries: 1,
        inserts: 1,
        updates: 1,
        deletes: 1,
        errors: 1,
        operations: 4,
        errorRate: 0.25,
        avgLatencyMs: 20,
        maxLatencyMs: 30,
        collectionsAccessed: 0,
      });
    });

    it('counts distinct collections touched in the window', () => {
      health.record('query', 1, true, undefined, 'articles');
      health.record('insert', 1, true, undefined, 'authors');
      health.record('query', 1, false, 'timeout', 'articles');
      now += 30_000;
      health.record('delete', 1, true, undefined, 'tags');

      expect(health.windowTotals().collectionsAccessed).toBe(3);

      now += 40_000;
      expect(health.windowTotals().collectionsAccessed).toBe(1);
    });

    it('keeps the last error with a default message', () => {
      now = 1_000;
      health.record('delete', 1, false);

      expect(health.status().lastError).toEqual({
        message: 'delete operation failed',
        timestamp: '1970-01-01T00:00:01.000Z',
      });
    });

    it('reset drops counters and the last error', () => {
      recordMany(10, 5);
      health.reset();

      const report = health.status();
      expect(report.window.operations).toBe(0);
      expect(report.lastError).toBeNull();
    });
  });

  describe('resources', () => {
    it('has no snapshot until one is taken', () => {
      expect(health.getResources()).toBeNull();
    });

    it('degrades on high usage', async () => {
      sampler.set({ cpuPercent: 80 });
      await health.snapshotResources();

      const report = health.status();

      expect(report.status).toBe('degraded');
      expect(report.issues).toEqual(['High CPU usage: 80.0%']);
    });

    it('is unhealthy on critical usage', async () => {
      sampler.set({ cpuPercent: 95, diskPercent: 85 });
      await health.snapshotResources();

      const report = health.status();

      expect(report.status).toBe('unhealthy');
      expect(report.issues).toEqual(['Critical CPU usage: 95.0%', 'High disk usage: 85.0%']);
    });

    it('stamps the snapshot with the sample time', async () => {
      now = 42_000;

      const snapshot = await health.snapshotResources();

      expect(snapshot).toEqual({ ...QUIET_HOST, sampledAt: 42_000 });
      expect(health.getResources()).toEqual(snapshot);
    });
  });

  describe('backend state', () => {
    it('is unhealthy while the backing store is unreachable', () => {
      now = 5_000;
      health.reportBackendUnavailable('disk gone');

      const report = health.status();

      expect(report.status).toBe('unhealthy');
      expect(report.issues).toEqual(['Backing store unreachable: disk gone']);
      expect(report.backend).toEqual({ reachable: false, reason: 'disk gone', since: 5_000 });
    });

    it('keeps the original outage start on repeated reports', () => {
      now = 5_000;
      health.reportBackendUnavailable('disk gone');
      now = 9_000;
      health.reportBackendUnavailable('still gone');

      expect(health.status().backend).toEqual({ reachable: false, reason: 'still gone', since: 5_000 });
    });

    it('clears the outage on recovery', () => {
      health.reportBackendUnavailable('disk gone');
      health.reportBackendRecovered();

      const report = health.status();

      expect(report.status).toBe('healthy');
      expect(report.backend).toEqual({ reachable: true, reason: null, since: null });
    });
  });

  it('reports uptime', () => {
    now = 90_500;

    const report = health.status();

    expect(report.uptimeSeconds).toBe(90.5);
    expect(report.uptimeHuman).toBe('1m 30s');
  });
});

describe('formatUptime', () => {
  it('omits zero leading units', () => {
    expect(formatUptime(93_784)).toBe('1d 2h 3m 4s');
    expect(formatUptime(59)).toBe('59s');
    expect(formatUptime(3_600)).toBe('1h 0s');
  });
});
