import { describe, it, expect } from 'vitest';
import {
  OperationSmellMonitor,
  createDefaultSmellConfig,
  type OperationSmellConfig,
} from '../../../src/core/operation-smells.js';

const createMonitor = (overrides: Partial<OperationSmellConfig> = {}): OperationSmellMonitor =>
  new OperationSmellMonitor({ ...createDefaultSmellConfig(), ...overrides, now: () => 5_000 });

describe('OperationSmellMonitor', () => {
  it('flags queries that request too many results', () => {
    const monitor = createMonitor();

    const smells = monitor.analyze('tenant-a', 'query', { target: 'articles', resultLimit: 150 });

    expect(smells).toEqual([
      {
        smellType: 'excessive_results',
        scope: 'tenant-a',
        operation: 'query',
        target: 'articles',
        description: 'Query requesting 150 results, which may be excessive',
        severity: 'warning',
        suggestion: 'Consider paginating results or reducing the result limit',
        timestamp: 5_000,
      },
    ]);
  });

  it('accepts a result limit at the maximum', () => {
    const monitor = createMonitor();

    expect(monitor.analyze('tenant-a', 'query', { target: 'articles', resultLimit: 100 })).toEqual([]);
  });

  it('flags large write batches', () => {
    const monitor = createMonitor();

    const [smell] = monitor.analyze('tenant-a', 'insert', { target: 'articles', batchSize: 1001 });

    expect(smell?.smellType).toBe('large_batch');
    expect(smell?.description).toBe('Writing 1001 documents in a single batch');
    expect(smell?.suggestion).toBe('Consider batching into groups of at most 500 documents');
  });

  it('does not treat deletes as batches', () => {
    const monitor = createMonitor();

    expect(monitor.analyze('tenant-a', 'delete', { target: 'articles', batchSize: 5000 })).toEqual([]);
  });

  it('flags long filters as informational', () => {
    const monitor = createMonitor();
    const tags = Array.from({ length: 60 }, (_, i) => `tag-${i}`);

    const smells = monitor.analyze('tenant-a', 'query', { target: 'articles', filter: { tags: { $in: tags } } });

    expect(smells.map((s) => [s.smellType, s.severity])).toEqual([['complex_filter', 'info']]);
  });

  it('keeps only the most recent smells', () => {
    const monitor = createMonitor({ maxHistory: 3 });
    for (let i = 0; i < 5; i += 1) {
      monitor.analyze(`scope-${i}`, 'query', { target: 'articles', resultLimit: 200 });
    }

    const report = monitor.getReport();

    expect(report.totalSmells).toBe(3);
    expect(report.recent.map((s) => s.scope)).toEqual(['scope-2', 'scope-3', 'scope-4']);
  });

  it('reports totals for one scope', () => {
    const monitor = createMonitor();
    monitor.analyze('tenant-a', 'query', { target: 'articles', resultLimit: 200 });
    monitor.analyze('tenant-a', 'update', { target: 'articles', batchSize: 2000 });
    monitor.analyze('tenant-b', 'query', { target: 'articles', resultLimit: 200 });

    const report = monitor.getReport('tenant-a');

    expect(report.totalSmells).toBe(2);
    expect(report.byType).toEqual({ excessive_results: 1, large_batch: 1 });
    expect(report.bySeverity).toEqual({ warning: 2 });

    monitor.clear();
    expect(monitor.getReport().totalSmells).toBe(0);
  });
});
