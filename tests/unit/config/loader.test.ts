import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  buildConfig,
  deepMerge,
  loadConfig,
  loadRuntimeConfig,
  toRuntimeOptions,
  validateConfig,
  type DeepPartial,
} from '../../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { ConfigurationError } from '../../../src/api/errors.js';
import type { RuntimeConfig } from '../../../src/types/schemas/config.js';

const issuesOf = (overrides: DeepPartial<RuntimeConfig>): string[] => {
  try {
    buildConfig(overrides);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      return err.issues;
    }
    throw err;
  }
  return [];
};

describe('Config Loader', () => {
  let testConfigDir: string;

  beforeAll(() => {
    testConfigDir = mkdtempSync(join(tmpdir(), 'runtime-config-'));
  });

  afterAll(() => {
    rmSync(testConfigDir, { recursive: true, force: true });
  });

  describe('packaged configuration', () => {
    it('applies the test environment overrides', () => {
      const config = loadRuntimeConfig(undefined, 'test');

      expect(config.cache.max_entries).toBe(100);
      expect(config.cache.default_ttl_seconds).toBe(300);
      expect(config.scheduler.tick_interval_ms).toBe(100);
      expect(config.logging.level).toBe('silent');
    });

    it('applies the production environment overrides', () => {
      const config = loadRuntimeConfig(undefined, 'production');

      expect(config.cache.max_entries).toBe(10_000);
      expect(config.logging.level).toBe('warn');
    });

    it('matches the in-process defaults apart from the environment', () => {
      const config = loadRuntimeConfig(undefined, 'development');

      expect(config).toEqual({ ...DEFAULT_CONFIG, logging: { level: 'debug' } });
    });
  });

  describe('loadConfig', () => {
    it('deep-merges the selected environment over the base section', () => {
      const path = join(testConfigDir, 'merge.yaml');
      writeFileSync(
        path,
        yaml.dump({
          cache: { max_entries: 10, default_ttl_seconds: 60 },
          environments: { production: { cache: { max_entries: 500 } } },
        })
      );

      expect(loadConfig(path, 'production')).toEqual({ cache: { max_entries: 500, default_ttl_seconds: 60 } });
      expect(loadConfig(path, 'test')).toEqual({ cache: { max_entries: 10, default_ttl_seconds: 60 } });
    });

    it('fails when the file is missing', () => {
      const path = join(testConfigDir, 'absent.yaml');

      expect(() => loadConfig(path)).toThrow(`Configuration file not found: ${path}`);
    });

    it('fails when the file is not a mapping', () => {
      const path = join(testConfigDir, 'list.yaml');
      writeFileSync(path, '- cache\n- trails\n');

      expect(() => loadConfig(path)).toThrow(`Configuration file ${path} must be a mapping`);
    });

    it('fails on malformed YAML', () => {
      const path = join(testConfigDir, 'broken.yaml');
      writeFileSync(path, 'cache: [unclosed\n');

      expect(() => loadConfig(path)).toThrow(`Failed to load configuration from ${path}`);
    });
  });

  describe('validateConfig', () => {
    it('accepts the defaults unchanged', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
    });

    it('builds from defaults plus overrides', () => {
      const config = buildConfig({ cache: { max_entries: 2 }, scheduler: { jobs: { trail_decay: '30s' } } });

      expect(config.cache).toEqual({ max_entries: 2, default_ttl_seconds: 300 });
      expect(config.scheduler.jobs).toEqual({ health_snapshot: '5m', cache_cleanup: 'hourly', trail_decay: '30s' });
    });

    it('rejects a soft error rate above the hard one', () => {
      expect(issuesOf({ health: { soft_error_rate: 0.6 } })).toEqual([
        'health.soft_error_rate must be < hard_error_rate',
      ]);
    });

    it('rejects a decay factor of 1', () => {
      expect(issuesOf({ trails: { decay_factor: 1 } })).toEqual(['trails.decay_factor must be < 1']);
    });

    it('rejects an unparseable job interval', () => {
      expect(issuesOf({ scheduler: { jobs: { cache_cleanup: 'sometimes' } } })).toEqual([
        'scheduler.jobs.cache_cleanup Unrecognized interval specification "sometimes"',
      ]);
    });

    it('lists every invalid field', () => {
      expect(issuesOf({ cache: { max_entries: 0, default_ttl_seconds: -1 } })).toEqual([
        'cache.max_entries Max entries must be positive',
        'cache.default_ttl_seconds Default TTL must be positive',
      ]);
    });

    it('reports issues in the error message', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, logging: { level: 'verbose' } })).toThrow(
        /^Configuration validation failed:\nlogging\.level /
      );
    });
  });

  describe('deepMerge', () => {
    it('replaces arrays and scalars and ignores undefined', () => {
      expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 'x' }, { a: { c: [3] }, d: undefined })).toEqual({
        a: { b: 1, c: [3] },
        d: 'x',
      });
    });
  });

  describe('toRuntimeOptions', () => {
    it('maps configuration to component options', () => {
      const options = toRuntimeOptions(DEFAULT_CONFIG);

      expect(options.cache).toEqual({ maxEntries: 1_000, defaultTtlSeconds: 300 });
      expect(options.scheduler).toEqual({
        tickIntervalMs: 1_000,
        jobs: { healthSnapshot: '5m', cacheCleanup: 'hourly', trailDecay: 60_000 },
      });
      expect(options.scaling).toEqual({
        softResourcePercent: 80,
        hardResourcePercent: 95,
        idleResourcePercent: 30,
        risingMargin: 0.2,
        lowVolumePerMinute: 5,
      });
      expect(options.logLevel).toBe('info');
    });
  });
});
