/**
 * Host Resource Sampler
 *
 * Captures CPU, memory and disk utilization percentages for the health
 * aggregator. CPU usage is the busy share of all cores between two
 * consecutive samples (the first sample measures since boot).
 */

import * as os from 'node:os';
import { statfs } from 'node:fs/promises';
import type { Logger } from 'pino';
import type { ResourceSnapshot } from '../types/health.js';
import { clamp, safeDivide } from '../utils/math-helpers.js';

/**
 * Source of resource snapshots (replaced by fixed values in tests)
 */
export interface ResourceSampler {
  sample(): Promise<ResourceSnapshot>;
}

export interface HostResourceSamplerOptions {
  /** Filesystem path whose volume is measured for disk usage */
  diskPath: string;
  now?: () => number;
  logger?: Logger;
}

interface CpuTotals {
  idle: number;
  total: number;
}

function readCpuTotals(): CpuTotals {
  let idle = 0;
  let total = 0;

  for (const cpu of os.cpus()) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    total += user + nice + sys + cpuIdle + irq;
    idle += cpuIdle;
  }

  return { idle, total };
}

export class HostResourceSampler implements ResourceSampler {
  private readonly diskPath: string;
  private readonly now: () => number;
  private readonly logger?: Logger;
  private lastCpu: CpuTotals = { idle: 0, total: 0 };

  constructor(options: HostResourceSamplerOptions) {
    this.diskPath = options.diskPath;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  public async sample(): Promise<ResourceSnapshot> {
    const totalMemory = os.totalmem();
    const freeMemory = os.freemem();

    return {
      cpuPercent: this.cpuPercent(),
      memoryPercent: clamp(safeDivide(totalMemory - freeMemory, totalMemory) * 100, 0, 100),
      diskPercent: await this.diskPercent(),
      memoryAvailableMb: freeMemory / (1024 * 1024),
      sampledAt: this.now(),
    };
  }

  private cpuPercent(): number {
    const current = readCpuTotals();
    const idleDelta = current.idle - this.lastCpu.idle;
    const totalDelta = current.total - this.lastCpu.total;
    this.lastCpu = current;

    if (totalDelta <= 0) {
      return 0;
    }
    return clamp(100 - (idleDelta / totalDelta) * 100, 0, 100);
  }

  private async diskPercent(): Promise<number> {
    try {
      const stats = await statfs(this.diskPath);
      const used = stats.blocks - stats.bfree;
      // Non-root usage, as df reports it
      return clamp(safeDivide(used, used + stats.bavail) * 100, 0, 100);
    } catch (err) {
      this.logger?.warn({ err, diskPath: this.diskPath }, 'Disk usage unavailable, reporting 0%');
      return 0;
    }
  }
}

/**
 * Sampler returning a fixed snapshot (tests, or hosts without metrics)
 */
export class StaticResourceSampler implements ResourceSampler {
  private snapshot: Omit<ResourceSnapshot, 'sampledAt'>;
  private readonly now: () => number;

  constructor(snapshot: Omit<ResourceSnapshot, 'sampledAt'>, now: () => number = Date.now) {
    this.snapshot = snapshot;
    this.now = now;
  }

  public set(snapshot: Partial<Omit<ResourceSnapshot, 'sampledAt'>>): void {
    this.snapshot = { ...this.snapshot, ...snapshot };
  }

  public async sample(): Promise<ResourceSnapshot> {
    return { ...this.snapshot, sampledAt: this.now() };
  }
}
