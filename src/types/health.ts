/**
 * Health Aggregator Types
 *
 * @module types/health
 */

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

/**
 * Host resource snapshot (percentages in 0-100)
 */
export interface ResourceSnapshot {
  cpuPercent: number;
  memoryPercent: number;
  diskPercent: number;
  memoryAvailableMb: number;
  sampledAt: number;
}

/**
 * Operation totals over the rolling window
 */
export interface HealthWindowTotals {
  windowMs: number;
  queries: number;
  inserts: number;
  updates: number;
  deletes: number;
  errors: number;
  operations: number;
  errorRate: number;
  avgLatencyMs: number;
  maxLatencyMs: number;
  /** Distinct collections (operation targets) touched in the window */
  collectionsAccessed: number;
}

export interface LastErrorInfo {
  message: string;
  timestamp: string;
}

export interface BackendState {
  reachable: boolean;
  reason: string | null;
  since: number | null;
}

/**
 * Consistent health snapshot
 */
export interface HealthReport {
  status: HealthStatus;
  issues: string[];
  uptimeSeconds: number;
  uptimeHuman: string;
  window: HealthWindowTotals;
  resources: ResourceSnapshot | null;
  lastError: LastErrorInfo | null;
  backend: BackendState;
  timestamp: string;
}

/**
 * Sink the watchdog escalates into
 */
export interface BackendHealthSink {
  reportBackendUnavailable(reason: string): void;
  reportBackendRecovered(): void;
}
