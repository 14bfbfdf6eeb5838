/**
 * Scheduling module exports
 *
 * Maintenance loop, interval notations and the backing store watchdog.
 */

export {
  MaintenanceScheduler,
  type MaintenanceSchedulerConfig,
  type MaintenanceSchedulerEvents,
} from './maintenance-scheduler.js';
export { parseIntervalSpec, firstRunAt, nextRunAfter } from './interval-spec.js';
export {
  StoreWatchdog,
  FileStoreProbe,
  CallbackStoreProbe,
  type FileStoreProbeOptions,
  type StoreProbe,
  type StoreProbeResult,
  type StoreWatchdogConfig,
  type StoreWatchdogEvents,
  type WatchdogSnapshot,
  type WatchdogState,
} from './store-watchdog.js';
