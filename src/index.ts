export {
  AdaptiveRuntime,
  createAdaptiveRuntime,
  DEFAULT_JOB_NAMES,
  type AdaptiveRuntimeComponents,
  type CreateAdaptiveRuntimeOptions,
  type RecordedOperation,
} from './services/adaptive-runtime.js';
export { InstrumentedStore, operationShape, type InstrumentedStoreOptions } from './services/instrumented-store.js';

export {
  AdaptiveRuntimeError,
  ConfigurationError,
  JobExecutionError,
  WatchdogFailureError,
  toRuntimeError,
  createValidationError,
  zodErrorToRuntimeError,
  type RuntimeErrorCode,
  type RuntimeErrorShape,
} from './api/errors.js';
export * from './api/validators.js';

// Components
export { ResultCache, type ResultCacheConfig } from './core/result-cache.js';
export { TrailTracker, createDefaultTrailConfig, type TrailTrackerConfig } from './core/trail-tracker.js';
export {
  OperationSmellMonitor,
  createDefaultSmellConfig,
  type OperationSmellConfig,
} from './core/operation-smells.js';
export { patternSignature, describeFilter } from './core/pattern-signature.js';
export { deriveCacheKey, canonicalJson } from './core/fingerprint.js';
export * from './monitoring/index.js';
export * from './scheduling/index.js';
export {
  recommendScaling,
  createDefaultScalingThresholds,
  isVolumeRising,
  isVolumeLowSustained,
} from './scaling/scaling-advisor.js';

// Configuration
export {
  loadConfig,
  loadRuntimeConfig,
  validateConfig,
  buildConfig,
  toRuntimeOptions,
  type RuntimeOptions,
  type DeepPartial,
} from './config/loader.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export { createLogger } from './utils/logger.js';

export * from './types/index.js';
export * from './types/schemas/index.js';
