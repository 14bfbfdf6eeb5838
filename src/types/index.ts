/**
 * Main type exports for adaptive-store-runtime
 */

export * from './store.js';
export * from './cache.js';
export * from './trails.js';
export * from './health.js';
export * from './scaling.js';
export * from './scheduling.js';
export * from './smells.js';
