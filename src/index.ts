/**
 * @module
 * The main entry point. Exports the cooperative scheduler and the four
 * interop pieces built on it: background tasks, blocking-call offloading,
 * the blocking bridge into scheduled work and sync twins.
 */

// Units of work and the instructions they yield
export * from './operation';

// Cooperative scheduler and task handles
export * from './scheduler';

// Ambient scheduler tracking
export { currentScheduler, currentTask, type AmbientState } from './context';

// Fire-and-forget background tasks
export * from './registry';

// Blocking calls on the worker pool
export * from './offload';
export {
  WorkerPool,
  defaultPool,
  resetDefaultPool,
  type Job,
  type JobState,
  type PoolOptions,
  type PoolStats,
} from './pool';

// Scheduled work from blocking code
export * from './bridge';

// Blocking twins of scheduled methods
export * from './twins';

// Error types
export * from './errors';

// Configuration, logging and tracing
export * from './config';
export * from './logger';
export * from './telemetry';
