/**
 * @module
 * Error types raised by the scheduler, the worker pool, the bridge and the
 * sync-twin exposer. Errors raised by user work are never wrapped in these:
 * they reach the awaiting or blocking caller as they were thrown.
 */

// =================================================================
// Section 1: Scheduler Errors
// =================================================================

export type SchedulerErrorCode =
  | 'ALREADY_RUNNING'
  | 'CLOSED'
  | 'REENTRANT_DRIVE'
  | 'PROMISE_IN_SYNC_DRIVE'
  | 'DEADLOCK'
  | 'NOT_SETTLED'
  | 'NOT_AN_OPERATION';

/**
 * Raised when a scheduler is misused or cannot make progress.
 */
export class SchedulerError extends Error {
  public readonly _tag = 'SchedulerError' as const;
  public readonly code: SchedulerErrorCode;

  constructor(code: SchedulerErrorCode, message: string) {
    super(message);
    this.name = 'SchedulerError';
    this.code = code;
    Object.setPrototypeOf(this, SchedulerError.prototype);
  }
}

/**
 * Thrown into a task at its current suspension point when it is cancelled.
 * A task that lets it escape ends in the `cancelled` state.
 */
export class CancelledError extends Error {
  public readonly _tag = 'CancelledError' as const;
  public readonly reason: unknown;

  constructor(reason?: unknown) {
    super(reason === undefined ? 'Task was cancelled' : `Task was cancelled: ${describe(reason)}`);
    this.name = 'CancelledError';
    this.reason = reason;
    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

/**
 * Type guard to check if an error is a CancelledError.
 */
export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError && error._tag === 'CancelledError';
}

// =================================================================
// Section 2: Worker Thread Errors
// =================================================================

/**
 * Raised when the isolated thread of a bridge execution cannot be started,
 * exits without answering, or does not answer in time.
 */
export class BridgeError extends Error {
  public readonly _tag = 'BridgeError' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BridgeError';
    Object.setPrototypeOf(this, BridgeError.prototype);
  }
}

/**
 * A pool worker died while running a job.
 */
export class WorkerCrashedError extends Error {
  public readonly _tag = 'WorkerCrashedError' as const;
  public readonly exitCode: number;

  constructor(exitCode: number, options?: ErrorOptions) {
    super(`Worker thread exited with code ${exitCode} while running a job`, options);
    this.name = 'WorkerCrashedError';
    this.exitCode = exitCode;
    Object.setPrototypeOf(this, WorkerCrashedError.prototype);
  }
}

/**
 * The pool was terminated before the job could finish.
 */
export class PoolClosedError extends Error {
  public readonly _tag = 'PoolClosedError' as const;

  constructor(poolName: string) {
    super(`Worker pool "${poolName}" has been terminated`);
    this.name = 'PoolClosedError';
    Object.setPrototypeOf(this, PoolClosedError.prototype);
  }
}

// =================================================================
// Section 3: Sync-Twin Errors
// =================================================================

/**
 * A twin name collides with a member that already exists on the class or one
 * of its ancestors.
 */
export class TwinConflictError extends Error {
  public readonly _tag = 'TwinConflictError' as const;
  public readonly twin: string;

  constructor(className: string, twin: string) {
    super(`Cannot expose sync twin "${twin}" on ${className}: the name is already taken`);
    this.name = 'TwinConflictError';
    this.twin = twin;
    Object.setPrototypeOf(this, TwinConflictError.prototype);
  }
}

/**
 * A binding names a scheduled method that does not exist on the prototype.
 */
export class TwinDefinitionError extends Error {
  public readonly _tag = 'TwinDefinitionError' as const;

  constructor(className: string, twin: string, target: string) {
    super(`Cannot expose sync twin "${twin}" on ${className}: "${target}" is not an instance method`);
    this.name = 'TwinDefinitionError';
    Object.setPrototypeOf(this, TwinDefinitionError.prototype);
  }
}

// =================================================================
// Section 4: Helpers
// =================================================================

/**
 * Normalizes a caught value into an `Error`. Non-`Error` values are wrapped
 * in a generic `Error` carrying their string form.
 */
export function toError(caught: unknown): Error {
  if (caught instanceof Error) {
    return caught;
  }
  return new Error(String(caught !== undefined ? caught : 'Unknown error'));
}

function describe(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
