/**
 * @module
 * Process-wide (per thread) configuration: the logger every component writes
 * to, the default worker pool size, the isolated-thread timeout of the bridge
 * and an optional tracer.
 */

import { availableParallelism } from 'node:os';
import { noopLogger, prefixLogger, type Logger } from './logger';
import type { TracerLike } from './telemetry';

export interface TandemConfig {
  /** Receives diagnostics from every component. @default noopLogger */
  logger: Logger;
  /**
   * Upper bound of worker threads in the default pool.
   * @default `TANDEM_MAX_WORKERS`, else one less than the available parallelism (at least 1)
   */
  maxWorkers: number;
  /**
   * How long `runToCompletion` waits for an isolated thread before giving up.
   * `0` waits forever.
   * @default 0
   */
  bridgeTimeoutMs: number;
  /** OpenTelemetry-compatible tracer; spans are skipped when absent. */
  tracer?: TracerLike;
}

export const MAX_WORKERS_ENV = 'TANDEM_MAX_WORKERS';

function defaultMaxWorkers(): number {
  const fromEnv = Number.parseInt(process.env[MAX_WORKERS_ENV] ?? '', 10);
  if (Number.isInteger(fromEnv) && fromEnv > 0) {
    return fromEnv;
  }
  return Math.max(1, availableParallelism() - 1);
}

function defaults(): TandemConfig {
  return {
    logger: noopLogger,
    maxWorkers: defaultMaxWorkers(),
    bridgeTimeoutMs: 0,
  };
}

let current: TandemConfig = defaults();

/**
 * Merges `overrides` into the active configuration and returns the result.
 *
 * @throws {RangeError} If `maxWorkers` is not a positive integer or
 *         `bridgeTimeoutMs` is negative.
 *
 * @example
 * ```typescript
 * configure({ logger: console, maxWorkers: 2 });
 * ```
 */
export function configure(overrides: Partial<TandemConfig>): Readonly<TandemConfig> {
  if (overrides.maxWorkers !== undefined && (!Number.isInteger(overrides.maxWorkers) || overrides.maxWorkers < 1)) {
    throw new RangeError(`maxWorkers must be a positive integer, got ${overrides.maxWorkers}`);
  }
  if (overrides.bridgeTimeoutMs !== undefined && !(overrides.bridgeTimeoutMs >= 0)) {
    throw new RangeError(`bridgeTimeoutMs must be zero or positive, got ${overrides.bridgeTimeoutMs}`);
  }
  current = { ...current, ...overrides };
  return current;
}

export function getConfig(): Readonly<TandemConfig> {
  return current;
}

/** Restores the defaults, re-reading the environment. */
export function resetConfig(): void {
  current = defaults();
}

/** A logger that tags messages with `component` and writes to the configured logger. */
export function componentLogger(component: string): Logger {
  return prefixLogger(() => current.logger, component);
}
