/**
 * @module
 * Runs scheduled work to completion from blocking code.
 *
 * With no scheduler stepping a task on the calling thread, the work runs
 * inline on a fresh scheduler that is driven by the caller and closed
 * afterwards. Inside a running task, driving a second scheduler on the same
 * thread would re-enter the first one, so the work is shipped to a fresh
 * worker thread instead and the caller blocks until that thread answers.
 *
 * @example
 * ```typescript
 * function* total(): Operation<number> {
 *   yield* sleep(5);
 *   return 42;
 * }
 *
 * const value = runToCompletion(total); // 42
 * const outcome = runToCompletion(total, { throw: false }); // Ok(42)
 * ```
 */

import { err, ok, type Result } from 'neverthrow';
import { MessageChannel, receiveMessageOnPort, type Worker } from 'node:worker_threads';
import { componentLogger, getConfig } from './config';
import { currentFrame, type AmbientState } from './context';
import { BridgeError, SchedulerError } from './errors';
import type { Logger } from './logger';
import { isOperation, type Operation, type Work } from './operation';
import { Scheduler } from './scheduler';
import { decodeReply, encode, isJobReply, shipFunction, type ShippedFunction } from './serialization';
import { withSpan } from './telemetry';
import { EXIT_SLOT, REPLY_SLOT, isCrashReply, spawnThread, type IsolatedBoot } from './threads';

const log = componentLogger('bridge');

/** How long to wait for an isolated thread to exit once it has answered. */
const EXIT_GRACE_MS = 1_000;

export type BridgeStrategy = 'inline' | 'isolated-thread';

interface BridgeOptionsBase {
  logger?: Logger;
  /**
   * How long the isolated-thread path waits for an answer; `0` waits forever.
   * The inline path is never timed out.
   * @default `getConfig().bridgeTimeoutMs`
   */
  timeoutMs?: number;
  /** Shown in diagnostics. Defaults to the work function's name. */
  name?: string;
}

export interface BridgeOptionsThrow extends BridgeOptionsBase {
  throw?: true;
}

export interface BridgeOptionsResult extends BridgeOptionsBase {
  throw: false;
}

export type BridgeOptions = BridgeOptionsThrow | BridgeOptionsResult;

// =================================================================
// Section 1: Strategy
// =================================================================

/**
 * Reports whether a scheduler is stepping a task on this thread. A failing
 * query is logged and reported as `no-scheduler`.
 */
export function detectAmbientScheduler(logger: Logger = log): AmbientState {
  try {
    return currentFrame() ? 'scheduler-active' : 'no-scheduler';
  } catch (error) {
    logger.warn('Could not determine the ambient scheduler; assuming none', error);
    return 'no-scheduler';
  }
}

export function chooseBridgeStrategy(state: AmbientState): BridgeStrategy {
  return state === 'scheduler-active' ? 'isolated-thread' : 'inline';
}

// =================================================================
// Section 2: Entry Points
// =================================================================

/**
 * Runs `work` to completion and returns its value, or throws its error.
 *
 * Inside a running task `work` runs on another thread, so it must be
 * self-contained: it can use its own parameters, globals and the exported
 * names of this package, nothing else from the surrounding scope. Names are
 * matched by their text in the source: a loader that renames imports (such
 * as Vitest's module runner) or a namespace import like `import * as t`
 * leaves names the other thread cannot resolve. Such callers can write
 * `tandem.sleep(5)`, since the package namespace is also bound as `tandem`.
 *
 * The isolated thread has exited when the call returns, except after a
 * timeout, where its termination is only requested.
 *
 * @throws {BridgeError} When the isolated thread cannot be started, exits
 *         without answering or exceeds `timeoutMs`.
 */
export function runToCompletion<T>(work: Work<T>, options?: BridgeOptionsThrow): T;
export function runToCompletion<T>(work: Work<T>, options: BridgeOptionsResult): Result<T, unknown>;
export function runToCompletion<T>(work: Work<T>, options: BridgeOptions = {}): T | Result<T, unknown> {
  const outcome = execute<T>({
    label: options.name || work.name || 'anonymous',
    start: work,
    ship: () => ({ work: shipFunction(work), receiver: undefined, args: [] }),
    options,
  });
  return settle(outcome, options);
}

/**
 * Runs `method.apply(receiver, args)` to completion. On the isolated-thread
 * path the receiver travels as a snapshot of its own properties, with the
 * methods of its prototype chain shipped by source.
 */
export function invokeToCompletion<O extends object, A extends unknown[], T>(
  receiver: O,
  method: (this: O, ...args: A) => Operation<T>,
  args: A,
  options?: BridgeOptionsThrow,
): T;
export function invokeToCompletion<O extends object, A extends unknown[], T>(
  receiver: O,
  method: (this: O, ...args: A) => Operation<T>,
  args: A,
  options: BridgeOptionsResult,
): Result<T, unknown>;
export function invokeToCompletion<O extends object, A extends unknown[], T>(
  receiver: O,
  method: (this: O, ...args: A) => Operation<T>,
  args: A,
  options: BridgeOptions = {},
): T | Result<T, unknown> {
  const outcome = execute<T>({
    label: options.name || method.name || 'anonymous',
    start: () => method.apply(receiver, args),
    ship: () => ({ work: shipFunction(method), receiver, args }),
    options,
  });
  return settle(outcome, options);
}

/**
 * Untyped form of `invokeToCompletion` for methods looked up at run time.
 *
 * @throws {SchedulerError} `NOT_AN_OPERATION` when `method` does not return a generator.
 */
export function invokeMethod(
  receiver: object,
  method: Function,
  args: unknown[],
  options: BridgeOptionsBase = {},
): unknown {
  const label = options.name || method.name || 'anonymous';
  const outcome = execute<unknown>({
    label,
    start: () => {
      const operation: unknown = Reflect.apply(method, receiver, args);
      if (!isOperation(operation)) {
        throw new SchedulerError('NOT_AN_OPERATION', `"${label}" did not return a generator`);
      }
      return operation;
    },
    ship: () => ({ work: shipFunction(method), receiver, args }),
    options,
  });
  return settle(outcome, options);
}

function settle<T>(outcome: Result<T, unknown>, options: BridgeOptions): T | Result<T, unknown> {
  if (options.throw === false) {
    return outcome;
  }
  if (outcome.isErr()) {
    throw outcome.error;
  }
  return outcome.value;
}

// =================================================================
// Section 3: Execution
// =================================================================

interface Shipment {
  work: ShippedFunction;
  receiver: object | undefined;
  args: unknown[];
}

interface Execution<T> {
  label: string;
  start: Work<T>;
  ship(): Shipment;
  options: BridgeOptionsBase;
}

function execute<T>(execution: Execution<T>): Result<T, unknown> {
  const logger = execution.options.logger ?? log;
  const state = detectAmbientScheduler(logger);
  const strategy = chooseBridgeStrategy(state);
  logger.debug(`Running "${execution.label}" ${strategy} (${state})`);

  return withSpan(
    'tandem.bridge',
    { 'tandem.work': execution.label, 'tandem.strategy': strategy },
    (span) => {
      const outcome = strategy === 'inline' ? runInline(execution) : runIsolated<T>(execution, logger);
      span?.setAttributes({ 'tandem.outcome': outcome.isOk() ? 'ok' : 'error' });
      return outcome;
    },
  );
}

function runInline<T>(execution: Execution<T>): Result<T, unknown> {
  const scheduler = new Scheduler({ name: `bridge:${execution.label}` });
  try {
    return ok(scheduler.runSync(execution.start, { name: execution.label }));
  } catch (error) {
    return err(error);
  }
}

const hostOnly = new WeakSet<Function>();

/** Keeps `fn` out of the prototype shipped with a receiver to an isolated thread. */
export function keepOnHost(fn: Function): void {
  hostOnly.add(fn);
}

/** Methods of the receiver's prototype chain, nearest definition first. */
function collectMethods(receiver: object): ShippedFunction[] {
  const methods: ShippedFunction[] = [];
  const seen = new Set<string>(['constructor']);
  for (
    let proto: unknown = Object.getPrototypeOf(receiver);
    typeof proto === 'object' && proto !== null && proto !== Object.prototype;
    proto = Object.getPrototypeOf(proto)
  ) {
    for (const key of Object.getOwnPropertyNames(proto)) {
      if (seen.has(key)) continue;
      seen.add(key);
      const descriptor = Object.getOwnPropertyDescriptor(proto, key);
      const value: unknown = descriptor?.value;
      if (typeof value === 'function' && !hostOnly.has(value)) {
        methods.push({ ...shipFunction(value), name: key });
      }
    }
  }
  return methods;
}

function runIsolated<T>(execution: Execution<T>, logger: Logger): Result<T, unknown> {
  const timeoutMs = execution.options.timeoutMs ?? getConfig().bridgeTimeoutMs;
  const wake = new Int32Array(new SharedArrayBuffer(2 * Int32Array.BYTES_PER_ELEMENT));
  const { port1, port2 } = new MessageChannel();
  let worker: Worker;

  try {
    const { work, receiver, args } = execution.ship();
    const boot: IsolatedBoot = {
      role: 'isolated',
      wake,
      reply: port2,
      work,
      payload: encode([receiver === undefined ? undefined : { ...receiver }, args]),
      methods: receiver === undefined ? [] : collectMethods(receiver),
    };
    worker = spawnThread(boot, `isolated:${execution.label}`);
  } catch (error) {
    port1.close();
    port2.close();
    return err(new BridgeError(`Could not start an isolated thread for "${execution.label}"`, { cause: error }));
  }
  worker.on('error', (error: unknown) => {
    logger.debug(`Isolated thread for "${execution.label}" raised an uncaught error`, error);
  });

  try {
    const waited = Atomics.wait(wake, REPLY_SLOT, 0, timeoutMs > 0 ? timeoutMs : undefined);
    if (waited === 'timed-out') {
      return err(new BridgeError(`Isolated thread for "${execution.label}" did not answer within ${timeoutMs}ms`));
    }
    // an answering thread exits right after, so join it here
    if (Atomics.wait(wake, EXIT_SLOT, 0, EXIT_GRACE_MS) === 'timed-out') {
      logger.warn(`Isolated thread for "${execution.label}" answered but did not exit within ${EXIT_GRACE_MS}ms`);
    }
    const message = receiveMessageOnPort(port1)?.message;
    if (isJobReply(message)) {
      return decodeReply<T>(message);
    }
    return err(
      new BridgeError(
        isCrashReply(message)
          ? `Isolated thread for "${execution.label}" exited with code ${message.exitCode} without answering`
          : `Isolated thread for "${execution.label}" stopped without answering`,
      ),
    );
  } finally {
    port1.close();
    worker.unref();
    // only a thread that never answered is still running here
    void worker.terminate().then(
      (code) => logger.debug(`Isolated thread for "${execution.label}" exited with code ${code}`),
      (error: unknown) => logger.warn(`Isolated thread for "${execution.label}" failed to terminate`, error),
    );
  }
}
