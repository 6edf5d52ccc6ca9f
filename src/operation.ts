/**
 * @module operation
 *
 * Units of scheduled work are generator functions. A unit suspends by
 * delegating (`yield*`) to one of the operations below; each of them yields
 * a single instruction to the scheduler and reads the outcome back once the
 * scheduler resumes it.
 *
 * @example
 * ```typescript
 * function* fetchTotals(ids: number[]): Operation<number> {
 *   yield* sleep(10);
 *   const sizes = yield* runBlocking((list: number[]) => list.map((id) => id * 2), ids);
 *   return sizes.reduce((a, b) => a + b, 0);
 * }
 * ```
 */

import { SchedulerError } from './errors';
import type { Job } from './pool';
import type { TaskHandle } from './scheduler';

/**
 * A suspendable computation producing `T`. Instructions flow out through
 * `yield`; nothing flows back in through `next()`, outcomes are read from the
 * instruction itself.
 */
export type Operation<T> = Generator<AnyInstruction, T, void>;

/** A function that starts a unit of work. */
export type Work<T> = () => Operation<T>;

// =================================================================
// Section 1: Instructions
// =================================================================

/**
 * Base class of everything a task can yield. The scheduler stores the
 * resumption value in the instruction before resuming the generator; errors
 * are thrown into the generator instead.
 */
abstract class Instruction<T> {
  private slot: { value: T } | undefined;

  resolve(value: T): void {
    this.slot = { value };
  }

  take(): T {
    if (!this.slot) {
      throw new SchedulerError('NOT_SETTLED', 'Task resumed before its instruction settled');
    }
    return this.slot.value;
  }
}

export class SleepInstruction extends Instruction<void> {
  readonly kind = 'sleep' as const;
  constructor(readonly ms: number) {
    super();
  }
}

export class YieldInstruction extends Instruction<void> {
  readonly kind = 'yield' as const;
}

export class PromiseInstruction<T> extends Instruction<T> {
  readonly kind = 'promise' as const;
  constructor(readonly promise: PromiseLike<T>) {
    super();
  }
}

export class OffloadInstruction<T> extends Instruction<T> {
  readonly kind = 'offload' as const;
  constructor(readonly job: Job<T>) {
    super();
  }
}

export class JoinInstruction<T> extends Instruction<T> {
  readonly kind = 'join' as const;
  constructor(readonly target: TaskHandle<T>) {
    super();
  }
}

export class SpawnInstruction<T> extends Instruction<TaskHandle<T>> {
  readonly kind = 'spawn' as const;
  constructor(readonly work: Work<T>, readonly name: string | undefined) {
    super();
  }
}

export type AnyInstruction =
  | SleepInstruction
  | YieldInstruction
  | PromiseInstruction<unknown>
  | OffloadInstruction<unknown>
  | JoinInstruction<unknown>
  | SpawnInstruction<unknown>;

// =================================================================
// Section 2: Operations
// =================================================================

/** Suspends the calling task for at least `ms` milliseconds. */
export function* sleep(ms: number): Operation<void> {
  yield new SleepInstruction(Math.max(0, ms));
}

/** Lets every other ready task take a step before continuing. */
export function* yieldNow(): Operation<void> {
  yield new YieldInstruction();
}

/**
 * Waits for `promise` to settle. Only available while the scheduler is driven
 * by the event loop; a blocking drive fails the task with a `SchedulerError`.
 */
export function* until<T>(promise: PromiseLike<T>): Operation<T> {
  const instruction = new PromiseInstruction(promise);
  yield instruction;
  return instruction.take();
}

/** Like `until`, but starts the promise lazily from inside the task. */
export function* call<T>(fn: () => PromiseLike<T>): Operation<T> {
  return yield* until(fn());
}

/**
 * Starts `work` as a sibling task on the same scheduler and returns its handle
 * without waiting for it.
 */
export function* spawn<T>(work: Work<T>, name?: string): Operation<TaskHandle<T>> {
  const instruction = new SpawnInstruction(work, name);
  yield instruction;
  return instruction.take();
}

// =================================================================
// Section 3: Helpers
// =================================================================

/** Checks that `value` is a generator object the scheduler can drive. */
export function isOperation(value: unknown): value is Operation<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'next') === 'function' &&
    typeof Reflect.get(value, 'throw') === 'function' &&
    typeof Reflect.get(value, Symbol.iterator) === 'function'
  );
}
