/**
 * @module
 * Runs blocking functions on the worker pool so the scheduler thread keeps
 * stepping other tasks.
 *
 * @example
 * ```typescript
 * function* report(limit: number): Operation<string> {
 *   const primes = yield* runBlocking((max: number) => {
 *     const found: number[] = [];
 *     for (let n = 2; n <= max; n++) {
 *       if (found.every((p) => n % p !== 0)) found.push(n);
 *     }
 *     return found.length;
 *   }, limit);
 *   return `${primes} primes up to ${limit}`;
 * }
 *
 * // or from plain async code
 * const total = await runBlocking((a: number, b: number) => a + b, 1, 2);
 * ```
 */

import { OffloadInstruction, type Operation } from './operation';
import { defaultPool, type Job, type JobState, type WorkerPool } from './pool';
import { withSpan } from './telemetry';

/**
 * The pending result of an offloaded call. Delegate to it with `yield*` from
 * scheduled code, or `await` it from async code. Only the waiting task is
 * suspended either way.
 */
export class Offload<R> implements PromiseLike<R> {
  constructor(private readonly job: Job<R>) {}

  get state(): JobState {
    return this.job.state;
  }

  *[Symbol.iterator](): Operation<R> {
    const instruction = new OffloadInstruction(this.job);
    yield instruction;
    return instruction.take();
  }

  then<A = R, B = never>(
    onfulfilled?: ((value: R) => A | PromiseLike<A>) | null,
    onrejected?: ((reason: unknown) => B | PromiseLike<B>) | null,
  ): Promise<A | B> {
    return this.job.promise().then(onfulfilled, onrejected);
  }
}

/**
 * Submits `fn(...args)` to `pool` right away. `fn` travels by source, so it
 * can only use its parameters and globals; `args` and the return value must be
 * serializable.
 */
export function offloadTo<A extends unknown[], R>(
  pool: WorkerPool,
  fn: (...args: A) => R,
  ...args: A
): Offload<Awaited<R>> {
  return withSpan(
    'tandem.offload',
    { 'tandem.pool': pool.name, 'tandem.function': fn.name || 'anonymous' },
    () => new Offload(pool.submit(fn, args)),
  );
}

/** `offloadTo` on the default pool. */
export function runBlocking<A extends unknown[], R>(fn: (...args: A) => R, ...args: A): Offload<Awaited<R>> {
  return offloadTo(defaultPool(), fn, ...args);
}
