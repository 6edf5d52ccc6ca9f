/**
 * @module
 * Gives scheduled methods a blocking twin.
 *
 * `exposeSyncTwins` is a static composition: it takes a class and a table of
 * `twinName -> scheduledMethodName` bindings and returns a subclass whose
 * prototype carries one extra method per binding. Each twin runs its
 * scheduled method through `invokeToCompletion`, so it can be called from
 * plain synchronous code. The scheduled methods themselves are left alone.
 *
 * Called from inside a running task, a twin ships its receiver and methods to
 * an isolated thread (see `runToCompletion`), so the scheduled method may only
 * use `this`, its parameters, globals and the package's exports, which are
 * also reachable as `tandem`.
 *
 * @example
 * ```typescript
 * class Counter {
 *   constructor(public start: number) {}
 *   *nextAsync(step: number): Operation<number> {
 *     yield* sleep(1);
 *     return this.start + step;
 *   }
 * }
 *
 * const SyncCounter = exposeSyncTwins(Counter, { next: 'nextAsync' });
 * new SyncCounter(41).next(1); // 42
 * ```
 */

import { invokeMethod, keepOnHost } from './bridge';
import { TwinConflictError, TwinDefinitionError } from './errors';
import type { Logger } from './logger';
import type { Operation } from './operation';

// A mixin base must take a single `...args: any[]` rest parameter.
export type Constructor<T extends object = object> = new (...args: any[]) => T;

/** Keys of `C` whose values are methods returning an `Operation`. */
export type ScheduledMethodKeys<C> = {
  [K in keyof C]: C[K] extends (...args: never[]) => Operation<unknown> ? K : never;
}[keyof C] &
  string;

export type TwinBindings<C> = Record<string, ScheduledMethodKeys<C>>;

/** The blocking counterparts described by `B`: `(...args) => Operation<R>` becomes `(...args) => R`. */
export type SyncTwins<C, B extends TwinBindings<C>> = {
  [T in keyof B]: C[B[T]] extends (...args: infer A) => Operation<infer R> ? (...args: A) => R : never;
};

/** `Base` with one construct signature whose instances carry the twins; static members are kept. */
export type Twinned<Base extends Constructor, B extends TwinBindings<InstanceType<Base>>> = Pick<Base, keyof Base> & {
  new (...args: ConstructorParameters<Base>): InstanceType<Base> & SyncTwins<InstanceType<Base>, B>;
};

export interface TwinOptions {
  logger?: Logger;
  /** Passed to the bridge for every twin call. */
  timeoutMs?: number;
}

const bindingTables = new WeakMap<Function, Readonly<Record<string, string>>>();

/**
 * Returns a subclass of `base` with a blocking twin for each binding.
 *
 * @throws {TwinDefinitionError} When a binding names something that is not an
 *         instance method of `base`.
 * @throws {TwinConflictError} When a twin name is already taken anywhere on
 *         the prototype chain, including by a twin of an ancestor. A twin
 *         name that the constructor assigns as an instance field is reported
 *         by the same error when an instance is created.
 */
export function exposeSyncTwins<Base extends Constructor, const B extends TwinBindings<InstanceType<Base>>>(
  base: Base,
  bindings: B,
  options: TwinOptions = {},
): Twinned<Base, B> {
  const className = base.name || 'anonymous class';
  const prototype: unknown = base.prototype;
  if (typeof prototype !== 'object' || prototype === null) {
    throw new TypeError(`${className} has no prototype to extend`);
  }

  const resolved = new Map<string, Function>();
  for (const [twin, target] of Object.entries(bindings)) {
    const scheduled: unknown = Reflect.get(prototype, target);
    if (typeof scheduled !== 'function') {
      throw new TwinDefinitionError(className, twin, target);
    }
    if (twin in prototype || resolved.has(twin)) {
      throw new TwinConflictError(className, twin);
    }
    resolved.set(twin, scheduled);
  }

  const twinNames = [...resolved.keys()];
  class WithTwins extends base {
    // fields assigned by a constructor only exist once an instance does
    constructor(...args: any[]) {
      super(...args);
      const shadowed = twinNames.find((twin) => Object.hasOwn(this, twin));
      if (shadowed !== undefined) {
        throw new TwinConflictError(className, shadowed);
      }
    }
  }
  Object.defineProperty(WithTwins, 'name', { value: className, configurable: true });

  for (const [twin, scheduled] of resolved) {
    const method = {
      [twin](this: object, ...args: unknown[]): unknown {
        return invokeMethod(this, scheduled, args, { name: scheduled.name || twin, ...options });
      },
    }[twin];
    keepOnHost(method);
    Object.defineProperty(WithTwins.prototype, twin, {
      value: method,
      writable: true,
      configurable: true,
      enumerable: false,
    });
  }

  bindingTables.set(WithTwins, Object.freeze({ ...listSyncTwins(base), ...bindings }));

  // twins are defined at run time, so the compiler cannot see them on WithTwins
  return WithTwins as unknown as Twinned<Base, B>;
}

/**
 * The twin bindings of `cls`, including those inherited from twinned
 * ancestors. Empty for classes that never went through `exposeSyncTwins`.
 */
export function listSyncTwins(cls: Function): Readonly<Record<string, string>> {
  for (let current: unknown = cls; typeof current === 'function'; current = Object.getPrototypeOf(current)) {
    const table = bindingTables.get(current);
    if (table) {
      return table;
    }
  }
  return {};
}
