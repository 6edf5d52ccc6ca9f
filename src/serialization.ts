/**
 * @module
 * What crosses a thread boundary: values and thrown errors (through `seroval`)
 * and functions (by source).
 */

import { err, ok, type Result } from 'neverthrow';
import { deserialize, serialize } from 'seroval';
import { DOMExceptionPlugin } from 'seroval-plugins/web';

const plugins = [DOMExceptionPlugin];

export function encode(value: unknown): string {
  return serialize(value, { plugins });
}

export function decode<T>(payload: string): T {
  return deserialize<T>(payload);
}

// =================================================================
// Section 1: Replies
// =================================================================

/**
 * A thrown value as it travels between threads. Errors are rebuilt from their
 * name, message and stack; anything else thrown (including `DOMException`)
 * travels as a serialized value.
 */
export interface Fault {
  name: string;
  message: string;
  stack?: string;
  /** Own enumerable properties of the error, serialized. */
  props?: string;
  /** Set when the thrown value was not a plain `Error`. */
  thrown?: string;
}

export type JobReply = { ok: true; payload: string } | { ok: false; fault: Fault };

export function isJobReply(message: unknown): message is JobReply {
  if (typeof message !== 'object' || message === null) return false;
  const flag: unknown = Reflect.get(message, 'ok');
  return flag === true
    ? typeof Reflect.get(message, 'payload') === 'string'
    : flag === false && typeof Reflect.get(message, 'fault') === 'object';
}

export function encodeValue(value: unknown): JobReply {
  try {
    return { ok: true, payload: encode(value) };
  } catch (error) {
    return { ok: false, fault: encodeFailure(error) };
  }
}

export function encodeFailure(error: unknown): Fault {
  if (error instanceof Error && error.constructor.name !== 'DOMException') {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      props: encodeProps(error),
    };
  }
  try {
    return { name: 'Error', message: String(error), thrown: encode(error) };
  } catch {
    return { name: 'Error', message: String(error) };
  }
}

function encodeProps(error: Error): string | undefined {
  const props: Record<string, unknown> = {};
  for (const key of Object.keys(error)) {
    if (key !== 'name' && key !== 'message' && key !== 'stack') {
      props[key] = Reflect.get(error, key);
    }
  }
  if (Object.keys(props).length === 0) return undefined;
  try {
    return encode(props);
  } catch {
    // properties that cannot cross threads are left behind
    return undefined;
  }
}

const BUILT_IN_ERRORS: Record<string, ErrorConstructor> = {
  Error,
  EvalError,
  RangeError,
  ReferenceError,
  SyntaxError,
  TypeError,
  URIError,
};

/**
 * Rebuilds a thrown value on the receiving thread. Built-in error classes are
 * restored; any other error comes back as an `Error` carrying the original
 * `name`.
 */
export function rebuildFault(fault: Fault): unknown {
  if (fault.thrown !== undefined) {
    return decode<unknown>(fault.thrown);
  }

  const Ctor = Object.prototype.hasOwnProperty.call(BUILT_IN_ERRORS, fault.name)
    ? BUILT_IN_ERRORS[fault.name]
    : Error;
  const error = new Ctor(fault.message);
  if (error.name !== fault.name) {
    error.name = fault.name;
  }
  if (fault.stack !== undefined) {
    error.stack = fault.stack;
  }
  if (fault.props !== undefined) {
    Object.assign(error, decode<Record<string, unknown>>(fault.props));
  }
  return error;
}

export function decodeReply<T>(reply: JobReply): Result<T, unknown> {
  if (!reply.ok) {
    return err(rebuildFault(reply.fault));
  }
  try {
    return ok(decode<T>(reply.payload));
  } catch (error) {
    return err(error);
  }
}

// =================================================================
// Section 2: Functions
// =================================================================

/** A function shipped by source. It must not close over anything. */
export interface ShippedFunction {
  source: string;
  name: string;
}

export function shipFunction(fn: Function): ShippedFunction {
  const source = fn.toString();
  if (/\{\s*\[native code\]\s*\}$/.test(source)) {
    throw new TypeError(`Function "${fn.name}" is native or bound and cannot be sent to another thread`);
  }
  return { source, name: fn.name };
}

const EXPRESSION = /^(async\s+)?(function\b|\(|[\w$]+\s*=>)/;
const ASYNC_ARROW = /^async\s*\(/;

function keepName<F extends Function>(target: F, value: string): F {
  return Object.defineProperty(target, 'name', { value, configurable: true });
}

/**
 * Turns a shipped function back into a callable. Method shorthand
 * (`name(x) { ... }`, `*name() { ... }`, `async name() { ... }`) is accepted
 * as well as function and arrow expressions. Every key of `scope` is visible
 * to the function body as a free variable.
 */
export function reviveFunction(shipped: ShippedFunction, scope: Record<string, unknown> = {}): Function {
  const source = shipped.source.trim();
  const expression =
    EXPRESSION.test(source) || ASYNC_ARROW.test(source)
      ? source
      : `({ ${source} })[${JSON.stringify(shipped.name)}]`;

  const names = Object.keys(scope);
  const factory = new Function('__name', ...names, `return (${expression});`);
  const revived: unknown = factory(keepName, ...names.map((name) => scope[name]));
  if (typeof revived !== 'function') {
    throw new TypeError(`Source of "${shipped.name}" did not evaluate to a function`);
  }
  return revived;
}
