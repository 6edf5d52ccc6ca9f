/**
 * @module
 * A bounded pool of worker threads that run shipped functions.
 *
 * Every job gets its own reply `MessageChannel`. A worker puts the reply on
 * the channel, bumps the thread-wide activity counter and then tells the pool
 * through its parent port. The pool therefore learns about finished jobs two
 * ways: from the `done` message while the event loop runs, or from `poll()`
 * while a scheduler blocks in `waitForActivity`. A worker that exits in the
 * middle of a job posts a crash notice on the job's port before it goes, so a
 * blocking drive learns about the crash without the `exit` event.
 */

import { err, type Result } from 'neverthrow';
import { MessageChannel, receiveMessageOnPort, type MessagePort, type Worker } from 'node:worker_threads';
import { componentLogger, getConfig } from './config';
import { PoolClosedError, WorkerCrashedError } from './errors';
import { decodeReply, encode, isJobReply, shipFunction, type ShippedFunction } from './serialization';
import { isCrashReply, isDoneMessage, spawnThread, type JobMessage } from './threads';

const log = componentLogger('pool');

// =================================================================
// Section 1: Activity Signal
// =================================================================

const activity = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));

/** Number of replies posted by any pool worker of this thread so far. */
export function activityCount(): number {
  return Atomics.load(activity, 0);
}

/**
 * Blocks the calling thread until a pool worker replies after `seen` was read,
 * or until `timeoutMs` elapses.
 */
export function waitForActivity(seen: number, timeoutMs?: number): void {
  Atomics.wait(activity, 0, seen, timeoutMs);
}

// =================================================================
// Section 2: Jobs
// =================================================================

export type JobState = 'queued' | 'running' | 'settled';

export interface JobPoller {
  poll(): void;
}

let nextJobId = 1;

/** One call submitted to a pool. Discarded once its outcome is delivered. */
export class Job<T> {
  readonly id = nextJobId++;
  state: JobState = 'queued';
  private settled: Result<T, unknown> | undefined;
  private readonly listeners = new Set<(outcome: Result<T, unknown>) => void>();
  private settledPromise: Promise<T> | undefined;

  constructor(
    readonly pool: JobPoller,
    readonly label: string,
    readonly work: ShippedFunction,
    readonly args: string,
  ) {}

  get outcome(): Result<T, unknown> | undefined {
    return this.settled;
  }

  onSettled(listener: (outcome: Result<T, unknown>) => void): () => void {
    if (this.settled) {
      listener(this.settled);
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  promise(): Promise<T> {
    this.settledPromise ??= new Promise<T>((resolve, reject) => {
      this.onSettled((outcome) => outcome.match(resolve, reject));
    });
    return this.settledPromise;
  }

  settle(outcome: Result<T, unknown>): void {
    if (this.settled) return;
    this.settled = outcome;
    this.state = 'settled';
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      try {
        listener(outcome);
      } catch (error) {
        log.error(`Listener of job #${this.id} (${this.label}) threw`, error);
      }
    }
  }
}

// =================================================================
// Section 3: Pool
// =================================================================

export interface PoolOptions {
  /** Shown in diagnostics and thread names. */
  name?: string;
  /** Upper bound of threads. @default `getConfig().maxWorkers` */
  maxWorkers?: number;
}

export interface PoolStats {
  workers: number;
  busy: number;
  queued: number;
  maxWorkers: number;
}

interface Slot {
  readonly worker: Worker;
  current?: { job: Job<unknown>; port: MessagePort };
}

export class WorkerPool implements JobPoller {
  readonly name: string;
  readonly maxWorkers: number;
  private readonly slots = new Set<Slot>();
  private readonly queue: Job<unknown>[] = [];
  private isClosed = false;

  constructor(options: PoolOptions = {}) {
    this.name = options.name ?? 'pool';
    this.maxWorkers = options.maxWorkers ?? getConfig().maxWorkers;
    if (!Number.isInteger(this.maxWorkers) || this.maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, got ${this.maxWorkers}`);
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Queues `fn(...args)` and starts it as soon as a thread is free. `fn` is
   * shipped by source; `args` and the result are serialized.
   *
   * @throws {PoolClosedError} If the pool was terminated.
   * @throws If `fn` is native or `args` cannot be serialized.
   */
  submit<A extends unknown[], R>(fn: (...args: A) => R, args: A, label?: string): Job<Awaited<R>> {
    if (this.isClosed) {
      throw new PoolClosedError(this.name);
    }
    const job = new Job<Awaited<R>>(this, label || fn.name || 'anonymous', shipFunction(fn), encode(args));
    this.queue.push(job);
    log.debug(`${this.name} queued job #${job.id} (${job.label})`);
    this.dispatch();
    return job;
  }

  /** Delivers every reply that has arrived and starts queued jobs. */
  poll(): void {
    for (const slot of this.slots) {
      const current = slot.current;
      if (!current) continue;
      const received = receiveMessageOnPort(current.port);
      if (received) {
        this.complete(slot, received.message);
      }
    }
    this.dispatch();
  }

  stats(): PoolStats {
    let busy = 0;
    for (const slot of this.slots) {
      if (slot.current) busy++;
    }
    return { workers: this.slots.size, busy, queued: this.queue.length, maxWorkers: this.maxWorkers };
  }

  /** Stops every thread. Queued and running jobs fail with `PoolClosedError`. */
  async terminate(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const job of this.queue.splice(0)) {
      job.settle(err(new PoolClosedError(this.name)));
    }
    const slots = [...this.slots];
    this.slots.clear();
    for (const slot of slots) {
      const current = slot.current;
      if (current) {
        slot.current = undefined;
        current.port.close();
        current.job.settle(err(new PoolClosedError(this.name)));
      }
    }
    await Promise.all(slots.map((slot) => slot.worker.terminate()));
    log.debug(`${this.name} terminated ${slots.length} thread(s)`);
  }

  // --- Internals ---

  private dispatch(): void {
    while (this.queue.length > 0 && !this.isClosed) {
      const slot = this.idleSlot() ?? this.grow();
      const job = slot && this.queue.shift();
      if (!slot || !job) return;
      this.start(slot, job);
    }
  }

  private idleSlot(): Slot | undefined {
    for (const slot of this.slots) {
      if (!slot.current) return slot;
    }
    return undefined;
  }

  private grow(): Slot | undefined {
    if (this.slots.size >= this.maxWorkers) return undefined;

    const worker = spawnThread({ role: 'pool', activity }, `${this.name}-${this.slots.size + 1}`);
    const slot: Slot = { worker };
    this.slots.add(slot);

    worker.on('message', (message: unknown) => {
      if (isDoneMessage(message)) {
        this.poll();
      }
    });
    worker.on('error', (error: unknown) => {
      log.warn(`${this.name} thread ${worker.threadId} raised an uncaught error`, error);
    });
    worker.on('exit', (code: number) => this.lose(slot, code));
    return slot;
  }

  private start(slot: Slot, job: Job<unknown>): void {
    const { port1, port2 } = new MessageChannel();
    slot.current = { job, port: port1 };
    job.state = 'running';
    slot.worker.ref();

    const message: JobMessage = { type: 'job', id: job.id, work: job.work, args: job.args, reply: port2 };
    slot.worker.postMessage(message, [port2]);
  }

  private complete(slot: Slot, message: unknown): void {
    const current = slot.current;
    if (!current) return;
    slot.current = undefined;
    current.port.close();
    slot.worker.unref();

    if (isCrashReply(message)) {
      // the thread is going away; keep new jobs off it
      this.slots.delete(slot);
      log.warn(`${this.name} lost a thread (exit code ${message.exitCode}) while running job #${current.job.id}`);
      current.job.settle(err(new WorkerCrashedError(message.exitCode)));
      return;
    }
    current.job.settle(
      isJobReply(message)
        ? decodeReply<unknown>(message)
        : err(new TypeError(`Malformed reply for job #${current.job.id}`)),
    );
  }

  private lose(slot: Slot, code: number): void {
    if (!this.slots.delete(slot)) {
      this.dispatch();
      return;
    }

    // a reply posted just before the exit still counts
    const current = slot.current;
    const received = current && receiveMessageOnPort(current.port);
    if (received) {
      this.complete(slot, received.message);
    } else if (current) {
      slot.current = undefined;
      current.port.close();
      log.warn(`${this.name} lost a thread (exit code ${code}) while running job #${current.job.id}`);
      current.job.settle(err(new WorkerCrashedError(code)));
    }
    this.dispatch();
  }
}

// =================================================================
// Section 4: Default Pool
// =================================================================

let sharedPool: WorkerPool | undefined;

/** The pool `runBlocking` submits to, created on first use from the config. */
export function defaultPool(): WorkerPool {
  if (!sharedPool || sharedPool.closed) {
    sharedPool = new WorkerPool({ name: 'default' });
  }
  return sharedPool;
}

/** Terminates the default pool; the next `defaultPool()` call starts a new one. */
export async function resetDefaultPool(): Promise<void> {
  const pool = sharedPool;
  sharedPool = undefined;
  if (pool) {
    await pool.terminate();
  }
}
