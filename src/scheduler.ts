/**
 * @module
 * A cooperative, single-threaded task scheduler for generator-based units of
 * work. One task step runs at a time; a task only gives up the thread at the
 * instructions it yields (see `./operation`).
 *
 * A scheduler is driven in one of two ways:
 * - **event loop** (`spawn`, `run`): steps are pumped through `setImmediate`,
 *   timers and promise callbacks, so the calling thread stays free;
 * - **blocking** (`runSync`): the calling thread drives every step itself and
 *   parks in `Atomics.wait` while nothing is ready, so synchronous code can
 *   run scheduled work to completion.
 */

import { err, ok, type Result } from 'neverthrow';
import { componentLogger } from './config';
import { currentFrame, withinFrame, type StepFrame } from './context';
import { CancelledError, SchedulerError, isCancelledError } from './errors';
import {
  JoinInstruction,
  isOperation,
  type AnyInstruction,
  type Operation,
  type PromiseInstruction,
  type SleepInstruction,
  type Work,
} from './operation';
import { activityCount, waitForActivity, type Job } from './pool';

const log = componentLogger('scheduler');

// =================================================================
// Section 1: Task Handles
// =================================================================

export type TaskStatus = 'pending' | 'done' | 'failed' | 'cancelled';

/**
 * A running or finished unit of work. A failed task keeps its error here and
 * nowhere else: nothing is rethrown unless someone observes the handle.
 */
export interface TaskHandle<T> {
  readonly id: number;
  readonly name: string;
  readonly status: TaskStatus;
  /** Throws a `CancelledError` into the task at its current suspension point. */
  cancel(reason?: unknown): void;
  /** Waits for the task from another task; rethrows its error. */
  join(): Operation<T>;
  /** Waits for the task from plain async code; rejects with its error. */
  promise(): Promise<T>;
  /** The outcome once the task has settled. */
  result(): Result<T, unknown> | undefined;
  /**
   * Calls `listener` once the task settles, right away if it already has.
   * Returns a function that removes the listener.
   */
  onSettled(listener: (outcome: Result<T, unknown>) => void): () => void;
}

export interface SpawnOptions {
  /** Shown in diagnostics. Defaults to the work function's name. */
  name?: string;
}

interface Wait {
  dispose(): void;
}

let nextTaskId = 1;

class TaskRecord<T> implements TaskHandle<T> {
  readonly id = nextTaskId++;
  readonly name: string;
  iterator: Operation<T> | undefined;
  wait: Wait | undefined;
  pendingThrow: { error: unknown } | undefined;
  queued = false;
  private outcome: Result<T, unknown> | undefined;
  private readonly listeners = new Set<(outcome: Result<T, unknown>) => void>();
  private settledPromise: Promise<T> | undefined;

  constructor(
    private readonly work: Work<T>,
    name: string | undefined,
    private readonly owner: Scheduler,
  ) {
    this.name = name || work.name || `task-${this.id}`;
  }

  get status(): TaskStatus {
    if (!this.outcome) return 'pending';
    if (this.outcome.isOk()) return 'done';
    return isCancelledError(this.outcome.error) ? 'cancelled' : 'failed';
  }

  cancel(reason?: unknown): void {
    if (!this.outcome) {
      this.owner.interrupt(this, reason);
    }
  }

  *join(): Operation<T> {
    const instruction = new JoinInstruction<T>(this);
    yield instruction;
    return instruction.take();
  }

  promise(): Promise<T> {
    this.settledPromise ??= new Promise<T>((resolve, reject) => {
      this.onSettled((outcome) => outcome.match(resolve, reject));
    });
    return this.settledPromise;
  }

  result(): Result<T, unknown> | undefined {
    return this.outcome;
  }

  onSettled(listener: (outcome: Result<T, unknown>) => void): () => void {
    if (this.outcome) {
      listener(this.outcome);
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Runs the generator up to its next suspension point. */
  advance(): IteratorResult<AnyInstruction, T> {
    if (!this.iterator) {
      const created = this.work();
      if (!isOperation(created)) {
        throw new SchedulerError(
          'NOT_AN_OPERATION',
          `Work "${this.name}" did not return a generator; declare it with function*`,
        );
      }
      this.iterator = created;
    }

    const pending = this.pendingThrow;
    if (pending) {
      this.pendingThrow = undefined;
      return this.iterator.throw(pending.error);
    }
    return this.iterator.next();
  }

  settle(outcome: Result<T, unknown>): void {
    if (this.outcome) return;
    this.outcome = outcome;
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      try {
        listener(outcome);
      } catch (error) {
        log.error(`Settle listener of task #${this.id} (${this.name}) threw`, error);
      }
    }
  }
}

// =================================================================
// Section 2: Scheduler
// =================================================================

export type SchedulerState = 'idle' | 'async' | 'sync' | 'closed';

export interface SchedulerOptions {
  /** Shown in diagnostics. */
  name?: string;
}

interface Sleeper {
  readonly deadline: number;
  readonly task: TaskRecord<unknown>;
  readonly instruction: SleepInstruction;
}

type DriveOutcome = 'settled' | 'deadlock';

/** How many steps one event-loop turn may take before yielding to I/O. */
const STEP_BUDGET = 64;

let nextSchedulerId = 1;

export class Scheduler {
  readonly id = nextSchedulerId++;
  readonly name: string;
  private mode: SchedulerState = 'idle';
  private readonly tasks = new Set<TaskRecord<unknown>>();
  private readonly ready: TaskRecord<unknown>[] = [];
  private readonly sleepers = new Set<Sleeper>();
  private readonly offloads = new Set<Job<unknown>>();
  private pumpQueued = false;
  private timer: NodeJS.Timeout | undefined;

  constructor(options: SchedulerOptions = {}) {
    this.name = options.name ?? `scheduler-${this.id}`;
  }

  get state(): SchedulerState {
    return this.mode;
  }

  /** Number of tasks that have not settled yet. */
  get size(): number {
    return this.tasks.size;
  }

  /**
   * Starts `work` on this scheduler, driven by the event loop, and returns its
   * handle. The first step runs on a later turn, never synchronously.
   */
  spawn<T>(work: Work<T>, options: SpawnOptions = {}): TaskHandle<T> {
    if (this.mode === 'idle') {
      this.mode = 'async';
    }
    return this.spawnTask(work, options.name);
  }

  /** Spawns `work` and resolves with its value. */
  run<T>(work: Work<T>, options: SpawnOptions = {}): Promise<T> {
    return this.spawn(work, options).promise();
  }

  /**
   * Drives `work` to completion on the calling thread and returns its value.
   * Other tasks it spawned are cancelled afterwards and the scheduler is
   * closed.
   *
   * @throws {SchedulerError} `REENTRANT_DRIVE` inside a running task,
   *         `ALREADY_RUNNING` or `CLOSED` when the scheduler was used before,
   *         `DEADLOCK` when every remaining task waits on another one.
   */
  runSync<T>(work: Work<T>, options: SpawnOptions = {}): T {
    if (currentFrame()) {
      throw new SchedulerError(
        'REENTRANT_DRIVE',
        'Cannot block on a scheduler from inside a running task; use runToCompletion',
      );
    }
    if (this.mode !== 'idle') {
      throw new SchedulerError(
        this.mode === 'closed' ? 'CLOSED' : 'ALREADY_RUNNING',
        `Scheduler "${this.name}" is ${this.mode === 'closed' ? 'closed' : 'already running'}`,
      );
    }

    this.mode = 'sync';
    const root = this.spawnTask(work, options.name);
    let drive: DriveOutcome = 'deadlock';
    try {
      drive = this.driveSync(() => root.status !== 'pending');
    } finally {
      this.teardownSync();
    }

    if (drive === 'deadlock') {
      throw new SchedulerError('DEADLOCK', `Task "${root.name}" can never be resumed`);
    }
    const outcome = root.result();
    if (!outcome) {
      throw new SchedulerError('NOT_SETTLED', `Task "${root.name}" did not settle`);
    }
    if (outcome.isErr()) {
      throw outcome.error;
    }
    return outcome.value;
  }

  /**
   * Cancels every task, waits until all of them settled and closes the
   * scheduler.
   */
  async shutdown(reason?: unknown): Promise<void> {
    while (this.tasks.size > 0) {
      const pending = [...this.tasks];
      for (const task of pending) {
        task.cancel(reason);
      }
      await Promise.allSettled(pending.map((task) => task.promise()));
    }
    this.mode = 'closed';
    this.clearTimer();
    log.debug(`${this.name} closed`);
  }

  /** @internal Called by `TaskHandle#cancel`. */
  interrupt(task: TaskRecord<unknown>, reason: unknown): void {
    if (task.status !== 'pending' || task.pendingThrow) return;
    task.wait?.dispose();
    task.wait = undefined;
    task.pendingThrow = { error: new CancelledError(reason) };
    this.enqueue(task);
  }

  // --- Task lifecycle ---

  private spawnTask<T>(work: Work<T>, name: string | undefined): TaskRecord<T> {
    if (this.mode === 'closed') {
      throw new SchedulerError('CLOSED', `Scheduler "${this.name}" is closed`);
    }
    const task = new TaskRecord(work, name, this);
    this.tasks.add(task);
    log.debug(`${this.name} spawned task #${task.id} (${task.name})`);
    this.enqueue(task);
    return task;
  }

  private step(task: TaskRecord<unknown>): void {
    task.queued = false;
    if (task.status !== 'pending') return;

    const frame: StepFrame = { scheduler: this, task, live: false };
    let next: IteratorResult<AnyInstruction, unknown>;
    try {
      next = withinFrame(frame, () => task.advance());
    } catch (error) {
      this.finish(task, err(error));
      return;
    }

    if (next.done) {
      this.finish(task, ok(next.value));
    } else {
      this.suspend(task, next.value);
    }
  }

  private finish(task: TaskRecord<unknown>, outcome: Result<unknown, unknown>): void {
    task.wait?.dispose();
    task.wait = undefined;
    this.tasks.delete(task);
    task.settle(outcome);
    if (task.status === 'failed') {
      log.debug(`${this.name} task #${task.id} (${task.name}) failed`, task.result());
    }
  }

  private enqueue(task: TaskRecord<unknown>): void {
    if (task.queued) return;
    task.queued = true;
    this.ready.push(task);
    this.pump();
  }

  // --- Suspension ---

  private suspend(task: TaskRecord<unknown>, instruction: AnyInstruction): void {
    if (task.pendingThrow) {
      // cancelled during its own step
      this.enqueue(task);
      return;
    }

    switch (instruction.kind) {
      case 'yield':
        instruction.resolve();
        this.enqueue(task);
        return;
      case 'spawn':
        instruction.resolve(this.spawnTask(instruction.work, instruction.name));
        this.enqueue(task);
        return;
      case 'sleep': {
        const sleeper: Sleeper = { deadline: performance.now() + instruction.ms, task, instruction };
        this.sleepers.add(sleeper);
        task.wait = { dispose: () => this.sleepers.delete(sleeper) };
        return;
      }
      case 'promise':
        this.suspendOnPromise(task, instruction);
        return;
      case 'offload': {
        const { job } = instruction;
        if (job.outcome) {
          this.resume(task, instruction, job.outcome);
          return;
        }
        this.offloads.add(job);
        const unsubscribe = job.onSettled((outcome) => {
          this.offloads.delete(job);
          this.resume(task, instruction, outcome);
        });
        task.wait = {
          dispose: () => {
            unsubscribe();
            this.offloads.delete(job);
          },
        };
        return;
      }
      case 'join': {
        const { target } = instruction;
        if (target === task) {
          this.resume(task, instruction, err(new SchedulerError('DEADLOCK', `Task "${task.name}" joined itself`)));
          return;
        }
        const finished = target.result();
        if (finished) {
          this.resume(task, instruction, finished);
          return;
        }
        task.wait = { dispose: target.onSettled((outcome) => this.resume(task, instruction, outcome)) };
        return;
      }
    }
  }

  private suspendOnPromise(task: TaskRecord<unknown>, instruction: PromiseInstruction<unknown>): void {
    if (this.mode !== 'async') {
      this.resume(
        task,
        instruction,
        err(
          new SchedulerError(
            'PROMISE_IN_SYNC_DRIVE',
            `Task "${task.name}" waited on a promise while the scheduler was driven synchronously`,
          ),
        ),
      );
      return;
    }

    let active = true;
    task.wait = {
      dispose: () => {
        active = false;
      },
    };
    void Promise.resolve(instruction.promise).then(
      (value) => {
        if (active) {
          active = false;
          this.resume(task, instruction, ok(value));
        }
      },
      (error: unknown) => {
        if (active) {
          active = false;
          this.resume(task, instruction, err(error));
        }
      },
    );
  }

  private resume<T>(
    task: TaskRecord<unknown>,
    slot: { resolve(value: T): void },
    outcome: Result<T, unknown>,
  ): void {
    task.wait = undefined;
    if (outcome.isOk()) {
      slot.resolve(outcome.value);
    } else if (!task.pendingThrow) {
      task.pendingThrow = { error: outcome.error };
    }
    this.enqueue(task);
  }

  private fireDueSleepers(): void {
    const now = performance.now();
    for (const sleeper of this.sleepers) {
      if (sleeper.deadline <= now) {
        this.sleepers.delete(sleeper);
        this.resume<void>(sleeper.task, sleeper.instruction, ok(undefined));
      }
    }
  }

  private nextDeadline(): number | undefined {
    let next: number | undefined;
    for (const sleeper of this.sleepers) {
      if (next === undefined || sleeper.deadline < next) {
        next = sleeper.deadline;
      }
    }
    return next;
  }

  // --- Event-loop drive ---

  private pump(): void {
    if (this.mode !== 'async' || this.pumpQueued) return;
    this.pumpQueued = true;
    setImmediate(() => this.drain());
  }

  private drain(): void {
    this.pumpQueued = false;
    this.fireDueSleepers();
    for (let budget = STEP_BUDGET; budget > 0; budget--) {
      const task = this.ready.shift();
      if (!task) break;
      this.step(task);
    }
    if (this.ready.length > 0) {
      this.pump();
    }
    this.armTimer();
  }

  private armTimer(): void {
    this.clearTimer();
    const deadline = this.nextDeadline();
    if (deadline === undefined || this.mode !== 'async') return;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.pump();
    }, Math.max(0, Math.ceil(deadline - performance.now())));
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  // --- Blocking drive ---

  private driveSync(done: () => boolean): DriveOutcome {
    while (!done()) {
      const seen = activityCount();
      for (const pool of new Set([...this.offloads].map((job) => job.pool))) {
        pool.poll();
      }
      this.fireDueSleepers();

      const task = this.ready.shift();
      if (task) {
        this.step(task);
        continue;
      }

      const deadline = this.nextDeadline();
      if (deadline === undefined && this.offloads.size === 0) {
        return 'deadlock';
      }
      waitForActivity(seen, deadline === undefined ? undefined : Math.max(0, deadline - performance.now()));
    }
    return 'settled';
  }

  private teardownSync(): void {
    if (this.tasks.size > 0) {
      log.debug(`${this.name} cancelling ${this.tasks.size} leftover task(s)`);
      for (const task of [...this.tasks]) {
        task.cancel('scheduler closed');
      }
      if (this.driveSync(() => this.tasks.size === 0) === 'deadlock') {
        for (const task of [...this.tasks]) {
          this.abandon(task);
        }
      }
    }
    this.mode = 'closed';
  }

  private abandon(task: TaskRecord<unknown>): void {
    const frame: StepFrame = { scheduler: this, task, live: false };
    try {
      withinFrame(frame, () => task.iterator?.return(undefined));
    } catch (error) {
      log.warn(`Task #${task.id} (${task.name}) threw while being abandoned`, error);
    }
    this.finish(task, err(new CancelledError('scheduler closed')));
  }
}

// =================================================================
// Section 3: Thread Scheduler
// =================================================================

let shared: Scheduler | undefined;

/**
 * The event-loop-driven scheduler of the current thread, created on first
 * use. Background work submitted from unscheduled code runs here.
 */
export function threadScheduler(): Scheduler {
  if (!shared || shared.state === 'closed') {
    shared = new Scheduler({ name: 'thread' });
  }
  return shared;
}
