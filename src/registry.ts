/**
 * @module
 * Fire-and-forget background tasks.
 *
 * `submitBackground` starts a unit of work and hands its handle to a
 * registry, which holds it until the task settles. Callers may drop the
 * handle; the registry keeps the task reachable while it runs and forgets it
 * in the same callback that marks it terminal.
 */

import { componentLogger } from './config';
import { currentScheduler } from './context';
import type { Work } from './operation';
import { threadScheduler, type Scheduler, type TaskHandle } from './scheduler';

const log = componentLogger('registry');

/**
 * The set of background tasks that have not settled yet. Each thread has its
 * own heap and its own `backgroundTasks`, so a registry is only ever touched
 * by the thread that created it.
 */
export class TaskRegistry {
  private readonly tasks = new Set<TaskHandle<unknown>>();

  get size(): number {
    return this.tasks.size;
  }

  has(handle: TaskHandle<unknown>): boolean {
    return this.tasks.has(handle);
  }

  /** The pending handles at this moment, in no particular order. */
  snapshot(): TaskHandle<unknown>[] {
    return [...this.tasks];
  }

  /**
   * Holds `handle` until it settles. A handle that already settled is not
   * added at all.
   */
  track<T>(handle: TaskHandle<T>): TaskHandle<T> {
    if (handle.status !== 'pending') {
      return handle;
    }
    this.tasks.add(handle);
    handle.onSettled((outcome) => {
      this.tasks.delete(handle);
      if (outcome.isErr() && handle.status === 'failed') {
        log.warn(`Background task #${handle.id} (${handle.name}) failed`, outcome.error);
      }
    });
    return handle;
  }

  /** Cancels every pending task. Each one leaves the registry once it settles. */
  cancelAll(reason?: unknown): void {
    for (const handle of this.snapshot()) {
      handle.cancel(reason);
    }
  }
}

/** The registry `submitBackground` uses unless told otherwise. */
export const backgroundTasks = new TaskRegistry();

export interface SubmitOptions {
  /** Shown in diagnostics. */
  name?: string;
  /** @default backgroundTasks */
  registry?: TaskRegistry;
  /**
   * Where the task runs. Defaults to the scheduler of the calling task, or the
   * thread scheduler when called from unscheduled code.
   */
  scheduler?: Scheduler;
}

/**
 * Starts `work` without waiting for it and returns its handle. The task is
 * registered before this returns and unregistered as soon as it is done,
 * failed or cancelled. Its errors stay in the handle.
 *
 * @example
 * ```typescript
 * submitBackground(function* flush() {
 *   yield* sleep(100);
 *   yield* runBlocking(writeReport, rows);
 * });
 * ```
 */
export function submitBackground<T>(work: Work<T>, options: SubmitOptions = {}): TaskHandle<T> {
  const scheduler = options.scheduler ?? currentScheduler() ?? threadScheduler();
  const registry = options.registry ?? backgroundTasks;
  const handle = scheduler.spawn(work, { name: options.name });
  return registry.track(handle);
}
