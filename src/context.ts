/**
 * @module
 * Tracks which scheduler step, if any, the current call is running inside.
 *
 * Every task step runs through `withinFrame`, which publishes a frame through
 * an `unctx` context backed by `AsyncLocalStorage`. A frame is only live for
 * the synchronous extent of its step, so continuations that inherit the
 * async store after the step ended do not count as "inside a scheduler".
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { createContext as createUnctx } from 'unctx';
import type { Scheduler, TaskHandle } from './scheduler';

/** Whether a scheduler is stepping a task on this thread right now. */
export type AmbientState = 'no-scheduler' | 'scheduler-active';

export interface StepFrame {
  readonly scheduler: Scheduler;
  readonly task: TaskHandle<unknown>;
  live: boolean;
}

const frames = createUnctx<StepFrame>({ asyncContext: true, AsyncLocalStorage });

/**
 * Runs `fn` with `frame` published as the current step. The frame is marked
 * dead as soon as `fn` returns or throws.
 */
export function withinFrame<T>(frame: StepFrame, fn: () => T): T {
  frame.live = true;
  try {
    return frames.call(frame, fn);
  } finally {
    frame.live = false;
  }
}

/** The step currently running on this thread, if any. */
export function currentFrame(): StepFrame | undefined {
  const frame = frames.tryUse();
  return frame?.live ? frame : undefined;
}

/** The scheduler currently stepping a task on this thread, if any. */
export function currentScheduler(): Scheduler | undefined {
  return currentFrame()?.scheduler;
}

/** The task whose step is currently running, if any. */
export function currentTask(): TaskHandle<unknown> | undefined {
  return currentFrame()?.task;
}
