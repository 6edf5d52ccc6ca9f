/**
 * @module
 * Starts worker threads running `./worker-entry`.
 *
 * Threads boot from `./worker-boot.mjs`, which registers tsx's loader when the
 * entry is TypeScript, imports the entry and hands it the boot record. If the
 * import itself fails, the bootstrap still answers every caller with a fault
 * and signals the wake counter, so a thread blocked in `Atomics.wait` is never
 * left waiting for an entry that never loaded.
 */

import { Worker, type MessagePort } from 'node:worker_threads';
import type { ShippedFunction } from './serialization';

/** A pool thread: serves jobs posted to it, one at a time. */
export interface PoolBoot {
  role: 'pool';
  /** Incremented and notified after every reply. */
  activity: Int32Array;
}

/** Index in an isolated thread's wake counter bumped once the reply is posted. */
export const REPLY_SLOT = 0;
/** Index bumped when the isolated thread exits. */
export const EXIT_SLOT = 1;

/** A bridge thread: runs one unit of work on its own scheduler, then exits. */
export interface IsolatedBoot {
  role: 'isolated';
  /** Two counters, `REPLY_SLOT` and `EXIT_SLOT`. */
  wake: Int32Array;
  reply: MessagePort;
  work: ShippedFunction;
  /** Serialized `[receiver, args]`. */
  payload: string;
  /** Method sources that make up the receiver's prototype, nearest first. */
  methods: ShippedFunction[];
}

export type WorkerBoot = PoolBoot | IsolatedBoot;

/** Posted to a pool thread for every job. */
export interface JobMessage {
  type: 'job';
  id: number;
  work: ShippedFunction;
  args: string;
  reply: MessagePort;
}

/** Posted back by a pool thread once a job's reply is on its port. */
export interface DoneMessage {
  type: 'done';
  id: number;
}

/** Posted on a pending reply port by a thread that is exiting without an answer. */
export interface CrashReply {
  type: 'crashed';
  exitCode: number;
}

const BOOT_URL = new URL('./worker-boot.mjs', import.meta.url);
const ENTRY_URL = new URL('./worker-entry.ts', import.meta.url);

export function spawnThread(boot: WorkerBoot, name: string): Worker {
  const transferList = boot.role === 'isolated' ? [boot.reply] : [];
  return new Worker(BOOT_URL, {
    name,
    workerData: { entry: ENTRY_URL.href, boot },
    transferList,
  });
}

export function isJobMessage(message: unknown): message is JobMessage {
  return typeof message === 'object' && message !== null && Reflect.get(message, 'type') === 'job';
}

export function isDoneMessage(message: unknown): message is DoneMessage {
  return typeof message === 'object' && message !== null && Reflect.get(message, 'type') === 'done';
}

export function isCrashReply(message: unknown): message is CrashReply {
  return (
    typeof message === 'object' &&
    message !== null &&
    Reflect.get(message, 'type') === 'crashed' &&
    typeof Reflect.get(message, 'exitCode') === 'number'
  );
}
