/**
 * @module
 * Code that runs inside worker threads started by `./threads`.
 *
 * Pool threads revive each shipped function, call it and post the reply on
 * the job's own port. Isolated threads start a fresh scheduler, run a single
 * unit of work on it, tear the scheduler down and reply once.
 */

import { parentPort, type MessagePort } from 'node:worker_threads';
import { componentLogger } from './config';
import { SchedulerError } from './errors';
import * as tandem from './index';
import { isOperation } from './operation';
import { Scheduler } from './scheduler';
import {
  decode,
  encodeFailure,
  encodeValue,
  reviveFunction,
  type JobReply,
  type ShippedFunction,
} from './serialization';
import {
  EXIT_SLOT,
  REPLY_SLOT,
  isJobMessage,
  type CrashReply,
  type DoneMessage,
  type IsolatedBoot,
  type JobMessage,
  type PoolBoot,
  type WorkerBoot,
} from './threads';

const log = componentLogger('worker');

function signal(counter: Int32Array, index = 0): void {
  Atomics.add(counter, index, 1);
  Atomics.notify(counter, index);
}

export async function main(boot: WorkerBoot): Promise<void> {
  if (boot.role === 'pool') {
    servePool(boot);
  } else {
    await runIsolated(boot);
  }
}

// =================================================================
// Section 1: Pool Threads
// =================================================================

function servePool(boot: PoolBoot): void {
  const port = parentPort;
  if (!port) {
    throw new Error('Pool threads must be started as worker threads');
  }
  const running = new Set<JobMessage>();

  // the parent only hears about an exit through its event loop, which a
  // blocking drive never turns; answer the job here so `poll()` sees it
  process.on('exit', (exitCode: number) => {
    for (const message of running) {
      const crash: CrashReply = { type: 'crashed', exitCode };
      message.reply.postMessage(crash);
      message.reply.close();
    }
    if (running.size > 0) {
      signal(boot.activity);
    }
  });

  port.on('message', (message: unknown) => {
    if (isJobMessage(message)) {
      running.add(message);
      void runJob(port, boot.activity, message).finally(() => running.delete(message));
    }
  });
}

async function runJob(port: MessagePort, activity: Int32Array, message: JobMessage): Promise<void> {
  let reply: JobReply;
  try {
    const fn = reviveFunction(message.work);
    const args = decode<unknown[]>(message.args);
    const value: unknown = await Reflect.apply(fn, undefined, args);
    reply = encodeValue(value);
  } catch (error) {
    reply = { ok: false, fault: encodeFailure(error) };
  }

  message.reply.postMessage(reply);
  message.reply.close();
  signal(activity);
  const done: DoneMessage = { type: 'done', id: message.id };
  port.postMessage(done);
}

// =================================================================
// Section 2: Isolated Threads
// =================================================================

/**
 * Exported names of the package, visible to shipped units of work as free
 * variables, so `function* () { yield* sleep(5); }` works on the other side.
 * The whole namespace is also bound to `tandem`.
 */
function packageScope(): Record<string, unknown> {
  return { ...tandem, tandem };
}

function rebuildReceiver(
  snapshot: Record<string, unknown>,
  methods: ShippedFunction[],
  scope: Record<string, unknown>,
): object {
  const prototype: Record<string, unknown> = {};
  for (const method of methods) {
    prototype[method.name] = reviveFunction(method, scope);
  }
  const receiver: object = Object.create(prototype);
  return Object.assign(receiver, snapshot);
}

async function runIsolated(boot: IsolatedBoot): Promise<void> {
  let answered = false;
  const answer = (message: JobReply | CrashReply): void => {
    if (answered) return;
    answered = true;
    boot.reply.postMessage(message);
    boot.reply.close();
    signal(boot.wake, REPLY_SLOT);
  };
  process.on('exit', (exitCode: number) => {
    answer({ type: 'crashed', exitCode });
    signal(boot.wake, EXIT_SLOT);
  });

  const scheduler = new Scheduler({ name: 'isolated' });
  let reply: JobReply;
  try {
    const scope = packageScope();
    const work = reviveFunction(boot.work, scope);
    const [snapshot, args] = decode<[Record<string, unknown> | undefined, unknown[]]>(boot.payload);
    const receiver = snapshot === undefined ? undefined : rebuildReceiver(snapshot, boot.methods, scope);

    const value = await scheduler.run(() => {
      const operation: unknown = Reflect.apply(work, receiver, args);
      if (!isOperation(operation)) {
        throw new SchedulerError('NOT_AN_OPERATION', `"${boot.work.name}" did not return a generator`);
      }
      return operation;
    });
    reply = encodeValue(value);
  } catch (error) {
    reply = { ok: false, fault: encodeFailure(error) };
  }

  try {
    await scheduler.shutdown();
  } catch (error) {
    log.warn('Isolated scheduler failed to shut down', error);
  }

  answer(reply);
  // the caller waits on EXIT_SLOT before it returns
  process.exit(0);
}
