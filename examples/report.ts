/**
 * Counts primes through a sync twin, bridges work out of a running task and
 * keeps a background heartbeat going. Run with `npx tsx examples/report.ts`.
 */
import {
  configure,
  exposeSyncTwins,
  resetDefaultPool,
  runBlocking,
  runToCompletion,
  sleep,
  submitBackground,
  backgroundTasks,
  type Operation,
} from '../src/index';

configure({ logger: console, maxWorkers: 2 });

function countPrimes(limit: number): number {
  let count = 0;
  for (let n = 2; n <= limit; n++) {
    let prime = true;
    for (let d = 2; d * d <= n; d++) {
      if (n % d === 0) {
        prime = false;
        break;
      }
    }
    if (prime) count++;
  }
  return count;
}

class Report {
  constructor(readonly limit: number) {}

  *buildAsync(title: string): Operation<string> {
    yield* sleep(10);
    const primes = yield* runBlocking(countPrimes, this.limit);
    return `${title}: ${primes} primes up to ${this.limit}`;
  }
}

const SyncReport = exposeSyncTwins(Report, { build: 'buildAsync' });

async function main(): Promise<void> {
  const heartbeat = submitBackground(function* heartbeat() {
    for (let beat = 1; beat <= 3; beat++) {
      yield* sleep(20);
      console.log(`heartbeat ${beat}`);
    }
  });

  // blocking code drives the scheduled method on this thread
  console.log(new SyncReport(50_000).build('sync twin'));

  const fromTask = submitBackground(function* fromTask() {
    yield* sleep(1);
    // inside a task the bridge moves the work to its own thread
    return runToCompletion(function* isolated() {
      yield* sleep(5);
      return 'bridged from a task';
    });
  });
  console.log(await fromTask.promise());

  await heartbeat.promise();
  console.log(`pending background tasks: ${backgroundTasks.size}`);
  await resetDefaultPool();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
