// offload.test.ts
import { describe, it, expect, afterAll } from 'vitest'
import { offloadTo, runBlocking } from '../src/offload'
import { runToCompletion } from '../src/bridge'
import { WorkerPool, resetDefaultPool } from '../src/pool'
import { Scheduler } from '../src/scheduler'
import { sleep } from '../src/operation'
import { PoolClosedError, WorkerCrashedError } from '../src/errors'

// Functions handed to the pool travel by source: they may only use their
// parameters and globals.

async function failureOf(pending: PromiseLike<unknown>): Promise<Error> {
  try {
    await pending
  } catch (error) {
    if (error instanceof Error) return error
    throw new Error(`expected an Error, got ${String(error)}`)
  }
  throw new Error('expected the call to fail')
}

describe('Blocking-Call Offloader', () => {
  const pool = new WorkerPool({ name: 'test', maxWorkers: 2 })

  afterAll(async () => {
    await pool.terminate()
    await resetDefaultPool()
  })

  describe('From async code', () => {
    it('should resolve with the return value of the function', async () => {
      const product = await offloadTo(pool, (a: number, b: number) => a * b, 6, 7)

      expect(product).toBe(42)
    })

    it('should run on the default pool through runBlocking', async () => {
      const shout = await runBlocking((text: string) => text.toUpperCase(), 'quiet please')

      expect(shout).toBe('QUIET PLEASE')
    })

    it('should await a promise returned by the function', async () => {
      const value = await offloadTo(pool, async (ms: number) => {
        await new Promise((resolve) => setTimeout(resolve, ms))
        return `waited ${ms}ms`
      }, 5)

      expect(value).toBe('waited 5ms')
    })

    it('should carry structured values both ways', async () => {
      const grouped = await offloadTo(
        pool,
        (words: string[]) => {
          const byLength = new Map<number, string[]>()
          for (const word of words) {
            byLength.set(word.length, [...(byLength.get(word.length) ?? []), word])
          }
          return byLength
        },
        ['ant', 'bee', 'wasp'],
      )

      expect(grouped).toEqual(new Map([[3, ['ant', 'bee']], [4, ['wasp']]]))
    })

    it('should reject with the error thrown by the function', async () => {
      const error = await failureOf(offloadTo(pool, () => {
        throw new Error('boom')
      }))

      expect(error.message).toBe('boom')
    })

    it('should keep built-in error classes', async () => {
      const error = await failureOf(offloadTo(pool, (n: number) => {
        throw new RangeError(`${n} is out of range`)
      }, 9))

      expect(error).toBeInstanceOf(RangeError)
      expect(error.message).toBe('9 is out of range')
    })

    it('should keep the name and own properties of custom errors', async () => {
      const error = await failureOf(offloadTo(pool, (code: string) => {
        const lookup = new Error('not found')
        lookup.name = 'LookupError'
        throw Object.assign(lookup, { code })
      }, 'E_MISSING'))

      expect(error.name).toBe('LookupError')
      expect(error.message).toBe('not found')
      expect(Reflect.get(error, 'code')).toBe('E_MISSING')
    })

    it('should refuse native functions', () => {
      expect(() => offloadTo(pool, Math.max, 1, 2)).toThrow(TypeError)
    })
  })

  describe('From scheduled code', () => {
    it('should suspend only the waiting task', async () => {
      const scheduler = new Scheduler()
      const ticks: number[] = []

      scheduler.spawn(function* () {
        for (let tick = 0; tick < 5; tick++) {
          yield* sleep(5)
          ticks.push(tick)
        }
      })
      const value = await scheduler.run(function* () {
        return yield* offloadTo(pool, (ms: number) => {
          const end = Date.now() + ms
          while (Date.now() < end) {
            // spin
          }
          return 'slept'
        }, 300)
      })

      expect(value).toBe('slept')
      expect(ticks).toEqual([0, 1, 2, 3, 4])
    })

    it('should deliver results to a blocking drive', () => {
      const value = new Scheduler().runSync(function* () {
        const first = yield* offloadTo(pool, (n: number) => n + 1, 40)
        return yield* offloadTo(pool, (n: number) => n + 1, first)
      })

      expect(value).toBe(42)
    })

    it('should throw the offloaded error at the yield point', async () => {
      const caught = await new Scheduler().run(function* () {
        try {
          yield* offloadTo(pool, () => {
            throw new TypeError('bad row')
          })
          return 'unreachable'
        } catch (error) {
          return error instanceof TypeError ? error.message : 'wrong class'
        }
      })

      expect(caught).toBe('bad row')
    })
  })

  describe('Pool', () => {
    it('should bound the number of threads and queue the rest', async () => {
      const bounded = new WorkerPool({ name: 'bounded', maxWorkers: 2 })
      try {
        const jobs = [1, 2, 3].map((n) => offloadTo(bounded, (value: number) => value * 10, n))

        expect(bounded.stats()).toEqual({ workers: 2, busy: 2, queued: 1, maxWorkers: 2 })
        expect(jobs.map((job) => job.state)).toEqual(['running', 'running', 'queued'])
        expect(await Promise.all(jobs)).toEqual([10, 20, 30])
      } finally {
        await bounded.terminate()
      }
    })

    it('should fail a job whose thread exits', async () => {
      const fragile = new WorkerPool({ name: 'fragile', maxWorkers: 1 })
      try {
        const error = await failureOf(offloadTo(fragile, (code: number) => process.exit(code), 3))

        expect(error).toBeInstanceOf(WorkerCrashedError)
        expect(error).toMatchObject({ exitCode: 3 })
        expect(await offloadTo(fragile, () => 'replaced')).toBe('replaced')
      } finally {
        await fragile.terminate()
      }
    })

    it('should fail a crashed job while a scheduler blocks on it', async () => {
      const fragile = new WorkerPool({ name: 'fragile-blocking', maxWorkers: 1 })
      try {
        const outcome = runToCompletion(function* () {
          return yield* offloadTo(fragile, () => {
            setTimeout(() => {
              throw new Error('late')
            }, 1)
            return new Promise<never>(() => {})
          })
        }, { throw: false })

        const error = outcome.match(() => undefined, (caught) => caught)
        expect(error).toBeInstanceOf(WorkerCrashedError)
        expect(error).toMatchObject({ exitCode: 1 })
        expect(runToCompletion(function* () {
          return yield* offloadTo(fragile, () => 'replaced')
        })).toBe('replaced')
      } finally {
        await fragile.terminate()
      }
    })

    it('should fail pending and new jobs once terminated', async () => {
      const closing = new WorkerPool({ name: 'closing', maxWorkers: 1 })
      const pending = offloadTo(closing, (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)), 10_000)

      await closing.terminate()

      expect(await failureOf(pending)).toBeInstanceOf(PoolClosedError)
      expect(() => closing.submit(() => 1, [])).toThrow(PoolClosedError)
      expect(closing.closed).toBe(true)
    })

    it('should reject an invalid size', () => {
      expect(() => new WorkerPool({ maxWorkers: 0 })).toThrow(RangeError)
    })
  })
})
