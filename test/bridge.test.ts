// bridge.test.ts
import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  chooseBridgeStrategy,
  detectAmbientScheduler,
  invokeMethod,
  invokeToCompletion,
  runToCompletion,
} from '../src/bridge'
import { Scheduler } from '../src/scheduler'
import { sleep, spawn, yieldNow, type Operation } from '../src/operation'
import { BridgeError, SchedulerError } from '../src/errors'
import { configure, resetConfig } from '../src/config'

// Work that crosses to an isolated thread travels by source, so it only uses
// its own parameters, `this`, globals and the package namespace below.
// Imported names are rewritten by the test runner and do not resolve there.
declare const tandem: typeof import('../src/index')

function* compute(): Operation<number> {
  const child = yield* spawn(function* () {
    yield* sleep(2)
    return 40
  })
  yield* yieldNow()
  return (yield* child.join()) + 2
}

class Tally {
  constructor(public total: number) {}

  *addAsync(amount: number): Operation<number> {
    this.add(amount)
    return this.total
  }

  add(amount: number): void {
    this.total += amount
  }
}

describe('Scheduler Bridge', () => {
  afterEach(() => {
    resetConfig()
  })

  describe('Strategy', () => {
    it('should report no scheduler outside of tasks', () => {
      expect(detectAmbientScheduler()).toBe('no-scheduler')
    })

    it('should report an active scheduler inside a task step', async () => {
      const state = await new Scheduler().run(function* () {
        return detectAmbientScheduler()
      })

      expect(state).toBe('scheduler-active')
    })

    it('should map the ambient state to a strategy', () => {
      expect(chooseBridgeStrategy('no-scheduler')).toBe('inline')
      expect(chooseBridgeStrategy('scheduler-active')).toBe('isolated-thread')
    })
  })

  describe('Inline', () => {
    it('should return the same value as awaiting the work', async () => {
      const awaited = await new Scheduler().run(compute)

      expect(runToCompletion(compute)).toBe(awaited)
    })

    it('should rethrow the error of the work unchanged', () => {
      const failure = new TypeError('nope')

      expect(() =>
        runToCompletion(function* () {
          yield* sleep(1)
          throw failure
        }),
      ).toThrow(failure)
    })

    it('should return a Result when asked not to throw', () => {
      const ok = runToCompletion(compute, { throw: false })
      const failed = runToCompletion(function* () {
        yield* sleep(1)
        throw new RangeError('too far')
      }, { throw: false })

      expect(ok.isOk()).toBe(true)
      expect(ok.unwrapOr(0)).toBe(42)
      expect(failed.isErr()).toBe(true)
      expect(failed.match(() => undefined, (error) => error)).toBeInstanceOf(RangeError)
    })

    it('should reject a method that does not return a generator', () => {
      expect(() => invokeMethod(new Tally(0), Tally.prototype.add, [1])).toThrow(SchedulerError)
    })

    it('should run a method with its receiver', () => {
      const tally = new Tally(10)

      const total = invokeToCompletion(tally, Tally.prototype.addAsync, [5])

      expect(total).toBe(15)
      expect(tally.total).toBe(15)
    })

    it('should log the chosen strategy', () => {
      const debug = vi.fn()
      configure({ logger: { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() } })

      runToCompletion(compute)

      expect(debug).toHaveBeenCalledWith('[bridge] Running "compute" inline (no-scheduler)')
    })

    it('should record a span when a tracer is configured', () => {
      const span = { setAttributes: vi.fn(), setStatus: vi.fn(), recordException: vi.fn(), end: vi.fn() }
      const startActiveSpan = vi.fn()
      configure({
        tracer: {
          startActiveSpan(name, options, fn) {
            startActiveSpan(name, options)
            return fn(span)
          },
        },
      })

      runToCompletion(compute)

      expect(startActiveSpan).toHaveBeenCalledWith('tandem.bridge', {
        attributes: { 'tandem.work': 'compute', 'tandem.strategy': 'inline' },
      })
      expect(span.setAttributes).toHaveBeenCalledWith({ 'tandem.outcome': 'ok' })
      expect(span.setStatus).toHaveBeenCalledWith({ code: 1 })
      expect(span.end).toHaveBeenCalledTimes(1)
    })
  })

  describe('Isolated thread', () => {
    it('should run work on another thread when called from inside a task', async () => {
      const value = await new Scheduler().run(function* () {
        yield* sleep(1)
        return runToCompletion(function* sumOfSquares() {
          let total = 0
          for (let n = 1; n <= 4; n++) total += n * n
          return total
        })
      })

      expect(value).toBe(30)
    })

    it('should complete a bridge call nested in a blocking bridge call', () => {
      const value = runToCompletion(function* outer() {
        yield* sleep(1)
        const inner = runToCompletion(function* inner() {
          let product = 1
          for (let n = 2; n <= 5; n++) product *= n
          return product
        })
        return inner + 1
      })

      expect(value).toBe(121)
    })

    it('should complete a suspending bridge call nested in a blocking bridge call', () => {
      const value = runToCompletion(function* outer() {
        yield* sleep(1)
        const inner = runToCompletion(function* inner() {
          yield* tandem.sleep(2)
          return 120
        })
        return inner + 1
      })

      expect(value).toBe(121)
    })

    it('should run work that suspends on the other thread', async () => {
      const value = await new Scheduler().run(function* () {
        return runToCompletion(function* napping() {
          const child = yield* tandem.spawn(function* () {
            yield* tandem.sleep(2)
            return 20
          })
          yield* tandem.sleep(1)
          const doubled = yield* tandem.runBlocking((n: number) => n * 2, 11)
          return (yield* child.join()) + doubled
        })
      })

      expect(value).toBe(42)
    })

    it('should give the other thread a copy of the receiver', async () => {
      const tally = new Tally(10)

      const total = await new Scheduler().run(function* () {
        return invokeToCompletion(tally, Tally.prototype.addAsync, [5])
      })

      expect(total).toBe(15)
      expect(tally.total).toBe(10)
    })

    it('should bring back the error thrown on the other thread', async () => {
      const outcome = await new Scheduler().run(function* () {
        return runToCompletion(function* rejectNegative() {
          throw new RangeError('negative input')
        }, { throw: false })
      })

      const error = outcome.match(() => undefined, (caught) => caught)
      expect(error).toBeInstanceOf(RangeError)
      expect(error).toHaveProperty('message', 'negative input')
    })

    it('should reject a method that does not return a generator', async () => {
      const error = await new Scheduler().run(function* () {
        try {
          invokeMethod(new Tally(0), Tally.prototype.add, [1])
          return undefined
        } catch (caught) {
          return caught
        }
      })

      expect(error).toBeInstanceOf(Error)
      expect(error).toMatchObject({ name: 'SchedulerError', code: 'NOT_AN_OPERATION' })
    })

    it('should report a thread that exits without answering', async () => {
      const outcome = await new Scheduler().run(function* () {
        return runToCompletion(function* dies() {
          process.exit(2)
        }, { throw: false })
      })

      const error = outcome.match(() => undefined, (caught) => caught)
      expect(error).toBeInstanceOf(BridgeError)
      expect(error).toHaveProperty('message', 'Isolated thread for "dies" exited with code 2 without answering')
    })

    it('should report a thread killed by an uncaught error', async () => {
      const outcome = await new Scheduler().run(function* () {
        return runToCompletion(function* throwsLater() {
          setTimeout(() => {
            throw new Error('late')
          }, 1)
          yield* tandem.sleep(1_000)
          return 1
        }, { throw: false })
      })

      const error = outcome.match(() => undefined, (caught) => caught)
      expect(error).toBeInstanceOf(BridgeError)
      expect(error).toHaveProperty('message', 'Isolated thread for "throwsLater" exited with code 1 without answering')
    })

    it('should wait for the other thread to exit before returning', async () => {
      const warn = vi.fn()
      configure({ logger: { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() } })

      const value = await new Scheduler().run(function* () {
        return runToCompletion(function* quick() {
          return 7
        })
      })

      expect(value).toBe(7)
      expect(warn).not.toHaveBeenCalled()
    })

    it('should give up after the timeout', async () => {
      const outcome = await new Scheduler().run(function* () {
        return runToCompletion(function* spin() {
          for (;;) {
            // never answers
          }
        }, { throw: false, timeoutMs: 200 })
      })

      const error = outcome.match(() => undefined, (caught) => caught)
      expect(error).toBeInstanceOf(BridgeError)
      expect(error).toHaveProperty('message', 'Isolated thread for "spin" did not answer within 200ms')
    })
  })
})
