// config.test.ts
import { describe, it, expect, vi, afterEach } from 'vitest'
import { MAX_WORKERS_ENV, componentLogger, configure, getConfig, resetConfig } from '../src/config'
import { noopLogger } from '../src/logger'
import { withSpan, type SpanLike, type TracerLike } from '../src/telemetry'

describe('Configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    resetConfig()
  })

  it('should start with a silent logger and no bridge timeout', () => {
    expect(getConfig().logger).toBe(noopLogger)
    expect(getConfig().bridgeTimeoutMs).toBe(0)
    expect(getConfig().maxWorkers).toBeGreaterThanOrEqual(1)
  })

  it('should read the pool size from the environment', () => {
    vi.stubEnv(MAX_WORKERS_ENV, '3')
    resetConfig()

    expect(getConfig().maxWorkers).toBe(3)
  })

  it('should ignore an unusable pool size in the environment', () => {
    vi.stubEnv(MAX_WORKERS_ENV, 'many')
    resetConfig()

    expect(getConfig().maxWorkers).toBeGreaterThanOrEqual(1)
  })

  it('should merge overrides', () => {
    const merged = configure({ maxWorkers: 2, bridgeTimeoutMs: 500 })

    expect(merged.maxWorkers).toBe(2)
    expect(merged.bridgeTimeoutMs).toBe(500)
    expect(merged.logger).toBe(noopLogger)
  })

  it('should reject invalid values', () => {
    expect(() => configure({ maxWorkers: 0 })).toThrow(RangeError)
    expect(() => configure({ maxWorkers: 1.5 })).toThrow(RangeError)
    expect(() => configure({ bridgeTimeoutMs: -1 })).toThrow(RangeError)
    expect(getConfig().bridgeTimeoutMs).toBe(0)
  })

  it('should send component logs to the logger configured later', () => {
    const log = componentLogger('pool')
    const warn = vi.fn()
    configure({ logger: { ...noopLogger, warn } })

    log.warn('lost a thread', 3)

    expect(warn).toHaveBeenCalledWith('[pool] lost a thread', 3)
  })
})

describe('Tracing', () => {
  afterEach(() => {
    resetConfig()
  })

  function recordingTracer() {
    const span = { setAttributes: vi.fn(), setStatus: vi.fn(), recordException: vi.fn(), end: vi.fn() }
    const started: Array<{ name: string; attributes?: Record<string, string | number | boolean> }> = []
    const tracer: TracerLike = {
      startActiveSpan(name, options, fn) {
        started.push({ name, attributes: options.attributes })
        return fn(span)
      },
    }
    return { span, started, tracer }
  }

  it('should just run the function without a tracer', () => {
    const fn = vi.fn((span?: SpanLike) => (span ? 'traced' : 'plain'))

    expect(withSpan('work', {}, fn)).toBe('plain')
  })

  it('should end a successful span with an ok status', () => {
    const { span, started, tracer } = recordingTracer()
    configure({ tracer })

    const value = withSpan('work', { rows: 3 }, () => 'done')

    expect(value).toBe('done')
    expect(started).toEqual([{ name: 'work', attributes: { rows: 3 } }])
    expect(span.setStatus).toHaveBeenCalledWith({ code: 1 })
    expect(span.end).toHaveBeenCalledTimes(1)
  })

  it('should record the exception and rethrow it', () => {
    const { span, tracer } = recordingTracer()
    configure({ tracer })
    const failure = new Error('write failed')

    expect(() =>
      withSpan('work', {}, () => {
        throw failure
      }),
    ).toThrow(failure)
    expect(span.recordException).toHaveBeenCalledWith(failure)
    expect(span.setStatus).toHaveBeenCalledWith({ code: 2, message: 'write failed' })
    expect(span.end).toHaveBeenCalledTimes(1)
  })
})
