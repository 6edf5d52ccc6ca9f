/**
 * @module
 * OpenTelemetry-shaped tracing for bridge executions and offloaded jobs.
 * Spans are only recorded when a tracer has been configured; there is no hard
 * dependency on `@opentelemetry/api`.
 */

import { getConfig } from './config';

// By defining minimal "Like" interfaces, we avoid a hard dependency on @opentelemetry/api
// but still provide type guidance for users and for our own code.

export interface SpanLike {
  setAttributes(attributes: Record<string, SpanAttribute>): void;
  setStatus(status: { code: number; message?: string }): void;
  recordException(exception: Error | string): void;
  end(): void;
}

export type SpanAttribute = string | number | boolean;

export interface TracerLike {
  startActiveSpan<T>(
    name: string,
    options: { attributes?: Record<string, SpanAttribute> },
    fn: (span: SpanLike) => T,
  ): T;
}

const SPAN_STATUS_OK = 1;
const SPAN_STATUS_ERROR = 2;

/**
 * Runs `fn` inside an active span named `name` when a tracer is configured,
 * otherwise just runs it. `fn` is synchronous: every traced region of this
 * package either blocks or only submits work.
 *
 * @example
 * ```typescript
 * const rows = withSpan('report.build', { rows: 10 }, () => buildReport());
 * ```
 */
export function withSpan<T>(
  name: string,
  attributes: Record<string, SpanAttribute>,
  fn: (span?: SpanLike) => T,
): T {
  const tracer = getConfig().tracer;
  if (!tracer) {
    return fn();
  }

  return tracer.startActiveSpan(name, { attributes }, (span: SpanLike): T => {
    try {
      const result = fn(span);
      span.setStatus({ code: SPAN_STATUS_OK });
      return result;
    } catch (error) {
      span.recordException(error instanceof Error ? error : String(error));
      span.setStatus({
        code: SPAN_STATUS_ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
