/**
 * Trace context lookups for log correlation
 *
 * Reads the active span through @opentelemetry/api. With no SDK registered
 * there is never an active span and both helpers return undefined.
 *
 * @module lib/tracing
 */

import { trace } from "@opentelemetry/api"

const INVALID_TRACE_ID = "00000000000000000000000000000000"
const INVALID_SPAN_ID = "0000000000000000"

/**
 * Get the trace ID from the currently active span, or undefined if
 * no span is active.
 */
export function getActiveTraceId(): string | undefined {
  const span = trace.getActiveSpan()
  if (!span) return undefined
  const ctx = span.spanContext()
  if (ctx.traceId === INVALID_TRACE_ID) return undefined
  return ctx.traceId
}

/**
 * Get the span ID from the currently active span.
 */
export function getActiveSpanId(): string | undefined {
  const span = trace.getActiveSpan()
  if (!span) return undefined
  const ctx = span.spanContext()
  if (ctx.spanId === INVALID_SPAN_ID) return undefined
  return ctx.spanId
}
