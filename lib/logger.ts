/**
 * Structured logging with Pino + OpenTelemetry trace context
 *
 * A single `baseLogger` is shared by the whole library.
 * Use `baseLogger.child({ module: "name" })` for per-module context.
 *
 * The OTEL mixin injects `traceId` and `spanId` from the active
 * OpenTelemetry span into every log record, so encoder logs line up with the
 * print job that produced them.
 *
 * @module lib/logger
 */

import pino from "pino"

import { env } from "../env"
import { getActiveTraceId, getActiveSpanId } from "./tracing"

export const baseLogger = pino({
  level: env.LOGLEVEL,
  mixin() {
    const traceId = getActiveTraceId()
    const spanId = getActiveSpanId()
    if (traceId) {
      return { traceId, ...(spanId ? { spanId } : {}) }
    }
    return {}
  },
})
