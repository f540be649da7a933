/**
 * @phaseline/telemetry: OpenTelemetry tracing for pipeline hooks and
 * middleware chains.
 *
 * Public API:
 * - withSpan(): span creation helper
 * - withHookTracing(): resolver wrapper that traces every hook invocation
 * - createTracingMiddleware(): span around a middleware chain
 * - getHookInvocations / getHookFailures / getHookDuration: OTel metrics
 *
 * Works against whatever tracer and meter providers the application
 * registers; without one, every span and instrument is a no-op.
 */

export const PACKAGE_NAME = "@phaseline/telemetry" as const;

// Selective OTel re-exports for advanced users
export { context, SpanStatusCode, trace } from "@opentelemetry/api";
export { withHookTracing } from "./hook-tracing.js";
export { getHookDuration, getHookFailures, getHookInvocations, METER_NAME } from "./metrics.js";
export { TRACER_NAME, withSpan } from "./span-helpers.js";
export { createTracingMiddleware } from "./tracing-middleware.js";
export type { HookTracingOptions, SpanAttributes, SpanAttributeValue } from "./types.js";
