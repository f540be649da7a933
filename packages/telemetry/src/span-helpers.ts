/**
 * Span creation around a unit of work: attributes, error status, always-end.
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import { describeError } from "@phaseline/errors";
import type { SpanAttributes } from "./types.js";

export const TRACER_NAME = "phaseline";

/**
 * Execute an async function within a named OTel span.
 *
 * - Sets provided attributes on the span
 * - Records exceptions, `error.type` and ERROR status on failure
 * - Sets OK status on success
 * - Always ends the span (even on error)
 * - Returns the function's return value
 *
 * When no tracer provider is registered (OTel disabled), the function
 * still executes with a no-op span (zero overhead from OTel API).
 *
 * @param name - Span name (e.g., "phaseline.hook.orders.persist")
 * @param attributes - Key-value pairs to set on the span
 * @param fn - Async function to execute within the span
 * @returns The function's return value
 * @throws Re-throws any error from fn after recording it on the span
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: () => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      for (const [key, value] of Object.entries(attributes)) {
        span.setAttribute(key, value);
      }
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const { type, message } = describeError(error);
      span.setAttribute("error.type", type);
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      throw error;
    } finally {
      span.end();
    }
  });
}
