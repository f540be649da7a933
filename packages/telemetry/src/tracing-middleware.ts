import type { Middleware } from "@phaseline/pipeline";
import { withSpan } from "./span-helpers.js";
import type { SpanAttributes } from "./types.js";

/**
 * Middleware that runs the rest of the chain inside a
 * `phaseline.middleware.{name}` span. Errors propagate unchanged.
 */
export function createTracingMiddleware<T>(
  name: string,
  attributes: SpanAttributes = {},
): Middleware<T> {
  return (next) => withSpan(`phaseline.middleware.${name}`, attributes, next);
}
