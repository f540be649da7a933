/**
 * Non-invasive tracing for pipeline hooks.
 *
 * Wraps every callable of a resolver so each invocation runs inside a span
 * named `phaseline.hook.{callableRef}`. The engine itself stays unaware of
 * OpenTelemetry; tracing is opted into by passing the wrapped resolver to a
 * PipelineRunner.
 */

import { performance } from "node:perf_hooks";
import { describeError } from "@phaseline/errors";
import { type CallableResolver, type HookCallable, isMapResolver } from "@phaseline/pipeline";
import { getHookDuration, getHookFailures, getHookInvocations } from "./metrics.js";
import { withSpan } from "./span-helpers.js";
import type { HookTracingOptions } from "./types.js";

function resolverEntries(resolver: CallableResolver): [string, HookCallable][] {
  if (isMapResolver(resolver)) {
    return [...resolver.entries()];
  }
  return Object.entries(resolver);
}

function traceCallable(
  callableRef: string,
  callable: HookCallable,
  options: HookTracingOptions,
): HookCallable {
  const recordMetrics = options.recordMetrics ?? true;

  return (context, invocation) => {
    const attributes = {
      ...options.attributes,
      "pipeline.run_id": context.runId,
      "pipeline.phase": invocation.phase,
      "pipeline.hook_id": invocation.hookId,
      "pipeline.callable_ref": callableRef,
    };
    const metricAttributes = { "pipeline.phase": invocation.phase };
    const startedAt = performance.now();

    return withSpan(`phaseline.hook.${callableRef}`, attributes, async () => {
      try {
        return await callable(context, invocation);
      } catch (error) {
        if (recordMetrics) {
          getHookFailures().add(1, { ...metricAttributes, "error.type": describeError(error).type });
        }
        throw error;
      } finally {
        if (recordMetrics) {
          getHookInvocations().add(1, metricAttributes);
          getHookDuration().record(performance.now() - startedAt, metricAttributes);
        }
      }
    });
  };
}

/**
 * Return a resolver whose callables are traced.
 *
 * The input resolver is left untouched. Errors propagate unchanged; the
 * wrapper only adds observability.
 *
 * @example
 * ```typescript
 * const runner = new PipelineRunner(plan, withHookTracing(callables));
 * ```
 */
export function withHookTracing(
  resolver: CallableResolver,
  options: HookTracingOptions = {},
): ReadonlyMap<string, HookCallable> {
  const traced = new Map<string, HookCallable>();
  for (const [callableRef, callable] of resolverEntries(resolver)) {
    traced.set(callableRef, traceCallable(callableRef, callable, options));
  }
  return traced;
}
