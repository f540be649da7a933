/**
 * OTel metrics for hook execution.
 *
 * Instruments are created lazily on first access. Without a registered meter
 * provider they are no-ops.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

export const METER_NAME = "phaseline";

let _hookInvocations: Counter | undefined;
let _hookFailures: Counter | undefined;
let _hookDuration: Histogram | undefined;

/** Counter of hook invocations, attributed by phase */
export function getHookInvocations(): Counter {
  if (_hookInvocations === undefined) {
    _hookInvocations = metrics.getMeter(METER_NAME).createCounter("phaseline.hook.invocations", {
      description: "Hook invocations",
    });
  }
  return _hookInvocations;
}

/** Counter of failed hook invocations, attributed by phase and error type */
export function getHookFailures(): Counter {
  if (_hookFailures === undefined) {
    _hookFailures = metrics.getMeter(METER_NAME).createCounter("phaseline.hook.failures", {
      description: "Hook invocations that threw or rejected",
    });
  }
  return _hookFailures;
}

/** Histogram of hook wall-clock duration in milliseconds */
export function getHookDuration(): Histogram {
  if (_hookDuration === undefined) {
    _hookDuration = metrics.getMeter(METER_NAME).createHistogram("phaseline.hook.duration_ms", {
      description: "Hook duration in milliseconds",
      unit: "ms",
    });
  }
  return _hookDuration;
}
