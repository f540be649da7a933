/**
 * Standard span attribute types accepted by OpenTelemetry.
 */
export type SpanAttributeValue = string | number | boolean;

/**
 * Record of span attributes.
 */
export type SpanAttributes = Record<string, SpanAttributeValue>;

export interface HookTracingOptions {
  /** Extra attributes set on every hook span */
  readonly attributes?: SpanAttributes;
  /** Record invocation counts and durations as OTel metrics (default: true) */
  readonly recordMetrics?: boolean;
}
