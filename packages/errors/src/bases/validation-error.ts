import { type CodesForBase, ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import { PhaselineError } from "../base.js";
import type { PhaselineErrorOptions, ValidationIssue } from "../types.js";

type ValidationCode = CodesForBase<"ValidationError">;

/**
 * Errors caused by invalid input, configuration, or hook definitions.
 * The `.code` field discriminates the specific error.
 */
export class ValidationError<
  C extends ValidationCode = "VALIDATION_FAILED",
> extends PhaselineError {
  readonly _tag = "ValidationError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues (empty when the error is not field-level) */
  readonly issues: readonly ValidationIssue[];

  constructor(options: PhaselineErrorOptions<C> & { issues?: readonly ValidationIssue[] }) {
    super(
      options.message,
      options.metadata,
      options.traceId,
      options.cause !== undefined ? { cause: options.cause } : undefined,
    );
    const entry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = options.issues ?? [];
  }
}
