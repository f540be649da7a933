import { type CodesForBase, ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import { PhaselineError } from "../base.js";
import type { PhaselineErrorOptions } from "../types.js";

type InternalCode = CodesForBase<"InternalError">;

/**
 * Errors caused by bugs or broken invariants.
 * The `.code` field discriminates the specific error.
 */
export class InternalError<C extends InternalCode = "INTERNAL_ERROR"> extends PhaselineError {
  readonly _tag = "InternalError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: PhaselineErrorOptions<C>) {
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
  }
}
