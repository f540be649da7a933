import { type CodesForBase, ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import { PhaselineError } from "../base.js";
import type { PhaselineErrorOptions } from "../types.js";

type NotFoundCode = CodesForBase<"NotFoundError">;

/**
 * Errors caused by a missing resource or reference.
 * The `.code` field discriminates the specific error.
 */
export class NotFoundError<C extends NotFoundCode = "RESOURCE_NOT_FOUND"> extends PhaselineError {
  readonly _tag = "NotFoundError" as const;
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
