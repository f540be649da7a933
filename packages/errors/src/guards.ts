/**
 * Type guards for the base error types + code-level discrimination.
 */

import type { PhaselineError } from "./base.js";
import { ConflictError } from "./bases/conflict-error.js";
import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { TimeoutError } from "./bases/timeout-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";
import type {
  ConflictCodes,
  InternalCodes,
  NotFoundCodes,
  TimeoutCodes,
  ValidationCodes,
} from "./types.js";

/** Check if an error is a ValidationError (bad input, config, definitions) */
export function isValidationError(error: unknown): error is ValidationError<ValidationCodes> {
  return error instanceof ValidationError;
}

/** Check if an error is a NotFoundError (missing resource or reference) */
export function isNotFoundError(error: unknown): error is NotFoundError<NotFoundCodes> {
  return error instanceof NotFoundError;
}

/** Check if an error is a ConflictError (state conflict) */
export function isConflictError(error: unknown): error is ConflictError<ConflictCodes> {
  return error instanceof ConflictError;
}

/** Check if an error is a TimeoutError (deadline exceeded) */
export function isTimeoutError(error: unknown): error is TimeoutError<TimeoutCodes> {
  return error instanceof TimeoutError;
}

/** Check if an error is an InternalError (bug/broken invariant) */
export function isInternalError(error: unknown): error is InternalError<InternalCodes> {
  return error instanceof InternalError;
}

/**
 * Check if a PhaselineError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: PhaselineError,
  code: C,
): error is PhaselineError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (caller mistake).
 * Returns false for values that are not PhaselineErrors.
 */
export function isExpectedError(error: unknown): boolean {
  if (error !== null && typeof error === "object" && "isExpected" in error) {
    return error.isExpected === true;
  }
  return false;
}
