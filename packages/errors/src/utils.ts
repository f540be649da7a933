import { PhaselineError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return Object.hasOwn(ERROR_CATALOG, code);
}

/**
 * Get all error codes in the catalog
 */
export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Get all error codes for a specific domain
 */
export function getErrorCodesByDomain(domain: string): ErrorCode[] {
  return getAllErrorCodes().filter((code) => ERROR_CATALOG[code].domain === domain);
}

/**
 * Wrap an unknown error into a PhaselineError.
 * If the error is already a PhaselineError, return it as-is.
 * Otherwise, wrap it in an InternalError that keeps the original as `cause`.
 */
export function wrapError(error: unknown, traceId?: string): PhaselineError {
  if (error instanceof PhaselineError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError({
      code: "INTERNAL_ERROR",
      message: error.message,
      metadata: { originalName: error.name },
      traceId,
      cause: error,
    });
  }

  return new InternalError({ code: "INTERNAL_ERROR", message: getErrorMessage(error), traceId });
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Describe a thrown value as a (type, message) pair.
 *
 * - Error instances → their `name`
 * - `null` → "null"
 * - anything else → its `typeof`
 */
export function describeError(error: unknown): { readonly type: string; readonly message: string } {
  if (error instanceof Error) {
    return { type: error.name, message: error.message };
  }
  const type = error === null ? "null" : typeof error;
  return { type, message: typeof error === "string" ? error : String(error) };
}
