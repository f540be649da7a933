import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * JSON representation of a PhaselineError
 */
export interface ErrorJSON {
  _tag: BaseErrorType;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  stack?: string | undefined;
}

/**
 * Root of the error hierarchy.
 *
 * Concrete errors extend one of the behavioral base types (ValidationError,
 * NotFoundError, ConflictError, TimeoutError, InternalError), which fill in
 * the catalog-derived fields.
 */
export abstract class PhaselineError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
    Error.captureStackTrace(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
      traceId: this.traceId,
      stack: this.stack,
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata !== undefined && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    if (this.traceId !== undefined) {
      str += ` [trace: ${this.traceId}]`;
    }
    return str;
  }
}

/**
 * Check if a value is a PhaselineError
 */
export function isPhaselineError(error: unknown): error is PhaselineError {
  return error instanceof PhaselineError;
}

/**
 * Check if a value is an Error (native or PhaselineError)
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
