/**
 * @phaseline/errors
 *
 * Shared error taxonomy for the phaseline pipeline engine.
 *
 * The error system is built on 5 behavioral base types:
 * ValidationError, NotFoundError, ConflictError, TimeoutError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isPhaselineError, PhaselineError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  describeError,
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export {
  ConflictError,
  InternalError,
  NotFoundError,
  TimeoutError,
  ValidationError,
} from "./bases/index.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ConflictCodes,
  InternalCodes,
  NotFoundCodes,
  PhaselineErrorOptions,
  TimeoutCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isConflictError,
  isExpectedError,
  isInternalError,
  isNotFoundError,
  isTimeoutError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// PIPELINE ERRORS
// ============================================================================

export {
  CallableNotFoundError,
  DependencyCycleError,
  DuplicateHookError,
  HookDefinitionError,
  HookRegistryFrozenError,
  HookRegistryNotSealedError,
  HookTimeoutError,
  HookTypeMismatchError,
  isPipelineError,
  MiddlewareChainError,
  type MissingCallable,
  PipelineConfigurationError,
  PipelineRunnerReusedError,
  UnknownDependencyError,
} from "./pipeline.js";
