/**
 * Error Catalog - Single Source of Truth
 *
 * This catalog defines all error codes used across the phaseline packages.
 * Each error code maps to a behavioral base error type, a domain, and
 * whether the condition is expected (caller mistake) or unexpected (bug).
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, VALIDATION, RESOURCE, PIPELINE
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "ConflictError"
  | "TimeoutError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  INTERNAL_TIMEOUT: {
    domain: "internal",
    baseType: "TimeoutError",
    isExpected: false,
    title: "Operation timeout",
    description: "The operation exceeded its deadline",
  },

  // ============================================================================
  // GENERIC ERRORS - Validation and resource operations
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    baseType: "ValidationError",
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },
  RESOURCE_NOT_FOUND: {
    domain: "resource",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Resource not found",
    description: "The requested resource does not exist",
  },
  RESOURCE_CONFLICT: {
    domain: "resource",
    baseType: "ConflictError",
    isExpected: true,
    title: "Resource conflict",
    description: "The operation conflicts with the current state of the resource",
  },

  // ============================================================================
  // PIPELINE ERRORS - Registration
  // ============================================================================
  PIPELINE_CONFIGURATION_INVALID: {
    domain: "pipeline",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid pipeline configuration",
    description: "Builder or runner options failed validation",
  },
  PIPELINE_HOOK_INVALID: {
    domain: "pipeline",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid hook definition",
    description: "A hook descriptor failed validation",
  },
  PIPELINE_REGISTRY_FROZEN: {
    domain: "pipeline",
    baseType: "ConflictError",
    isExpected: true,
    title: "Hook registry sealed",
    description: "Hooks cannot be registered after the registry is sealed",
  },
  PIPELINE_DUPLICATE_HOOK: {
    domain: "pipeline",
    baseType: "ConflictError",
    isExpected: true,
    title: "Duplicate hook",
    description: "A hook with the same ID is already registered",
  },

  // ============================================================================
  // PIPELINE ERRORS - Plan building
  // ============================================================================
  PIPELINE_REGISTRY_NOT_SEALED: {
    domain: "pipeline",
    baseType: "ConflictError",
    isExpected: true,
    title: "Hook registry not sealed",
    description: "An execution plan can only be built from a sealed registry",
  },
  PIPELINE_HOOK_TYPE_MISMATCH: {
    domain: "pipeline",
    baseType: "ValidationError",
    isExpected: true,
    title: "Hook type mismatch",
    description: "A hook's handler category does not match the contract category",
  },
  PIPELINE_UNKNOWN_DEPENDENCY: {
    domain: "pipeline",
    baseType: "ValidationError",
    isExpected: true,
    title: "Unknown hook dependency",
    description: "A hook depends on a hook that is not registered in the same phase",
  },
  PIPELINE_DEPENDENCY_CYCLE: {
    domain: "pipeline",
    baseType: "ValidationError",
    isExpected: true,
    title: "Dependency cycle",
    description: "Hook dependencies within a phase form a cycle",
  },

  // ============================================================================
  // PIPELINE ERRORS - Execution
  // ============================================================================
  PIPELINE_CALLABLE_NOT_FOUND: {
    domain: "pipeline",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Hook callable not found",
    description: "No callable is registered for the hook's callable reference",
  },
  PIPELINE_HOOK_TIMEOUT: {
    domain: "pipeline",
    baseType: "TimeoutError",
    isExpected: false,
    title: "Hook timeout",
    description: "A hook invocation exceeded its timeout",
  },
  PIPELINE_RUNNER_REUSED: {
    domain: "pipeline",
    baseType: "ConflictError",
    isExpected: false,
    title: "Pipeline runner reused",
    description: "A pipeline runner executes exactly once",
  },
  PIPELINE_MIDDLEWARE_NEXT_REENTERED: {
    domain: "pipeline",
    baseType: "InternalError",
    isExpected: false,
    title: "Middleware next() called twice",
    description: "A middleware invoked the next layer more than once",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
