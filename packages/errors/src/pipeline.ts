import { PhaselineError } from "./base.js";
import { ConflictError } from "./bases/conflict-error.js";
import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { TimeoutError } from "./bases/timeout-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((issue) => (issue.field ? `${issue.field}: ${issue.message}` : issue.message)).join("; ");
}

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Thrown when builder or runner options fail schema validation.
 */
export class PipelineConfigurationError extends ValidationError<"PIPELINE_CONFIGURATION_INVALID"> {
  constructor(
    public readonly subject: string,
    issues: readonly ValidationIssue[],
  ) {
    super({
      code: "PIPELINE_CONFIGURATION_INVALID",
      message: `Invalid ${subject}: ${formatIssues(issues)}`,
      issues,
    });
  }
}

/**
 * Thrown when a hook descriptor fails schema validation.
 * `hookId` is undefined when the ID itself was missing or malformed.
 */
export class HookDefinitionError extends ValidationError<"PIPELINE_HOOK_INVALID"> {
  constructor(
    public readonly hookId: string | undefined,
    issues: readonly ValidationIssue[],
  ) {
    super({
      code: "PIPELINE_HOOK_INVALID",
      message: `Invalid hook${hookId !== undefined ? ` '${hookId}'` : ""}: ${formatIssues(issues)}`,
      ...(hookId !== undefined ? { metadata: { hookId } } : {}),
      issues,
    });
  }
}

// ============================================================================
// REGISTRATION
// ============================================================================

export class HookRegistryFrozenError extends ConflictError<"PIPELINE_REGISTRY_FROZEN"> {
  constructor(public readonly hookId: string) {
    super({
      code: "PIPELINE_REGISTRY_FROZEN",
      message: `Cannot register hook '${hookId}': registry is sealed`,
      metadata: { hookId },
    });
  }
}

export class DuplicateHookError extends ConflictError<"PIPELINE_DUPLICATE_HOOK"> {
  constructor(public readonly hookId: string) {
    super({
      code: "PIPELINE_DUPLICATE_HOOK",
      message: `Hook '${hookId}' is already registered`,
      metadata: { hookId },
    });
  }
}

// ============================================================================
// PLAN BUILDING
// ============================================================================

export class HookRegistryNotSealedError extends ConflictError<"PIPELINE_REGISTRY_NOT_SEALED"> {
  constructor() {
    super({
      code: "PIPELINE_REGISTRY_NOT_SEALED",
      message: "Hook registry must be sealed before building an execution plan",
    });
  }
}

export class HookTypeMismatchError extends ValidationError<"PIPELINE_HOOK_TYPE_MISMATCH"> {
  constructor(
    public readonly hookId: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super({
      code: "PIPELINE_HOOK_TYPE_MISMATCH",
      message: `Hook '${hookId}' has handler category '${actual}' but the contract requires '${expected}'`,
      metadata: { hookId, expected, actual },
    });
  }
}

export class UnknownDependencyError extends ValidationError<"PIPELINE_UNKNOWN_DEPENDENCY"> {
  constructor(
    public readonly hookId: string,
    public readonly dependencyId: string,
    public readonly phase: string,
  ) {
    super({
      code: "PIPELINE_UNKNOWN_DEPENDENCY",
      message: `Hook '${hookId}' depends on unknown hook '${dependencyId}' in phase '${phase}'`,
      metadata: { hookId, dependencyId, phase },
    });
  }
}

/**
 * Thrown when hook dependencies within one phase form a cycle.
 * `cycle` lists the member hook IDs in dependency order, each one depending
 * on the next and the last depending on the first.
 */
export class DependencyCycleError extends ValidationError<"PIPELINE_DEPENDENCY_CYCLE"> {
  readonly cycle: readonly string[];

  constructor(
    public readonly phase: string,
    cycle: readonly string[],
  ) {
    const path = cycle.length > 0 ? [...cycle, cycle[0]].join(" -> ") : "";
    super({
      code: "PIPELINE_DEPENDENCY_CYCLE",
      message: `Dependency cycle in phase '${phase}': ${path}`,
      metadata: { phase },
    });
    this.cycle = Object.freeze([...cycle]);
  }
}

// ============================================================================
// EXECUTION
// ============================================================================

/** A hook whose `callableRef` has no registered callable */
export interface MissingCallable {
  readonly hookId: string;
  readonly callableRef: string;
}

/**
 * Thrown when hook callables cannot be resolved.
 * `missing` lists every unresolved reference; `hookId` and `callableRef`
 * name the first one.
 */
export class CallableNotFoundError extends NotFoundError<"PIPELINE_CALLABLE_NOT_FOUND"> {
  readonly hookId: string;
  readonly callableRef: string;
  readonly missing: readonly MissingCallable[];

  constructor(missing: readonly [MissingCallable, ...MissingCallable[]]) {
    const [first] = missing;
    const listed = missing.map((entry) => `'${entry.callableRef}' (hook '${entry.hookId}')`);
    super({
      code: "PIPELINE_CALLABLE_NOT_FOUND",
      message:
        missing.length === 1
          ? `No callable registered for ${listed.join("")}`
          : `Multiple missing callable refs: ${listed.join(", ")}`,
      metadata: { hookId: first.hookId, callableRef: first.callableRef },
    });
    this.hookId = first.hookId;
    this.callableRef = first.callableRef;
    this.missing = Object.freeze(missing.map((entry) => Object.freeze({ ...entry })));
  }
}

export class HookTimeoutError extends TimeoutError<"PIPELINE_HOOK_TIMEOUT"> {
  constructor(
    public readonly hookId: string,
    public readonly phase: string,
    public readonly timeoutMs: number,
  ) {
    super({
      code: "PIPELINE_HOOK_TIMEOUT",
      message: `Hook '${hookId}' exceeded timeout of ${timeoutMs}ms`,
      metadata: { hookId, phase, timeoutMs: String(timeoutMs) },
    });
  }
}

export class PipelineRunnerReusedError extends ConflictError<"PIPELINE_RUNNER_REUSED"> {
  constructor() {
    super({
      code: "PIPELINE_RUNNER_REUSED",
      message: "PipelineRunner.run() can only be called once; create a new runner per execution",
    });
  }
}

export class MiddlewareChainError extends InternalError<"PIPELINE_MIDDLEWARE_NEXT_REENTERED"> {
  constructor(public readonly position: number) {
    super({
      code: "PIPELINE_MIDDLEWARE_NEXT_REENTERED",
      message: `next() called multiple times by middleware at position ${position}`,
    });
  }
}

// ============================================================================
// GUARD
// ============================================================================

/**
 * Check if an error was raised by the pipeline engine (any stage).
 */
export function isPipelineError(error: unknown): error is PhaselineError {
  return error instanceof PhaselineError && error.domain === "pipeline";
}
