import type { HANDLER_CATEGORIES, PIPELINE_PHASES } from "./constants.js";
import type { PipelineContext } from "./context.js";

// ---------------------------------------------------------------------------
// Phases & categories
// ---------------------------------------------------------------------------

/** One of the six fixed lifecycle phases */
export type PipelinePhase = (typeof PIPELINE_PHASES)[number];

/** Type tag carried by hooks and contracts */
export type HandlerCategory = (typeof HANDLER_CATEGORIES)[number];

export interface PhasePolicy {
  readonly failFast: boolean;
  readonly alwaysRuns: boolean;
}

// ---------------------------------------------------------------------------
// Hook descriptor
// ---------------------------------------------------------------------------

/** Immutable description of one unit of work bound to a phase */
export interface PipelineHook {
  readonly hookId: string;
  readonly phase: PipelinePhase;
  /** Opaque key resolved to a callable by the runner's resolver */
  readonly callableRef: string;
  /** Lower runs earlier among hooks whose dependencies are satisfied */
  readonly priority: number;
  /** IDs of hooks in the same phase that must run first */
  readonly dependencies: readonly string[];
  /** Absent = compatible with any contract category */
  readonly handlerCategory?: HandlerCategory;
  /** Per-invocation budget in ms */
  readonly timeoutMs?: number;
}

/** Input accepted by defineHook() and HookRegistry.register() */
export interface PipelineHookInput {
  readonly hookId: string;
  readonly phase: PipelinePhase;
  readonly callableRef: string;
  readonly priority?: number;
  readonly dependencies?: readonly string[];
  readonly handlerCategory?: HandlerCategory;
  readonly timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Callables
// ---------------------------------------------------------------------------

/** Per-invocation details handed to a hook body alongside the context */
export interface HookInvocation {
  readonly hookId: string;
  readonly phase: PipelinePhase;
  /** Aborted when the hook's timeout elapses */
  readonly signal: AbortSignal;
}

/**
 * A hook body. Direct bodies return a value; suspending bodies return a
 * promise-like. The runner awaits either before moving on.
 */
export type HookCallable = (context: PipelineContext, invocation: HookInvocation) => unknown;

/** Maps `callableRef` → hook body */
export type CallableResolver =
  | ReadonlyMap<string, HookCallable>
  | Readonly<Record<string, HookCallable>>;

// ---------------------------------------------------------------------------
// Plan building
// ---------------------------------------------------------------------------

/** One phase of a compiled plan */
export interface PhasePlan {
  readonly phase: PipelinePhase;
  readonly hooks: readonly PipelineHook[];
  readonly failFast: boolean;
}

/** Advisory finding returned by a non-enforcing build */
export interface PlanWarning {
  readonly code: "PIPELINE_HOOK_TYPE_MISMATCH";
  readonly hookId: string;
  readonly message: string;
  readonly expected: HandlerCategory;
  readonly actual: HandlerCategory;
}

export interface ExecutionPlanBuilderOptions {
  /** Category every tagged hook is validated against */
  readonly contractCategory?: HandlerCategory;
  /** true (default): mismatch throws. false: mismatch becomes a warning */
  readonly enforceTyping?: boolean;
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/** A captured continue-on-error failure */
export interface HookErrorRecord {
  readonly phase: PipelinePhase;
  readonly hookId: string;
  /** Error name, or `typeof` for thrown non-Error values */
  readonly errorType: string;
  readonly errorMessage: string;
  /** The thrown value itself */
  readonly error: unknown;
}

export interface PipelineResult {
  /** true iff no hook error was captured */
  readonly success: boolean;
  readonly errors: readonly HookErrorRecord[];
  readonly context: PipelineContext;
}

export interface PipelineRunnerOptions {
  /** Seed values copied into the run's fresh context */
  readonly initialData?: Readonly<Record<string, unknown>>;
  /** Run identifier exposed as `context.runId` (default: random UUID) */
  readonly runId?: string;
  /** Applied to hooks that declare no `timeoutMs` (default: none) */
  readonly defaultTimeoutMs?: number;
  /**
   * Diagnostic sink for every captured hook error, finalize failures during a
   * fail-fast abort included. Without it, failures are logged with console.warn.
   */
  readonly onHookError?: (record: HookErrorRecord) => void;
}

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

/** Calls the next layer (or the core unit of work) */
export type NextFunction<T> = () => Promise<T>;

/** One layer of an onion chain around a zero-argument unit of work */
export type Middleware<T> = (next: NextFunction<T>) => Promise<T>;
