import {
  CallableNotFoundError,
  type MissingCallable,
  PipelineRunnerReusedError,
  describeError,
} from "@phaseline/errors";
import { PACKAGE_NAME, PHASE_POLICY } from "./constants.js";
import { PipelineContext } from "./context.js";
import { invokeHook } from "./invoke.js";
import type { ExecutionPlan } from "./plan.js";
import type {
  CallableResolver,
  HookCallable,
  HookErrorRecord,
  PipelinePhase,
  PipelineResult,
  PipelineRunnerOptions,
} from "./types.js";
import { parseRunnerOptions } from "./validation.js";

type AbortState = { readonly aborted: false } | { readonly aborted: true; readonly error: unknown };

/**
 * Whether a resolver is a map rather than a plain record.
 * Any ReadonlyMap implementation counts, not only `Map` instances. Record
 * values are callables, so a record never carries a numeric `size`.
 */
export function isMapResolver(
  resolver: CallableResolver,
): resolver is ReadonlyMap<string, HookCallable> {
  return (
    resolver instanceof Map ||
    (typeof resolver.size === "number" &&
      typeof resolver.get === "function" &&
      typeof resolver.has === "function" &&
      typeof resolver.entries === "function")
  );
}

/** Private copy of a resolver's callables; later changes to the input are not seen */
function snapshotResolver(resolver: CallableResolver): ReadonlyMap<string, HookCallable> {
  const entries = isMapResolver(resolver) ? [...resolver.entries()] : Object.entries(resolver);
  return new Map(entries.filter(([, callable]) => typeof callable === "function"));
}

/**
 * Executes an ExecutionPlan once.
 *
 * Phases run strictly in order: preflight, before, execute, after, emit,
 * finalize. Hooks within a phase run one at a time in plan order, each
 * awaited before the next starts.
 *
 * - preflight / before / execute (fail-fast): the first hook error stops the
 *   run. Remaining hooks and phases are skipped, finalize runs, then the
 *   original error is rethrown unchanged.
 * - after / emit (continue): errors are captured in `result.errors` and the
 *   phase moves on.
 * - finalize: always runs exactly once with continue semantics.
 *
 * Every hook's callable is resolved when the runner is constructed, against a
 * private copy of the resolver. A runner owns one fresh PipelineContext and
 * may run only once. The plan it reads is immutable, so many runners can
 * share it concurrently.
 */
export class PipelineRunner {
  private readonly initialData: Readonly<Record<string, unknown>>;
  private readonly runId: string | undefined;
  private readonly defaultTimeoutMs: number | undefined;
  private readonly onHookError: ((record: HookErrorRecord) => void) | undefined;
  private readonly callables: ReadonlyMap<string, HookCallable>;
  private readonly errors: HookErrorRecord[] = [];
  private started = false;

  /**
   * @throws {CallableNotFoundError} listing every hook whose `callableRef`
   *   the resolver does not provide
   * @throws {PipelineConfigurationError} when the options are malformed
   */
  constructor(
    private readonly plan: ExecutionPlan,
    resolver: CallableResolver,
    options: PipelineRunnerOptions = {},
  ) {
    const parsed = parseRunnerOptions({
      initialData: options.initialData,
      runId: options.runId,
      defaultTimeoutMs: options.defaultTimeoutMs,
    });
    this.initialData = parsed.initialData ?? {};
    this.runId = parsed.runId;
    this.defaultTimeoutMs = parsed.defaultTimeoutMs;
    this.onHookError = options.onHookError;
    this.callables = snapshotResolver(resolver);
    this.assertResolvable();
  }

  get hasRun(): boolean {
    return this.started;
  }

  /**
   * Run every phase of the plan.
   *
   * @returns the run's outcome when no fail-fast phase aborted
   * @throws the first error of a fail-fast phase, after finalize has run
   * @throws {PipelineRunnerReusedError} on a second call
   */
  async run(): Promise<PipelineResult> {
    if (this.started) {
      throw new PipelineRunnerReusedError();
    }
    this.started = true;

    const context = new PipelineContext({
      data: this.initialData,
      ...(this.runId !== undefined ? { runId: this.runId } : {}),
    });

    let abort: AbortState = { aborted: false };
    for (const phase of this.plan.phases) {
      if (PHASE_POLICY[phase].alwaysRuns) continue;
      abort = await this.runPhase(phase, context);
      if (abort.aborted) break;
    }

    for (const phase of this.plan.phases) {
      if (PHASE_POLICY[phase].alwaysRuns) {
        await this.runPhase(phase, context);
      }
    }

    if (abort.aborted) {
      throw abort.error;
    }

    return {
      success: this.errors.length === 0,
      errors: Object.freeze([...this.errors]),
      context,
    };
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async runPhase(phase: PipelinePhase, context: PipelineContext): Promise<AbortState> {
    const failFast = this.plan.isFailFast(phase);

    for (const hook of this.plan.hooksFor(phase)) {
      try {
        const callable = this.resolve(hook.hookId, hook.callableRef);
        await invokeHook(hook, callable, context, hook.timeoutMs ?? this.defaultTimeoutMs);
      } catch (error) {
        if (failFast) {
          return { aborted: true, error };
        }
        this.capture(phase, hook.hookId, error);
      }
    }
    return { aborted: false };
  }

  private assertResolvable(): void {
    const missing: MissingCallable[] = [];
    for (const phase of this.plan.phases) {
      for (const { hookId, callableRef } of this.plan.hooksFor(phase)) {
        if (!this.callables.has(callableRef)) {
          missing.push({ hookId, callableRef });
        }
      }
    }

    const [first, ...rest] = missing;
    if (first !== undefined) {
      throw new CallableNotFoundError([first, ...rest]);
    }
  }

  private resolve(hookId: string, callableRef: string): HookCallable {
    const callable = this.callables.get(callableRef);
    if (callable === undefined) {
      throw new CallableNotFoundError([{ hookId, callableRef }]);
    }
    return callable;
  }

  private capture(phase: PipelinePhase, hookId: string, error: unknown): void {
    const { type, message } = describeError(error);
    const record: HookErrorRecord = Object.freeze({
      phase,
      hookId,
      errorType: type,
      errorMessage: message,
      error,
    });
    this.errors.push(record);
    this.report(record);
  }

  private report(record: HookErrorRecord): void {
    if (this.onHookError) {
      try {
        this.onHookError(record);
        return;
      } catch (sinkError) {
        console.warn(
          `[${PACKAGE_NAME}] onHookError threw while reporting hook '${record.hookId}':`,
          sinkError,
        );
      }
    }
    console.warn(
      `[${PACKAGE_NAME}] Hook '${record.hookId}' failed in phase '${record.phase}': ${record.errorType}: ${record.errorMessage}`,
    );
  }
}
