import { PipelineConfigurationError, type ValidationIssue } from "@phaseline/errors";
import { PHASE_POLICY, PIPELINE_PHASES } from "./constants.js";
import type { PhasePlan, PipelineHook, PipelinePhase } from "./types.js";

export type PhaseHookLists = Partial<Record<PipelinePhase, readonly PipelineHook[]>>;

function makePhasePlan(phase: PipelinePhase, hooks: readonly PipelineHook[] | undefined): PhasePlan {
  return Object.freeze({
    phase,
    hooks: Object.freeze([...(hooks ?? [])]),
    failFast: PHASE_POLICY[phase].failFast,
  });
}

/**
 * Frozen, ordered hook lists for all six phases.
 *
 * Produced by ExecutionPlanBuilder; can also be assembled directly from
 * already-ordered lists. Each phase's fail-fast flag comes from PHASE_POLICY.
 * Never mutated after construction, so one plan can back any number of
 * concurrent runners.
 */
export class ExecutionPlan {
  readonly totalHooks: number;
  private readonly plans: Readonly<Record<PipelinePhase, PhasePlan>>;

  /**
   * @throws {PipelineConfigurationError} when a hook is listed under a phase
   *   other than its own, or listed twice
   */
  constructor(hooksByPhase: PhaseHookLists = {}) {
    const issues: ValidationIssue[] = [];
    const seen = new Set<string>();
    for (const phase of PIPELINE_PHASES) {
      (hooksByPhase[phase] ?? []).forEach((hook, index) => {
        if (hook.phase !== phase) {
          issues.push({
            field: `${phase}.${index}`,
            message: `hook '${hook.hookId}' belongs to phase '${hook.phase}'`,
            code: "phase_mismatch",
          });
        }
        if (seen.has(hook.hookId)) {
          issues.push({
            field: `${phase}.${index}`,
            message: `hook '${hook.hookId}' is listed more than once`,
            code: "duplicate_hook",
          });
        }
        seen.add(hook.hookId);
      });
    }
    if (issues.length > 0) {
      throw new PipelineConfigurationError("execution plan", issues);
    }

    this.plans = Object.freeze({
      preflight: makePhasePlan("preflight", hooksByPhase.preflight),
      before: makePhasePlan("before", hooksByPhase.before),
      execute: makePhasePlan("execute", hooksByPhase.execute),
      after: makePhasePlan("after", hooksByPhase.after),
      emit: makePhasePlan("emit", hooksByPhase.emit),
      finalize: makePhasePlan("finalize", hooksByPhase.finalize),
    });
    this.totalHooks = seen.size;
    Object.freeze(this);
  }

  /** Phases in canonical execution order */
  get phases(): readonly PipelinePhase[] {
    return PIPELINE_PHASES;
  }

  phasePlan(phase: PipelinePhase): PhasePlan {
    return this.plans[phase];
  }

  hooksFor(phase: PipelinePhase): readonly PipelineHook[] {
    return this.plans[phase].hooks;
  }

  isFailFast(phase: PipelinePhase): boolean {
    return this.plans[phase].failFast;
  }

  /** Hook IDs per phase in execution order (handy for diagnostics) */
  describe(): Record<PipelinePhase, string[]> {
    return {
      preflight: this.plans.preflight.hooks.map((h) => h.hookId),
      before: this.plans.before.hooks.map((h) => h.hookId),
      execute: this.plans.execute.hooks.map((h) => h.hookId),
      after: this.plans.after.hooks.map((h) => h.hookId),
      emit: this.plans.emit.hooks.map((h) => h.hookId),
      finalize: this.plans.finalize.hooks.map((h) => h.hookId),
    };
  }
}
