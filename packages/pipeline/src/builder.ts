import {
  DependencyCycleError,
  HookRegistryNotSealedError,
  HookTypeMismatchError,
  UnknownDependencyError,
} from "@phaseline/errors";
import { PIPELINE_PHASES } from "./constants.js";
import { isCategoryCompatible } from "./hook.js";
import { ExecutionPlan, type PhaseHookLists } from "./plan.js";
import type { HookRegistry } from "./registry.js";
import type {
  ExecutionPlanBuilderOptions,
  HandlerCategory,
  PipelineHook,
  PipelinePhase,
  PlanWarning,
} from "./types.js";
import { parseBuilderOptions } from "./validation.js";

export interface BuildResult {
  readonly plan: ExecutionPlan;
  readonly warnings: readonly PlanWarning[];
}

// ---------------------------------------------------------------------------
// Ordering helpers
// ---------------------------------------------------------------------------

/** Ascending priority, then ascending hook ID (code-unit order, locale independent) */
function compareHooks(a: PipelineHook, b: PipelineHook): number {
  if (a.priority !== b.priority) {
    return a.priority < b.priority ? -1 : 1;
  }
  if (a.hookId === b.hookId) return 0;
  return a.hookId < b.hookId ? -1 : 1;
}

/**
 * Binary search for the insertion index into a list kept sorted by compareHooks.
 */
function findInsertIndex(entries: readonly PipelineHook[], hook: PipelineHook): number {
  let low = 0;
  let high = entries.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const midEntry = entries[mid];
    if (midEntry !== undefined && compareHooks(midEntry, hook) <= 0) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

function byHookId(a: PipelineHook, b: PipelineHook): number {
  if (a.hookId === b.hookId) return 0;
  return a.hookId < b.hookId ? -1 : 1;
}

/**
 * Walk unresolved hooks along unresolved dependencies until a hook repeats.
 * Every unresolved hook has at least one unresolved dependency, so the walk
 * always closes a loop.
 */
function findCycle(unresolved: ReadonlyMap<string, PipelineHook>): string[] {
  const start = [...unresolved.keys()].sort()[0];
  if (start === undefined) return [];

  const path: string[] = [];
  const position = new Map<string, number>();
  let current: string | undefined = start;
  while (current !== undefined && !position.has(current)) {
    position.set(current, path.length);
    path.push(current);
    current = unresolved.get(current)?.dependencies.find((dep) => unresolved.has(dep));
  }
  if (current === undefined) return path;
  return path.slice(position.get(current));
}

// ---------------------------------------------------------------------------
// ExecutionPlanBuilder
// ---------------------------------------------------------------------------

/**
 * One-shot compiler from a sealed HookRegistry to an ExecutionPlan.
 *
 * `build()` checks, in order: handler category compatibility, dependency
 * existence within each phase, dependency cycles, then orders each phase
 * topologically (ties: priority, then hook ID). Identical registries always
 * produce identical plans. Any failure aborts the build; a plan is never
 * partially produced.
 */
export class ExecutionPlanBuilder {
  private readonly contractCategory: HandlerCategory | undefined;
  private readonly enforceTyping: boolean;

  constructor(
    private readonly registry: HookRegistry,
    options?: ExecutionPlanBuilderOptions,
  ) {
    const parsed = parseBuilderOptions(options);
    this.contractCategory = parsed.contractCategory;
    this.enforceTyping = parsed.enforceTyping;
  }

  /**
   * @throws {HookRegistryNotSealedError} when the registry is still mutable
   * @throws {HookTypeMismatchError} on a category mismatch with enforced typing
   * @throws {UnknownDependencyError} when a dependency is absent from the phase
   * @throws {DependencyCycleError} when a phase's dependencies form a cycle
   */
  build(): BuildResult {
    if (!this.registry.isSealed) {
      throw new HookRegistryNotSealedError();
    }

    const phaseHooks = PIPELINE_PHASES.map(
      (phase) => [phase, this.registry.hooksForPhase(phase).sort(byHookId)] as const,
    );

    const warnings: PlanWarning[] = [];
    for (const [, hooks] of phaseHooks) {
      for (const hook of hooks) {
        const warning = this.checkCategory(hook);
        if (warning !== undefined) warnings.push(warning);
      }
    }

    for (const [phase, hooks] of phaseHooks) {
      this.checkDependencies(phase, hooks);
    }

    const ordered: PhaseHookLists = {};
    for (const [phase, hooks] of phaseHooks) {
      ordered[phase] = this.orderPhase(phase, hooks);
    }

    return { plan: new ExecutionPlan(ordered), warnings: Object.freeze(warnings) };
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private checkCategory(hook: PipelineHook): PlanWarning | undefined {
    const actual = hook.handlerCategory;
    const expected = this.contractCategory;
    if (actual === undefined || expected === undefined || isCategoryCompatible(actual, expected)) {
      return undefined;
    }

    const error = new HookTypeMismatchError(hook.hookId, expected, actual);
    if (this.enforceTyping) {
      throw error;
    }
    return Object.freeze({
      code: "PIPELINE_HOOK_TYPE_MISMATCH",
      hookId: hook.hookId,
      message: error.message,
      expected,
      actual,
    });
  }

  private checkDependencies(phase: PipelinePhase, hooks: readonly PipelineHook[]): void {
    const ids = new Set(hooks.map((hook) => hook.hookId));
    for (const hook of hooks) {
      for (const dependency of hook.dependencies) {
        if (!ids.has(dependency)) {
          throw new UnknownDependencyError(hook.hookId, dependency, phase);
        }
      }
    }
  }

  /** Kahn's algorithm with a ready list kept sorted by (priority, hookId) */
  private orderPhase(phase: PipelinePhase, hooks: readonly PipelineHook[]): PipelineHook[] {
    const unresolved = new Map<string, PipelineHook>();
    const pending = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const hook of hooks) {
      unresolved.set(hook.hookId, hook);
      pending.set(hook.hookId, hook.dependencies.length);
      for (const dependency of hook.dependencies) {
        const list = dependents.get(dependency);
        if (list) {
          list.push(hook.hookId);
        } else {
          dependents.set(dependency, [hook.hookId]);
        }
      }
    }

    let ready: PipelineHook[] = hooks.filter((hook) => hook.dependencies.length === 0);
    ready.sort(compareHooks);

    const ordered: PipelineHook[] = [];
    let next = ready.shift();
    while (next !== undefined) {
      ordered.push(next);
      unresolved.delete(next.hookId);

      for (const dependentId of dependents.get(next.hookId) ?? []) {
        const remaining = (pending.get(dependentId) ?? 0) - 1;
        pending.set(dependentId, remaining);
        const dependent = unresolved.get(dependentId);
        if (remaining === 0 && dependent !== undefined) {
          const index = findInsertIndex(ready, dependent);
          ready = [...ready.slice(0, index), dependent, ...ready.slice(index)];
        }
      }
      next = ready.shift();
    }

    if (unresolved.size > 0) {
      throw new DependencyCycleError(phase, findCycle(unresolved));
    }
    return ordered;
  }
}
