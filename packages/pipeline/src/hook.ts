import { PIPELINE_PHASES } from "./constants.js";
import type { HandlerCategory, PipelineHook, PipelineHookInput, PipelinePhase } from "./types.js";
import { parseHookInput } from "./validation.js";

/**
 * Validate a hook descriptor and return it frozen.
 *
 * Applies defaults (priority NORMAL, no dependencies). Whether dependencies
 * exist is checked when the plan is built, since hooks may be registered in
 * any order.
 *
 * @throws {HookDefinitionError} when the input is malformed
 */
export function defineHook(input: PipelineHookInput): PipelineHook {
  const parsed = parseHookInput(input);

  const hook: PipelineHook = {
    hookId: parsed.hookId,
    phase: parsed.phase,
    callableRef: parsed.callableRef,
    priority: parsed.priority,
    dependencies: Object.freeze([...parsed.dependencies]),
    ...(parsed.handlerCategory !== undefined ? { handlerCategory: parsed.handlerCategory } : {}),
    ...(parsed.timeoutMs !== undefined ? { timeoutMs: parsed.timeoutMs } : {}),
  };
  return Object.freeze(hook);
}

/**
 * Tagged-variant compatibility check between a hook and a contract.
 * An absent tag on either side is a wildcard; otherwise the tags must match.
 */
export function isCategoryCompatible(
  hookCategory: HandlerCategory | undefined,
  contractCategory: HandlerCategory | undefined,
): boolean {
  if (hookCategory === undefined || contractCategory === undefined) {
    return true;
  }
  return hookCategory === contractCategory;
}

/** Narrow an arbitrary value to a lifecycle phase name */
export function isPipelinePhase(value: unknown): value is PipelinePhase {
  return PIPELINE_PHASES.some((phase) => phase === value);
}
