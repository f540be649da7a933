import { ExecutionPlanBuilder } from "../builder.js";
import type { ExecutionPlan } from "../plan.js";
import { HookRegistry } from "../registry.js";
import type { ExecutionPlanBuilderOptions, HookCallable, PipelineHookInput } from "../types.js";

/** Register the given hooks into a sealed registry */
export function sealedRegistry(hooks: readonly PipelineHookInput[]): HookRegistry {
  const registry = new HookRegistry();
  for (const hook of hooks) {
    registry.register(hook);
  }
  registry.seal();
  return registry;
}

export function buildPlan(
  hooks: readonly PipelineHookInput[],
  options?: ExecutionPlanBuilderOptions,
): ExecutionPlan {
  return new ExecutionPlanBuilder(sealedRegistry(hooks), options).build().plan;
}

/** Callable that appends `label` to the shared `log` when it runs */
export function recorder(log: string[], label: string): HookCallable {
  return () => {
    log.push(label);
  };
}

/** Async callable that appends `label` after a macrotask hop */
export function asyncRecorder(log: string[], label: string): HookCallable {
  return async () => {
    await new Promise((resolve) => setTimeout(resolve, 0));
    log.push(label);
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Busy-wait so a direct (non-promise) hook overruns a budget */
export function blockFor(ms: number): void {
  const until = performance.now() + ms;
  while (performance.now() < until) {
    // spin
  }
}
