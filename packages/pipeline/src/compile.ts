import { ExecutionPlanBuilder } from "./builder.js";
import type { ExecutionPlan } from "./plan.js";
import { HookRegistry } from "./registry.js";
import { PipelineRunner } from "./runner.js";
import type {
  CallableResolver,
  ExecutionPlanBuilderOptions,
  PipelineHookInput,
  PipelineResult,
  PipelineRunnerOptions,
  PlanWarning,
} from "./types.js";

export interface CompiledPipeline {
  readonly plan: ExecutionPlan;
  readonly warnings: readonly PlanWarning[];
  /** Fresh single-use runner over the shared plan */
  createRunner(resolver: CallableResolver, options?: PipelineRunnerOptions): PipelineRunner;
  /**
   * Shorthand for `createRunner(resolver, options).run()`; construction errors
   * such as missing callables surface as a rejection
   */
  run(resolver: CallableResolver, options?: PipelineRunnerOptions): Promise<PipelineResult>;
}

/**
 * Register, seal and build in one call.
 *
 * @example
 * ```typescript
 * const pipeline = compilePipeline([
 *   { hookId: "validate", phase: "preflight", callableRef: "checks.validate" },
 *   { hookId: "save", phase: "execute", callableRef: "store.save" },
 * ]);
 *
 * const result = await pipeline.run({ "checks.validate": validate, "store.save": save });
 * ```
 */
export function compilePipeline(
  hooks: readonly PipelineHookInput[],
  options?: ExecutionPlanBuilderOptions,
): CompiledPipeline {
  const registry = new HookRegistry();
  for (const hook of hooks) {
    registry.register(hook);
  }
  registry.seal();

  const { plan, warnings } = new ExecutionPlanBuilder(registry, options).build();

  const createRunner = (
    resolver: CallableResolver,
    runnerOptions?: PipelineRunnerOptions,
  ): PipelineRunner => new PipelineRunner(plan, resolver, runnerOptions);

  return Object.freeze({
    plan,
    warnings,
    createRunner,
    run: async (resolver: CallableResolver, runnerOptions?: PipelineRunnerOptions) =>
      createRunner(resolver, runnerOptions).run(),
  });
}
