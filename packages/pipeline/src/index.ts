// Builder
export { type BuildResult, ExecutionPlanBuilder } from "./builder.js";
// Facade
export { type CompiledPipeline, compilePipeline } from "./compile.js";
// Constants
export {
  DEFAULT_HOOK_PRIORITY,
  HANDLER_CATEGORIES,
  HOOK_PRIORITY,
  PACKAGE_NAME,
  PHASE_POLICY,
  PIPELINE_PHASES,
} from "./constants.js";
// Context
export { PipelineContext, type PipelineContextInit } from "./context.js";
// Descriptors
export { defineHook, isCategoryCompatible, isPipelinePhase } from "./hook.js";
// Execution
export { invokeHook } from "./invoke.js";
export { MiddlewareComposer } from "./middleware.js";
export { ExecutionPlan, type PhaseHookLists } from "./plan.js";
// Registry
export { HookRegistry } from "./registry.js";
export { isMapResolver, PipelineRunner } from "./runner.js";
// Types
export type {
  CallableResolver,
  ExecutionPlanBuilderOptions,
  HandlerCategory,
  HookCallable,
  HookErrorRecord,
  HookInvocation,
  Middleware,
  NextFunction,
  PhasePlan,
  PhasePolicy,
  PipelineHook,
  PipelineHookInput,
  PipelinePhase,
  PipelineResult,
  PipelineRunnerOptions,
  PlanWarning,
} from "./types.js";
// Validation
export {
  ExecutionPlanBuilderOptionsSchema,
  HandlerCategorySchema,
  PipelineHookSchema,
  PipelinePhaseSchema,
  PipelineRunnerOptionsSchema,
} from "./validation.js";
