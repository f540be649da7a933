/**
 * Zod schemas for hook descriptors and engine options.
 */

import {
  HookDefinitionError,
  PipelineConfigurationError,
  type ValidationIssue,
} from "@phaseline/errors";
import { z } from "zod";
import { DEFAULT_HOOK_PRIORITY, HANDLER_CATEGORIES, PIPELINE_PHASES } from "./constants.js";

// ============================================================================
// SCHEMAS
// ============================================================================

const hookIdSchema = z.string().min(1, { message: "hook ID must not be empty" });

export const PipelinePhaseSchema = z.enum(PIPELINE_PHASES);

export const HandlerCategorySchema = z.enum(HANDLER_CATEGORIES);

export const PipelineHookSchema = z
  .object({
    hookId: hookIdSchema,
    phase: PipelinePhaseSchema,
    callableRef: z.string().min(1, { message: "callableRef must not be empty" }),
    priority: z
      .number()
      .int({ message: "priority must be an integer" })
      .default(DEFAULT_HOOK_PRIORITY),
    dependencies: z.array(hookIdSchema).default([]),
    handlerCategory: HandlerCategorySchema.optional(),
    timeoutMs: z
      .number()
      .finite()
      .positive({ message: "timeoutMs must be a positive number" })
      .optional(),
  })
  .superRefine((hook, ctx) => {
    const seen = new Set<string>();
    hook.dependencies.forEach((dependency, index) => {
      if (seen.has(dependency)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["dependencies", index],
          message: `duplicate dependency '${dependency}'`,
        });
      }
      seen.add(dependency);
    });
  });

export const ExecutionPlanBuilderOptionsSchema = z.object({
  contractCategory: HandlerCategorySchema.optional(),
  enforceTyping: z.boolean().default(true),
});

export const PipelineRunnerOptionsSchema = z.object({
  initialData: z.record(z.unknown()).optional(),
  runId: z.string().min(1, { message: "runId must not be empty" }).optional(),
  defaultTimeoutMs: z
    .number()
    .finite()
    .positive({ message: "defaultTimeoutMs must be a positive number" })
    .optional(),
});

export type ParsedPipelineHook = z.output<typeof PipelineHookSchema>;
export type ParsedBuilderOptions = z.output<typeof ExecutionPlanBuilderOptionsSchema>;
export type ParsedRunnerOptions = z.output<typeof PipelineRunnerOptionsSchema>;

// ============================================================================
// PARSERS
// ============================================================================

/**
 * Convert zod issues into field-level validation issues.
 * `field` is the dotted path of the offending value ("" for the root).
 */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

function readHookId(input: unknown): string | undefined {
  if (typeof input === "object" && input !== null && "hookId" in input) {
    return typeof input.hookId === "string" && input.hookId.length > 0 ? input.hookId : undefined;
  }
  return undefined;
}

/**
 * Validate a hook descriptor input, applying defaults.
 * @throws {HookDefinitionError} when the input is malformed
 */
export function parseHookInput(input: unknown): ParsedPipelineHook {
  const result = PipelineHookSchema.safeParse(input);
  if (!result.success) {
    throw new HookDefinitionError(readHookId(input), toValidationIssues(result.error));
  }
  return result.data;
}

/**
 * Validate plan builder options, applying defaults.
 * @throws {PipelineConfigurationError} when the options are malformed
 */
export function parseBuilderOptions(options: unknown): ParsedBuilderOptions {
  const result = ExecutionPlanBuilderOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    throw new PipelineConfigurationError("builder options", toValidationIssues(result.error));
  }
  return result.data;
}

/**
 * Validate the serializable part of runner options.
 * @throws {PipelineConfigurationError} when the options are malformed
 */
export function parseRunnerOptions(options: unknown): ParsedRunnerOptions {
  const result = PipelineRunnerOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    throw new PipelineConfigurationError("runner options", toValidationIssues(result.error));
  }
  return result.data;
}
