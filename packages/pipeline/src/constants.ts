import type { PhasePolicy, PipelinePhase } from "./types.js";

export const PACKAGE_NAME = "@phaseline/pipeline" as const;

/** Lifecycle phases in canonical execution order */
export const PIPELINE_PHASES = [
  "preflight",
  "before",
  "execute",
  "after",
  "emit",
  "finalize",
] as const;

/**
 * Static error policy per phase. Never inferred from hook content.
 *
 * - fail-fast: the first hook error aborts the run (finalize still runs)
 * - continue: hook errors are captured and the phase moves on
 * - `alwaysRuns`: executed exactly once per run, after an abort as well
 */
export const PHASE_POLICY: Readonly<Record<PipelinePhase, PhasePolicy>> = Object.freeze({
  preflight: Object.freeze({ failFast: true, alwaysRuns: false }),
  before: Object.freeze({ failFast: true, alwaysRuns: false }),
  execute: Object.freeze({ failFast: true, alwaysRuns: false }),
  after: Object.freeze({ failFast: false, alwaysRuns: false }),
  emit: Object.freeze({ failFast: false, alwaysRuns: false }),
  finalize: Object.freeze({ failFast: false, alwaysRuns: true }),
});

/** Handler categories a hook (or a contract) may be tagged with */
export const HANDLER_CATEGORIES = ["compute", "effect", "nondeterministic_compute"] as const;

/**
 * Named priority bands for hook ordering within a phase.
 * Lower number = runs earlier. Any integer is accepted; these are conveniences.
 */
export const HOOK_PRIORITY = {
  /** Priority 0: runs first, for guards */
  CRITICAL: 0,
  /** Priority 25: runs early */
  HIGH: 25,
  /** Priority 100: default priority */
  NORMAL: 100,
  /** Priority 200: runs late */
  LOW: 200,
  /** Priority 500: runs last, for observers */
  MONITOR: 500,
} as const;

export const DEFAULT_HOOK_PRIORITY = HOOK_PRIORITY.NORMAL;
