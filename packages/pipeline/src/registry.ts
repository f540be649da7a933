import { DuplicateHookError, HookRegistryFrozenError } from "@phaseline/errors";
import { defineHook } from "./hook.js";
import type { PipelineHook, PipelineHookInput, PipelinePhase } from "./types.js";

/**
 * Append-only collection of hook descriptors.
 *
 * Mutable until `seal()`, read-only afterwards. Descriptors are frozen and
 * every list read returns a fresh array, so a sealed registry can be shared
 * by any number of concurrent readers.
 */
export class HookRegistry {
  private readonly hooks = new Map<string, PipelineHook>();
  private readonly phaseIndex = new Map<PipelinePhase, readonly PipelineHook[]>();
  private sealed = false;

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  /**
   * Register a hook. Returns the frozen descriptor that was stored.
   *
   * @throws {HookRegistryFrozenError} after `seal()`
   * @throws {DuplicateHookError} when the hook ID is taken (registry unchanged)
   * @throws {HookDefinitionError} when the descriptor is malformed
   */
  register(input: PipelineHookInput): PipelineHook {
    if (this.sealed) {
      throw new HookRegistryFrozenError(input.hookId);
    }

    const hook = defineHook(input);
    if (this.hooks.has(hook.hookId)) {
      throw new DuplicateHookError(hook.hookId);
    }

    this.hooks.set(hook.hookId, hook);
    // Replace rather than push: arrays handed out earlier stay untouched
    const existing = this.phaseIndex.get(hook.phase) ?? [];
    this.phaseIndex.set(hook.phase, [...existing, hook]);
    return hook;
  }

  /** One-way transition to read-only. Calling it again is a no-op. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  /** Hooks registered for a phase, in registration order */
  hooksForPhase(phase: PipelinePhase): PipelineHook[] {
    return [...(this.phaseIndex.get(phase) ?? [])];
  }

  /** All hooks, in registration order */
  allHooks(): PipelineHook[] {
    return [...this.hooks.values()];
  }

  hookById(hookId: string): PipelineHook | undefined {
    return this.hooks.get(hookId);
  }

  has(hookId: string): boolean {
    return this.hooks.has(hookId);
  }

  get size(): number {
    return this.hooks.size;
  }
}
