import { performance } from "node:perf_hooks";
import { HookTimeoutError } from "@phaseline/errors";
import type { PipelineContext } from "./context.js";
import type { HookCallable, PipelineHook } from "./types.js";

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Invoke one hook body through a single adapter, whether it returns directly
 * or returns a promise-like.
 *
 * With a timeout:
 * - suspending bodies race a timer; on expiry the invocation signal is
 *   aborted and the returned promise rejects with HookTimeoutError, also when
 *   the body itself settles in response to the abort, and when it settled
 *   before the timer fired but after the budget ran out
 * - direct bodies cannot be preempted; they are measured instead and fail with
 *   HookTimeoutError when they returned or threw later than the budget allows
 *
 * The timer is always cleared, so a fast hook leaves nothing pending.
 */
export async function invokeHook(
  hook: PipelineHook,
  callable: HookCallable,
  context: PipelineContext,
  timeoutMs: number | undefined,
): Promise<void> {
  const controller = new AbortController();
  const invocation = { hookId: hook.hookId, phase: hook.phase, signal: controller.signal };

  if (timeoutMs === undefined) {
    const result = callable(context, invocation);
    if (isPromiseLike(result)) {
      await result;
    }
    return;
  }

  const budgetMs = timeoutMs;
  const startedAt = performance.now();
  const overran = (): boolean => performance.now() - startedAt > budgetMs;
  const expire = (): HookTimeoutError => {
    controller.abort();
    return new HookTimeoutError(hook.hookId, hook.phase, budgetMs);
  };

  let result: unknown;
  try {
    result = callable(context, invocation);
  } catch (error) {
    // a body that overran and then threw still reports the timeout
    if (overran()) throw expire();
    throw error;
  }

  if (!isPromiseLike(result)) {
    if (overran()) throw expire();
    return;
  }

  const remaining = Math.max(0, budgetMs - (performance.now() - startedAt));
  const expired = new Promise<void>((resolve) => {
    controller.signal.addEventListener("abort", () => resolve(), { once: true });
  });
  const timer = setTimeout(() => controller.abort(), remaining);

  try {
    await Promise.race([Promise.resolve(result), expired]);
  } catch (error) {
    // rejecting in response to the abort, or after the budget ran out, still reports the timeout
    if (!controller.signal.aborted && !overran()) throw error;
  } finally {
    clearTimeout(timer);
  }

  if (controller.signal.aborted || overran()) {
    throw expire();
  }
}
