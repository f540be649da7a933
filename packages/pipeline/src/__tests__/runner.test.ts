import {
  CallableNotFoundError,
  HookTimeoutError,
  PipelineRunnerReusedError,
} from "@phaseline/errors";
import { afterEach, describe, expect, it, vi } from "vitest";
import { PIPELINE_PHASES } from "../constants.js";
import { isMapResolver, PipelineRunner } from "../runner.js";
import type { HookCallable, HookErrorRecord, HookInvocation, PipelineHookInput } from "../types.js";
import { asyncRecorder, blockFor, buildPlan, recorder, sleep } from "./helpers.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function collectErrors(): { records: HookErrorRecord[]; sink: (record: HookErrorRecord) => void } {
  const records: HookErrorRecord[] = [];
  return { records, sink: (record) => records.push(record) };
}

/** ReadonlyMap implementation that is not a Map instance */
class CallableTable implements ReadonlyMap<string, HookCallable> {
  private readonly entriesByRef: Map<string, HookCallable>;

  constructor(callables: Record<string, HookCallable>) {
    this.entriesByRef = new Map(Object.entries(callables));
  }

  get size(): number {
    return this.entriesByRef.size;
  }

  get(key: string): HookCallable | undefined {
    return this.entriesByRef.get(key);
  }

  has(key: string): boolean {
    return this.entriesByRef.has(key);
  }

  forEach(
    callbackfn: (value: HookCallable, key: string, map: ReadonlyMap<string, HookCallable>) => void,
  ): void {
    for (const [key, value] of this.entriesByRef) {
      callbackfn(value, key, this);
    }
  }

  entries() {
    return this.entriesByRef.entries();
  }

  keys() {
    return this.entriesByRef.keys();
  }

  values() {
    return this.entriesByRef.values();
  }

  [Symbol.iterator]() {
    return this.entriesByRef.entries();
  }
}

// ---------------------------------------------------------------------------
// Phase ordering
// ---------------------------------------------------------------------------

describe("PipelineRunner: phase ordering", () => {
  it("runs phases in canonical order regardless of registration order", async () => {
    const log: string[] = [];
    const hooks: PipelineHookInput[] = [...PIPELINE_PHASES]
      .reverse()
      .map((phase) => ({ hookId: `${phase}_hook`, phase, callableRef: phase }));
    const resolver = Object.fromEntries(PIPELINE_PHASES.map((phase) => [phase, recorder(log, phase)]));

    const result = await new PipelineRunner(buildPlan(hooks), resolver).run();

    expect(log).toEqual(["preflight", "before", "execute", "after", "emit", "finalize"]);
    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it("runs hooks within a phase in plan order, awaiting each", async () => {
    const log: string[] = [];
    const plan = buildPlan([
      { hookId: "third", phase: "execute", callableRef: "third", priority: 3 },
      { hookId: "first", phase: "execute", callableRef: "first", priority: 1 },
      { hookId: "second", phase: "execute", callableRef: "second", priority: 2 },
    ]);

    await new PipelineRunner(plan, {
      first: asyncRecorder(log, "first"),
      second: recorder(log, "second"),
      third: asyncRecorder(log, "third"),
    }).run();

    expect(log).toEqual(["first", "second", "third"]);
  });

  it("runs an empty plan successfully", async () => {
    const result = await new PipelineRunner(buildPlan([]), {}).run();

    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Fail-fast phases
// ---------------------------------------------------------------------------

describe("PipelineRunner: fail-fast phases", () => {
  const hooks: PipelineHookInput[] = [
    { hookId: "check", phase: "before", callableRef: "check" },
    { hookId: "explode", phase: "execute", callableRef: "explode", priority: 1 },
    { hookId: "skipped_execute", phase: "execute", callableRef: "skipped", priority: 2 },
    { hookId: "skipped_after", phase: "after", callableRef: "skipped" },
    { hookId: "skipped_emit", phase: "emit", callableRef: "skipped" },
    { hookId: "cleanup", phase: "finalize", callableRef: "cleanup" },
  ];

  it("aborts on the first error, runs finalize, then rethrows the original error", async () => {
    const log: string[] = [];
    const failure = new RangeError("invalid input");

    const runner = new PipelineRunner(buildPlan(hooks), {
      check: recorder(log, "check"),
      explode: () => {
        throw failure;
      },
      skipped: recorder(log, "skipped"),
      cleanup: recorder(log, "cleanup"),
    });

    await expect(runner.run()).rejects.toBe(failure);
    expect(log).toEqual(["check", "cleanup"]);
  });

  it("aborts on an async rejection the same way", async () => {
    const log: string[] = [];
    const failure = new Error("async failure");

    const runner = new PipelineRunner(buildPlan(hooks), {
      check: recorder(log, "check"),
      explode: async () => {
        await Promise.resolve();
        throw failure;
      },
      skipped: recorder(log, "skipped"),
      cleanup: recorder(log, "cleanup"),
    });

    await expect(runner.run()).rejects.toBe(failure);
    expect(log).toEqual(["check", "cleanup"]);
  });

  it("skips every later phase when preflight fails", async () => {
    const log: string[] = [];
    const plan = buildPlan([
      { hookId: "gate", phase: "preflight", callableRef: "gate" },
      { hookId: "work", phase: "execute", callableRef: "work" },
      { hookId: "cleanup", phase: "finalize", callableRef: "cleanup" },
    ]);

    const runner = new PipelineRunner(plan, {
      gate: () => {
        throw new Error("denied");
      },
      work: recorder(log, "work"),
      cleanup: recorder(log, "cleanup"),
    });

    await expect(runner.run()).rejects.toThrow("denied");
    expect(log).toEqual(["cleanup"]);
  });

  it("rethrows non-Error values unchanged", async () => {
    const plan = buildPlan([{ hookId: "odd", phase: "before", callableRef: "odd" }]);
    const runner = new PipelineRunner(plan, {
      odd: () => {
        throw undefined;
      },
    });

    await expect(runner.run()).rejects.toBeUndefined();
  });

  it("reports finalize errors during an abort and still rethrows the original", async () => {
    const { records, sink } = collectErrors();
    const failure = new Error("primary");
    const plan = buildPlan([
      { hookId: "work", phase: "execute", callableRef: "work" },
      { hookId: "cleanup_a", phase: "finalize", callableRef: "broken" },
      { hookId: "cleanup_b", phase: "finalize", callableRef: "ok" },
    ]);
    const log: string[] = [];

    const runner = new PipelineRunner(
      plan,
      {
        work: () => {
          throw failure;
        },
        broken: () => {
          throw new Error("cleanup failed");
        },
        ok: recorder(log, "cleanup_b"),
      },
      { onHookError: sink },
    );

    await expect(runner.run()).rejects.toBe(failure);
    expect(log).toEqual(["cleanup_b"]);
    expect(records.map((r) => [r.phase, r.hookId, r.errorMessage])).toEqual([
      ["finalize", "cleanup_a", "cleanup failed"],
    ]);
  });
});

// ---------------------------------------------------------------------------
// Continue-on-error phases
// ---------------------------------------------------------------------------

describe("PipelineRunner: continue-on-error phases", () => {
  it("captures errors and keeps going", async () => {
    const log: string[] = [];
    const { records, sink } = collectErrors();
    const failure = new TypeError("bad payload");
    const plan = buildPlan([
      { hookId: "a1", phase: "after", callableRef: "fail", priority: 1 },
      { hookId: "a2", phase: "after", callableRef: "a2", priority: 2 },
      { hookId: "e1", phase: "emit", callableRef: "e1" },
      { hookId: "f1", phase: "finalize", callableRef: "f1" },
    ]);

    const result = await new PipelineRunner(
      plan,
      {
        fail: () => {
          throw failure;
        },
        a2: recorder(log, "a2"),
        e1: recorder(log, "e1"),
        f1: recorder(log, "f1"),
      },
      { onHookError: sink },
    ).run();

    expect(log).toEqual(["a2", "e1", "f1"]);
    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      {
        phase: "after",
        hookId: "a1",
        errorType: "TypeError",
        errorMessage: "bad payload",
        error: failure,
      },
    ]);
    expect(records).toEqual(result.errors);
  });

  it("captures errors from several phases in execution order", async () => {
    const { sink } = collectErrors();
    const plan = buildPlan([
      { hookId: "fin", phase: "finalize", callableRef: "boom" },
      { hookId: "em", phase: "emit", callableRef: "boom" },
      { hookId: "af", phase: "after", callableRef: "boom" },
    ]);
    const boom: HookCallable = () => {
      throw new Error("boom");
    };

    const result = await new PipelineRunner(plan, { boom }, { onHookError: sink }).run();

    expect(result.errors.map((r) => `${r.phase}:${r.hookId}`)).toEqual([
      "after:af",
      "emit:em",
      "finalize:fin",
    ]);
  });

  it("describes thrown non-Error values by their type", async () => {
    const { sink } = collectErrors();
    const plan = buildPlan([{ hookId: "odd", phase: "emit", callableRef: "odd" }]);

    const result = await new PipelineRunner(
      plan,
      {
        odd: () => {
          throw "plain string";
        },
      },
      { onHookError: sink },
    ).run();

    expect(result.errors[0]?.errorType).toBe("string");
    expect(result.errors[0]?.errorMessage).toBe("plain string");
  });

  it("returns a frozen error list", async () => {
    const result = await new PipelineRunner(buildPlan([]), {}).run();
    expect(Object.isFrozen(result.errors)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Finalize
// ---------------------------------------------------------------------------

describe("PipelineRunner: finalize", () => {
  it("runs exactly once on success", async () => {
    const finalize = vi.fn();
    const plan = buildPlan([{ hookId: "fin", phase: "finalize", callableRef: "fin" }]);

    await new PipelineRunner(plan, { fin: finalize }).run();

    expect(finalize).toHaveBeenCalledTimes(1);
  });

  it("runs exactly once on abort", async () => {
    const finalize = vi.fn();
    const plan = buildPlan([
      { hookId: "work", phase: "execute", callableRef: "work" },
      { hookId: "fin", phase: "finalize", callableRef: "fin" },
    ]);

    await expect(
      new PipelineRunner(plan, {
        work: () => {
          throw new Error("stop");
        },
        fin: finalize,
      }).run(),
    ).rejects.toThrow("stop");

    expect(finalize).toHaveBeenCalledTimes(1);
  });

  it("sees values written before the abort", async () => {
    let seen: unknown;
    const plan = buildPlan([
      { hookId: "write", phase: "execute", callableRef: "write", priority: 1 },
      { hookId: "fail", phase: "execute", callableRef: "fail", priority: 2 },
      { hookId: "read", phase: "finalize", callableRef: "read" },
    ]);

    await expect(
      new PipelineRunner(plan, {
        write: (context) => {
          context.set("partial", true);
        },
        fail: () => {
          throw new Error("stop");
        },
        read: (context) => {
          seen = context.get("partial");
        },
      }).run(),
    ).rejects.toThrow("stop");

    expect(seen).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Timeouts
// ---------------------------------------------------------------------------

describe("PipelineRunner: timeouts", () => {
  it("fails a suspending hook that overruns its budget", async () => {
    const captured: { signal?: AbortSignal } = {};
    const plan = buildPlan([
      { hookId: "slow_hook", phase: "execute", callableRef: "slow", timeoutMs: 20 },
    ]);

    const run = new PipelineRunner(plan, {
      slow: (_context, invocation: HookInvocation) => {
        captured.signal = invocation.signal;
        return new Promise(() => {});
      },
    }).run();

    await expect(run).rejects.toBeInstanceOf(HookTimeoutError);
    await expect(run).rejects.toMatchObject({
      hookId: "slow_hook",
      phase: "execute",
      timeoutMs: 20,
      message: "Hook 'slow_hook' exceeded timeout of 20ms",
    });
    expect(captured.signal?.aborted).toBe(true);
  });

  it("applies fail-fast policy to a timeout: siblings skipped, finalize runs, timeout rethrown", async () => {
    const log: string[] = [];
    const plan = buildPlan([
      { hookId: "slow", phase: "execute", callableRef: "slow", timeoutMs: 20, priority: 0 },
      { hookId: "second", phase: "execute", callableRef: "second", priority: 10 },
      { hookId: "announce", phase: "emit", callableRef: "announce" },
      { hookId: "cleanup", phase: "finalize", callableRef: "cleanup" },
    ]);

    const run = new PipelineRunner(plan, {
      slow: async () => {
        log.push("slow_start");
        await sleep(200);
        log.push("slow_end");
      },
      second: recorder(log, "second"),
      announce: recorder(log, "announce"),
      cleanup: recorder(log, "cleanup"),
    }).run();

    await expect(run).rejects.toBeInstanceOf(HookTimeoutError);
    await expect(run).rejects.toMatchObject({ hookId: "slow", phase: "execute" });
    expect(log).toEqual(["slow_start", "cleanup"]);
  });

  it("reports a timeout when a direct hook throws after its budget", async () => {
    const { sink } = collectErrors();
    const plan = buildPlan([{ hookId: "late", phase: "after", callableRef: "late", timeoutMs: 5 }]);

    const result = await new PipelineRunner(
      plan,
      {
        late: () => {
          blockFor(30);
          throw new Error("own failure");
        },
      },
      { onHookError: sink },
    ).run();

    expect(result.errors[0]?.error).toBeInstanceOf(HookTimeoutError);
    expect(result.errors[0]?.errorMessage).toBe("Hook 'late' exceeded timeout of 5ms");
  });

  it("reports a timeout when a hook rejects after its budget but before the timer fires", async () => {
    const { sink } = collectErrors();
    const plan = buildPlan([{ hookId: "late", phase: "after", callableRef: "late", timeoutMs: 5 }]);

    const result = await new PipelineRunner(
      plan,
      {
        late: () => {
          blockFor(30);
          return Promise.reject(new Error("own failure"));
        },
      },
      { onHookError: sink },
    ).run();

    expect(result.errors[0]?.error).toBeInstanceOf(HookTimeoutError);
  });

  it("keeps a hook's own error when it fails within budget", async () => {
    const { sink } = collectErrors();
    const plan = buildPlan([
      { hookId: "quick", phase: "after", callableRef: "quick", timeoutMs: 1000 },
      { hookId: "quick_async", phase: "after", callableRef: "quick_async", timeoutMs: 1000 },
    ]);

    const result = await new PipelineRunner(
      plan,
      {
        quick: () => {
          throw new Error("sync failure");
        },
        quick_async: async () => {
          throw new Error("async failure");
        },
      },
      { onHookError: sink },
    ).run();

    expect(result.errors.map((record) => record.errorMessage)).toEqual([
      "sync failure",
      "async failure",
    ]);
  });

  it("reports a timeout even when the hook rejects in response to the abort", async () => {
    const { sink } = collectErrors();
    const plan = buildPlan([
      { hookId: "polite", phase: "after", callableRef: "polite", timeoutMs: 10 },
    ]);

    const result = await new PipelineRunner(
      plan,
      {
        polite: (_context, { signal }) =>
          new Promise((_resolve, reject) => {
            signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
          }),
      },
      { onHookError: sink },
    ).run();

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.errorType).toBe("HookTimeoutError");
    expect(result.errors[0]?.errorMessage).toBe("Hook 'polite' exceeded timeout of 10ms");
  });

  it("fails a direct hook that returns after its budget", async () => {
    const { sink } = collectErrors();
    const log: string[] = [];
    const plan = buildPlan([{ hookId: "busy", phase: "emit", callableRef: "busy", timeoutMs: 5 }]);

    const result = await new PipelineRunner(
      plan,
      {
        busy: () => {
          blockFor(30);
          log.push("busy");
        },
      },
      { onHookError: sink },
    ).run();

    expect(log).toEqual(["busy"]);
    expect(result.errors[0]?.error).toBeInstanceOf(HookTimeoutError);
  });

  it("applies the default timeout to hooks without one", async () => {
    const { sink } = collectErrors();
    const plan = buildPlan([{ hookId: "hang", phase: "after", callableRef: "hang" }]);

    const result = await new PipelineRunner(
      plan,
      { hang: () => new Promise(() => {}) },
      { defaultTimeoutMs: 10, onHookError: sink },
    ).run();

    expect(result.errors[0]?.hookId).toBe("hang");
    expect(result.errors[0]?.errorType).toBe("HookTimeoutError");
  });

  it("lets a hook's own timeout override the default", async () => {
    const plan = buildPlan([
      { hookId: "patient", phase: "execute", callableRef: "patient", timeoutMs: 1000 },
    ]);

    const result = await new PipelineRunner(
      plan,
      { patient: () => new Promise((resolve) => setTimeout(resolve, 20)) },
      { defaultTimeoutMs: 5 },
    ).run();

    expect(result.success).toBe(true);
  });

  it("passes hooks that finish within budget", async () => {
    const log: string[] = [];
    const plan = buildPlan([
      { hookId: "fast", phase: "execute", callableRef: "fast", timeoutMs: 1000 },
      { hookId: "direct", phase: "execute", callableRef: "direct", timeoutMs: 1000 },
    ]);

    const result = await new PipelineRunner(plan, {
      fast: asyncRecorder(log, "fast"),
      direct: recorder(log, "direct"),
    }).run();

    expect(result.success).toBe(true);
    expect(log).toEqual(["direct", "fast"]);
  });
});

// ---------------------------------------------------------------------------
// Context & resolution
// ---------------------------------------------------------------------------

describe("PipelineRunner: context and resolution", () => {
  it("shares one context between all hooks of a run", async () => {
    const plan = buildPlan([
      { hookId: "produce", phase: "execute", callableRef: "produce" },
      { hookId: "consume", phase: "emit", callableRef: "consume" },
    ]);

    const result = await new PipelineRunner(
      plan,
      {
        produce: async (context) => {
          await Promise.resolve();
          context.set("total", Number(context.get("base")) + 1);
        },
        consume: (context) => {
          context.set("emitted", context.get("total"));
        },
      },
      { initialData: { base: 41 }, runId: "run-test" },
    ).run();

    expect(result.context.runId).toBe("run-test");
    expect(result.context.snapshot()).toEqual({ base: 41, total: 42, emitted: 42 });
  });

  it("hands each hook its own ID and phase", async () => {
    const seen: string[] = [];
    const plan = buildPlan([
      { hookId: "one", phase: "before", callableRef: "spy" },
      { hookId: "two", phase: "after", callableRef: "spy" },
    ]);

    await new PipelineRunner(plan, {
      spy: (_context, invocation) => {
        seen.push(`${invocation.phase}:${invocation.hookId}`);
      },
    }).run();

    expect(seen).toEqual(["before:one", "after:two"]);
  });

  it("accepts a Map resolver", async () => {
    const log: string[] = [];
    const plan = buildPlan([{ hookId: "h", phase: "execute", callableRef: "mod.h" }]);

    await new PipelineRunner(plan, new Map([["mod.h", recorder(log, "h")]])).run();

    expect(log).toEqual(["h"]);
  });

  it("accepts any ReadonlyMap implementation as a resolver", async () => {
    const log: string[] = [];
    const plan = buildPlan([{ hookId: "h", phase: "execute", callableRef: "mod.h" }]);
    const resolver = new CallableTable({ "mod.h": recorder(log, "h") });

    expect(isMapResolver(resolver)).toBe(true);
    await new PipelineRunner(plan, resolver).run();

    expect(log).toEqual(["h"]);
  });

  it("treats a record with map-like keys as a record", () => {
    const resolver: Record<string, HookCallable> = { get: () => {}, has: () => {}, entries: () => {} };

    expect(isMapResolver(resolver)).toBe(false);
  });

  it("rejects a missing callable when the runner is constructed", () => {
    const plan = buildPlan([{ hookId: "send", phase: "execute", callableRef: "hooks.send" }]);

    expect(() => new PipelineRunner(plan, {})).toThrow(
      "No callable registered for 'hooks.send' (hook 'send')",
    );
  });

  it("lists every missing callable across phases in one error", () => {
    const log: string[] = [];
    const plan = buildPlan([
      { hookId: "check", phase: "preflight", callableRef: "x.check" },
      { hookId: "one", phase: "execute", callableRef: "x.one" },
      { hookId: "present", phase: "execute", callableRef: "x.present" },
      { hookId: "two", phase: "emit", callableRef: "x.two" },
    ]);

    try {
      new PipelineRunner(plan, { "x.present": recorder(log, "present") });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(CallableNotFoundError);
      if (!(error instanceof CallableNotFoundError)) return;
      expect(error.missing.map((entry) => entry.callableRef)).toEqual(["x.check", "x.one", "x.two"]);
      expect(error.message).toBe(
        "Multiple missing callable refs: 'x.check' (hook 'check'), 'x.one' (hook 'one'), 'x.two' (hook 'two')",
      );
    }
    expect(log).toEqual([]);
  });

  it("accepts an empty resolver for an empty plan", async () => {
    const result = await new PipelineRunner(buildPlan([]), {}).run();

    expect(result.success).toBe(true);
  });

  it("does not resolve inherited object properties", () => {
    const plan = buildPlan([{ hookId: "h", phase: "execute", callableRef: "toString" }]);

    expect(() => new PipelineRunner(plan, {})).toThrow(CallableNotFoundError);
  });

  it("keeps the callables it was constructed with", async () => {
    const log: string[] = [];
    const plan = buildPlan([{ hookId: "h", phase: "execute", callableRef: "r" }]);
    const callables = new Map<string, HookCallable>([["r", recorder(log, "original")]]);
    const record: Record<string, HookCallable> = { r: recorder(log, "original") };

    const fromMap = new PipelineRunner(plan, callables);
    const fromRecord = new PipelineRunner(plan, record);
    callables.set("r", recorder(log, "replaced"));
    callables.delete("r");
    record.r = recorder(log, "replaced");

    await fromMap.run();
    await fromRecord.run();

    expect(log).toEqual(["original", "original"]);
  });

  it("gives each runner a fresh context over a shared plan", async () => {
    const plan = buildPlan([{ hookId: "count", phase: "execute", callableRef: "count" }]);
    const count: HookCallable = async (context) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      context.set("count", Number(context.get("count") ?? 0) + 1);
    };
    const resolver = { count };

    const [first, second] = await Promise.all([
      new PipelineRunner(plan, resolver).run(),
      new PipelineRunner(plan, resolver).run(),
    ]);

    expect(first.context.get("count")).toBe(1);
    expect(second.context.get("count")).toBe(1);
    expect(first.context.runId).not.toBe(second.context.runId);
  });
});

// ---------------------------------------------------------------------------
// Single use & diagnostics
// ---------------------------------------------------------------------------

describe("PipelineRunner: single use", () => {
  it("rejects a second run", async () => {
    const runner = new PipelineRunner(buildPlan([]), {});
    expect(runner.hasRun).toBe(false);

    await runner.run();

    expect(runner.hasRun).toBe(true);
    await expect(runner.run()).rejects.toBeInstanceOf(PipelineRunnerReusedError);
  });

  it("rejects a second run after an abort", async () => {
    const plan = buildPlan([{ hookId: "x", phase: "execute", callableRef: "x" }]);
    const runner = new PipelineRunner(plan, {
      x: () => {
        throw new Error("first");
      },
    });

    await expect(runner.run()).rejects.toThrow("first");
    await expect(runner.run()).rejects.toBeInstanceOf(PipelineRunnerReusedError);
  });

  it("validates options at construction", () => {
    expect(() => new PipelineRunner(buildPlan([]), {}, { runId: "" })).toThrow(
      "Invalid runner options: runId: runId must not be empty",
    );
  });
});

describe("PipelineRunner: diagnostics", () => {
  it("logs captured errors with console.warn when no sink is given", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const plan = buildPlan([{ hookId: "a1", phase: "after", callableRef: "a1" }]);

    await new PipelineRunner(plan, {
      a1: () => {
        throw new Error("bad");
      },
    }).run();

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[@phaseline/pipeline] Hook 'a1' failed in phase 'after': Error: bad",
    );
  });

  it("falls back to console.warn when the sink throws", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const sinkFailure = new Error("sink down");
    const plan = buildPlan([{ hookId: "a1", phase: "after", callableRef: "a1" }]);

    const result = await new PipelineRunner(
      plan,
      {
        a1: () => {
          throw new Error("bad");
        },
      },
      {
        onHookError: () => {
          throw sinkFailure;
        },
      },
    ).run();

    expect(result.errors).toHaveLength(1);
    expect(warn).toHaveBeenNthCalledWith(
      1,
      "[@phaseline/pipeline] onHookError threw while reporting hook 'a1':",
      sinkFailure,
    );
    expect(warn).toHaveBeenNthCalledWith(
      2,
      "[@phaseline/pipeline] Hook 'a1' failed in phase 'after': Error: bad",
    );
  });

  it("does not log when a sink handles the error", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { records, sink } = collectErrors();
    const plan = buildPlan([{ hookId: "a1", phase: "after", callableRef: "a1" }]);

    await new PipelineRunner(
      plan,
      {
        a1: () => {
          throw new Error("bad");
        },
      },
      { onHookError: sink },
    ).run();

    expect(records).toHaveLength(1);
    expect(warn).not.toHaveBeenCalled();
  });
});
