import { randomUUID } from "node:crypto";

export interface PipelineContextInit {
  readonly runId?: string;
  readonly data?: Readonly<Record<string, unknown>>;
}

/**
 * Mutable store shared by every hook of a single run.
 *
 * Created fresh by the runner for each execution and handed to hooks by
 * reference; the only channel through which hooks pass values forward.
 * Never share one instance between concurrent runs.
 */
export class PipelineContext {
  readonly runId: string;
  readonly data: Record<string, unknown>;

  constructor(init?: PipelineContextInit) {
    this.runId = init?.runId ?? randomUUID();
    this.data = { ...init?.data };
  }

  get(key: string): unknown {
    return Object.hasOwn(this.data, key) ? this.data[key] : undefined;
  }

  set(key: string, value: unknown): this {
    this.data[key] = value;
    return this;
  }

  has(key: string): boolean {
    return Object.hasOwn(this.data, key);
  }

  delete(key: string): boolean {
    if (!Object.hasOwn(this.data, key)) return false;
    delete this.data[key];
    return true;
  }

  /** Shallow copy of the current data */
  snapshot(): Record<string, unknown> {
    return { ...this.data };
  }
}
