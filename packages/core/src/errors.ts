import type { Group } from "./domain/LogEvent.js";

export type PipelineStage = "read" | "synthesize" | "write" | "publish";

export interface PipelineErrorOptions {
  file?: string;
  cause?: unknown;
}

/** Base class for every failure that aborts a run */
export class PipelineError extends Error {
  readonly stage: PipelineStage;
  readonly file?: string;

  constructor(stage: PipelineStage, message: string, opts: PipelineErrorOptions = {}) {
    super(message, { cause: opts.cause });
    this.name = "PipelineError";
    this.stage = stage;
    this.file = opts.file;
  }
}

export class InputFailure extends PipelineError {
  constructor(file: string, cause: unknown) {
    super("read", `Could not read log file ${file}: ${describeError(cause)}`, { file, cause });
    this.name = "InputFailure";
  }
}

/**
 * The LLM could not be reached. The aggregated groups stay attached so a
 * caller can retry the remaining stages without re-reading the input.
 */
export class TransportFailure extends PipelineError {
  readonly attempts: number;
  groups: readonly Group[] = [];

  constructor(attempts: number, cause: unknown) {
    super("synthesize", `LLM transport failed after ${attempts} attempt(s): ${describeError(cause)}`, { cause });
    this.name = "TransportFailure";
    this.attempts = attempts;
  }

  withGroups(groups: readonly Group[]): this {
    this.groups = groups;
    return this;
  }
}

export class WriteFailure extends PipelineError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("write", `Could not write ${path}: ${describeError(cause)}`, { file: path, cause });
    this.name = "WriteFailure";
    this.path = path;
  }
}

export class PublishFailure extends PipelineError {
  constructor(sink: string, cause: unknown) {
    super("publish", `Sink ${sink} failed: ${describeError(cause)}`, { cause });
    this.name = "PublishFailure";
  }
}

/**
 * Error raised by transports. `status` carries the HTTP status when there is
 * one; `transient` overrides status-based classification.
 */
export class LlmRequestError extends Error {
  readonly status?: number;
  readonly transient?: boolean;

  constructor(message: string, opts: { status?: number; transient?: boolean; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "LlmRequestError";
    this.status = opts.status;
    this.transient = opts.transient;
  }
}

export class LlmTimeoutError extends LlmRequestError {
  constructor(timeoutMs: number) {
    super(`LLM request timed out after ${timeoutMs}ms`, { transient: true });
    this.name = "LlmTimeoutError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
