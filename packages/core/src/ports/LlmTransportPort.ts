import type { Prompt } from "../analyzer/prompt.js";

export interface LlmCallOptions {
  model: string;
  temperature: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Request/response access to a language model. Implementations return the
 * raw completion text; callers never assume it is well formed.
 */
export interface LlmTransportPort {
  complete(prompt: Prompt, options: LlmCallOptions): Promise<string>;
}
