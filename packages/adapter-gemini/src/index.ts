import {
  GoogleGenerativeAI,
  type GenerateContentRequest,
  type ModelParams,
  type RequestOptions,
  type SingleRequestOptions,
} from "@google/generative-ai";
import { childLogger, describeError, LlmRequestError } from "@logsift/core";
import type { LlmCallOptions, LlmTransportPort, Prompt } from "@logsift/core";

const log = childLogger("gemini");

/** The slice of the SDK client the transport calls */
export interface GeminiClient {
  getGenerativeModel(
    params: ModelParams,
    requestOptions?: RequestOptions,
  ): {
    generateContent(
      request: GenerateContentRequest,
      options?: SingleRequestOptions,
    ): Promise<{ response: { text(): string } }>;
  };
}

export interface GeminiTransportOptions {
  apiKey?: string; // default: process.env.GEMINI_API_KEY
  model?: string; // default: process.env.GEMINI_MODEL, then the pipeline's model
  client?: GeminiClient; // allow DI for tests
}

export function makeGeminiTransport(opts: GeminiTransportOptions = {}): LlmTransportPort {
  const client = opts.client ?? defaultClient(opts.apiKey);
  const modelOverride = opts.model ?? process.env.GEMINI_MODEL;

  return {
    async complete(prompt: Prompt, call: LlmCallOptions): Promise<string> {
      const modelId = modelOverride ?? call.model;
      const model = client.getGenerativeModel({
        model: modelId,
        systemInstruction: prompt.systemPrompt,
        generationConfig: {
          temperature: call.temperature,
          responseMimeType: "application/json",
        },
      });

      try {
        const res = await model.generateContent(
          { contents: [{ role: "user", parts: [{ text: prompt.userPrompt }] }] },
          { signal: call.signal, timeout: call.timeoutMs },
        );
        const text = res.response.text().trim();
        log.debug("gemini response", { model: modelId, chars: text.length });
        return text;
      } catch (err) {
        if (call.signal?.aborted) throw err;
        throw toRequestError(err, modelId);
      }
    },
  };
}

/* ---------------- helpers ---------------- */

function defaultClient(apiKey = process.env.GEMINI_API_KEY): GeminiClient {
  if (!apiKey) throw new Error("GEMINI_API_KEY not set");
  return new GoogleGenerativeAI(apiKey);
}

function toRequestError(err: unknown, modelId: string): LlmRequestError {
  const msg = describeError(err);
  const status = statusOf(err);
  // Helpful hint if model id is wrong (404)
  if (status === 404) {
    return new LlmRequestError(`Gemini model not found: check GEMINI_MODEL (${modelId}): ${msg}`, {
      status,
      transient: false,
      cause: err,
    });
  }
  return new LlmRequestError(`Gemini request failed: ${msg}`, { status, cause: err });
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}
