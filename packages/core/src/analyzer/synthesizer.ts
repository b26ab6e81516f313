import { z } from "zod";
import { SEVERITIES, type CandidateFinding } from "../domain/Finding.js";
import { describeError, LlmRequestError, LlmTimeoutError, TransportFailure } from "../errors.js";
import { childLogger } from "../logger.js";
import type { LlmTransportPort } from "../ports/LlmTransportPort.js";
import type { Prompt } from "./prompt.js";

const log = childLogger("synthesizer");

export interface SynthesizerOptions {
  model: string;
  temperature?: number; // default: 0.2
  timeoutMs?: number; // default: 60000, per attempt
  maxAttempts?: number; // default: 3
  retryBaseDelayMs?: number; // default: 500
  signal?: AbortSignal;
}

/**
 * Ask the model for candidate findings.
 *
 * Transient transport errors are retried with exponential backoff. Text that
 * cannot be read as an array of findings yields an empty list; only an
 * unreachable model raises (TransportFailure).
 */
export async function synthesizeFindings(
  prompt: Prompt,
  transport: LlmTransportPort,
  opts: SynthesizerOptions,
): Promise<CandidateFinding[]> {
  const timeoutMs = Math.max(1, opts.timeoutMs ?? 60_000);
  const raw = await withRetries(opts, (signal) =>
    transport.complete(prompt, {
      model: opts.model,
      temperature: opts.temperature ?? 0.2,
      timeoutMs,
      signal,
    }),
  );
  const candidates = parseCandidates(raw);
  log.debug("parsed candidate findings", { candidates: candidates.length, chars: raw.length });
  return candidates;
}

/* ---------------- response parsing ---------------- */

const CandidateSchema = z
  .object({
    signature_ref: z.string().optional(),
    signature: z.string().optional(),
    total_events: z.coerce.number().optional().catch(undefined),
    error_rate: z.coerce.number().optional().catch(undefined),
    probable_root_cause: z.string().optional().catch(undefined),
    severity: z
      .string()
      .transform((s) => s.trim().toLowerCase())
      .pipe(z.enum(SEVERITIES))
      .optional()
      .catch(undefined),
    recommendation: z.string().optional().catch(undefined),
  })
  .passthrough();

/** Lenient read of the model's text; anything unusable becomes [] */
export function parseCandidates(raw: string): CandidateFinding[] {
  const items = extractArray(raw);
  if (!items) {
    log.warn("model output is not a JSON array of findings", { chars: raw.length, excerpt: excerpt(raw) });
    return [];
  }

  const out: CandidateFinding[] = [];
  for (const item of items) {
    const parsed = CandidateSchema.safeParse(item);
    if (!parsed.success) continue;
    const c = parsed.data;
    const signatureRef = (c.signature_ref ?? c.signature)?.trim();
    if (!signatureRef) continue;
    out.push({
      signatureRef,
      totalEvents: finite(c.total_events),
      errorRate: finite(c.error_rate),
      probableRootCause: c.probable_root_cause,
      severity: c.severity,
      recommendation: c.recommendation,
    });
  }
  return out;
}

function extractArray(raw: string): unknown[] | undefined {
  const text = raw
    .trim()
    .replace(/^```[a-z]*\s*/i, "")
    .replace(/```\s*$/, "");

  for (const candidate of [text, slice(text, "[", "]"), slice(text, "{", "}")]) {
    if (!candidate) continue;
    const value = tryParse(candidate);
    if (Array.isArray(value)) return value;
    if (isRecord(value) && Array.isArray(value.findings)) return value.findings;
  }
  return undefined;
}

function slice(text: string, open: string, close: string): string | undefined {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start >= 0 && end > start ? text.slice(start, end + 1) : undefined;
}

function tryParse(text: string): unknown {
  // trailing commas occasionally appear
  const cleaned = text.replace(/,\s*}/g, "}").replace(/,\s*]/g, "]");
  try {
    return JSON.parse(cleaned);
  } catch {
    return undefined;
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function excerpt(raw: string, max = 200): string {
  return raw.length > max ? `${raw.slice(0, max)}…` : raw;
}

function finite(n: number | undefined): number | undefined {
  return n !== undefined && Number.isFinite(n) ? n : undefined;
}

/* ---------------- transport calls ---------------- */

async function withRetries(
  opts: SynthesizerOptions,
  fn: (signal: AbortSignal) => Promise<string>,
): Promise<string> {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
  const baseDelay = Math.max(0, opts.retryBaseDelayMs ?? 500);
  const timeoutMs = Math.max(1, opts.timeoutMs ?? 60_000);

  for (let attempt = 1; ; attempt++) {
    try {
      return await withTimeout(fn, timeoutMs, opts.signal);
    } catch (err) {
      if (opts.signal?.aborted) throw new TransportFailure(attempt, err);
      if (attempt >= maxAttempts || !isTransient(err)) {
        log.error("LLM transport failed", { attempt, error: describeError(err) });
        throw new TransportFailure(attempt, err);
      }
      const delay = baseDelay * 2 ** (attempt - 1);
      log.warn("LLM call failed, retrying", { attempt, delayMs: delay, error: describeError(err) });
      await sleep(delay);
    }
  }
}

async function withTimeout<T>(fn: (signal: AbortSignal) => Promise<T>, timeoutMs: number, outer?: AbortSignal): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  // settles on timeout or cancellation even when the transport ignores its signal
  const stop = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new LlmTimeoutError(timeoutMs));
      controller.abort();
    }, timeoutMs);
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });

  const onAbort = (): void => controller.abort(outer?.reason);
  outer?.addEventListener("abort", onAbort, { once: true });
  if (outer?.aborted) controller.abort(outer.reason);

  try {
    return await Promise.race([fn(controller.signal), stop]);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener("abort", onAbort);
  }
}

/** Rate limits, 5xx, timeouts and dropped connections are worth another try */
export function isTransient(err: unknown): boolean {
  if (err instanceof LlmRequestError) {
    if (err.transient !== undefined) return err.transient;
    if (err.status !== undefined) return err.status === 429 || err.status >= 500;
  }
  const msg = describeError(err);
  return /fetch failed|timeout|timed out|ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|socket hang up/i.test(msg);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
