import { afterEach, describe, expect, it, vi } from "vitest";
import { LlmRequestError, LlmTimeoutError, TransportFailure } from "../errors.js";
import { childLogger } from "../logger.js";
import type { LlmTransportPort } from "../ports/index.js";
import type { Prompt } from "./prompt.js";
import { isTransient, parseCandidates, synthesizeFindings } from "./synthesizer.js";

const prompt: Prompt = { systemPrompt: "system", userPrompt: "user" };
const opts = { model: "test-model", retryBaseDelayMs: 0 };

describe("parseCandidates", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads a fenced array and coerces fields", () => {
    const raw = '```json\n[{"signature_ref":"a","total_events":"2","severity":"HIGH","probable_root_cause":"x"}]\n```';
    expect(parseCandidates(raw)).toEqual([
      { signatureRef: "a", totalEvents: 2, severity: "high", probableRootCause: "x" },
    ]);
  });

  it("accepts a findings wrapper and the signature alias", () => {
    expect(parseCandidates('{"findings":[{"signature":"b"}]}')).toEqual([{ signatureRef: "b" }]);
  });

  it("finds an array inside prose and tolerates trailing commas", () => {
    expect(parseCandidates('Here you go: [{"signature_ref":"x",}] thanks')).toEqual([{ signatureRef: "x" }]);
  });

  it("drops unusable fields and items", () => {
    const raw = JSON.stringify([
      { signature_ref: "a", severity: "urgent", error_rate: "abc" },
      { probable_root_cause: "no signature" },
      "not an object",
    ]);
    expect(parseCandidates(raw)).toEqual([{ signatureRef: "a" }]);
  });

  it("returns nothing for text that is not JSON", () => {
    expect(parseCandidates("Sorry, I cannot help with that")).toEqual([]);
    expect(parseCandidates('{"answer": 42}')).toEqual([]);
  });

  it("warns with an excerpt of output it cannot read", () => {
    const warn = vi.spyOn(childLogger("synthesizer"), "warn");
    parseCandidates("Sorry, I cannot help with that");
    parseCandidates("x".repeat(300));
    expect(warn.mock.calls).toEqual([
      ["model output is not a JSON array of findings", { chars: 30, excerpt: "Sorry, I cannot help with that" }],
      ["model output is not a JSON array of findings", { chars: 300, excerpt: `${"x".repeat(200)}…` }],
    ]);
  });
});

describe("synthesizeFindings", () => {
  it("passes the call options to the transport", async () => {
    const complete = vi.fn(async () => "[]");
    await synthesizeFindings(prompt, { complete }, { model: "test-model", temperature: 0.5, timeoutMs: 1000 });
    expect(complete).toHaveBeenCalledWith(
      prompt,
      expect.objectContaining({ model: "test-model", temperature: 0.5, timeoutMs: 1000 }),
    );
  });

  it("retries transient failures", async () => {
    const complete = vi
      .fn<LlmTransportPort["complete"]>()
      .mockRejectedValueOnce(new LlmRequestError("rate limited", { status: 429 }))
      .mockResolvedValueOnce('[{"signature_ref":"a"}]');
    await expect(synthesizeFindings(prompt, { complete }, opts)).resolves.toEqual([{ signatureRef: "a" }]);
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it("does not retry permanent failures", async () => {
    const complete = vi.fn(async () => Promise.reject(new LlmRequestError("bad request", { status: 400 })));
    const err = await synthesizeFindings(prompt, { complete }, opts).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportFailure);
    expect(err).toMatchObject({ attempts: 1, stage: "synthesize" });
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("gives up after maxAttempts", async () => {
    const complete = vi.fn(async () => Promise.reject(new LlmRequestError("unavailable", { status: 503 })));
    const err = await synthesizeFindings(prompt, { complete }, { ...opts, maxAttempts: 3 }).catch((e: unknown) => e);
    expect(err).toMatchObject({ name: "TransportFailure", attempts: 3 });
    expect(complete).toHaveBeenCalledTimes(3);
  });

  it("times out a hanging call", async () => {
    const transport: LlmTransportPort = { complete: () => new Promise<string>(() => undefined) };
    const err = await synthesizeFindings(prompt, transport, { ...opts, timeoutMs: 20, maxAttempts: 1 }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(TransportFailure);
    expect(err instanceof Error && err.cause).toBeInstanceOf(LlmTimeoutError);
  });

  it("stops when the caller aborts", async () => {
    const controller = new AbortController();
    controller.abort();
    const complete = vi.fn(() => new Promise<string>(() => undefined));
    const err = await synthesizeFindings(prompt, { complete }, { ...opts, signal: controller.signal, maxAttempts: 3 }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(TransportFailure);
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("returns an empty list for invalid JSON", async () => {
    const transport: LlmTransportPort = { complete: async () => "this is not json" };
    await expect(synthesizeFindings(prompt, transport, opts)).resolves.toEqual([]);
  });
});

describe("isTransient", () => {
  it("classifies by status, flag and message", () => {
    expect(isTransient(new LlmRequestError("x", { status: 500 }))).toBe(true);
    expect(isTransient(new LlmRequestError("x", { status: 429 }))).toBe(true);
    expect(isTransient(new LlmRequestError("x", { status: 404 }))).toBe(false);
    expect(isTransient(new LlmRequestError("x", { status: 503, transient: false }))).toBe(false);
    expect(isTransient(new LlmTimeoutError(10))).toBe(true);
    expect(isTransient(new Error("fetch failed"))).toBe(true);
    expect(isTransient(new Error("bad request"))).toBe(false);
  });
});
