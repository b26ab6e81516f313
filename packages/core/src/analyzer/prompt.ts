import { errorRate, LOG_LEVELS } from "../domain/LogEvent.js";
import type { Group } from "../domain/LogEvent.js";

export interface PromptOptions {
  maxGroups?: number; // default: 25
  maxExamples?: number; // default: 3
  maxExampleLength?: number; // default: 300
  scrubSecrets?: boolean; // default: true
}

export interface Prompt {
  systemPrompt: string;
  userPrompt: string;
}

export const SYSTEM_PROMPT = `You are a senior SRE triaging application logs.
The user sends pre-aggregated log groups. Each group has a signature, an event count,
a level histogram, exception tokens and a few example lines.

Return ONLY valid JSON (no backticks, no prose): an array with one object per group you
can explain. Use this exact shape:
[
  {
    "signature_ref": string,        // the group's signature, echoed exactly
    "total_events": number,         // the group's count
    "error_rate": number,           // ERROR events / count, between 0 and 1
    "probable_root_cause": string,  // one or two sentences, <= 200 chars
    "severity": "critical"|"high"|"medium"|"low",
    "recommendation": string        // first concrete step to take, <= 200 chars
  }
]

Rules:
- Always include total_events, error_rate and probable_root_cause for every finding.
- Never invent, rename or merge signatures.
- Base root causes on the exception tokens and examples; if unsure, say what to check.`;

/**
 * Serialize groups into a bounded prompt. Output depends only on the groups
 * and the options.
 */
export function buildPrompt(groups: readonly Group[], opts: PromptOptions = {}): Prompt {
  const maxGroups = Math.max(1, opts.maxGroups ?? 25);
  const maxExamples = Math.max(0, opts.maxExamples ?? 3);
  const maxExampleLength = Math.max(16, opts.maxExampleLength ?? 300);
  const scrub = opts.scrubSecrets ?? true;

  const total = groups.reduce((n, g) => n + g.count, 0);
  const shown = groups.slice(0, maxGroups);
  const omitted = groups.length - shown.length;

  const blocks = shown.map((g, i) => {
    const levels = LOG_LEVELS.filter((l) => g.levelCounts[l] > 0)
      .map((l) => `${l}=${g.levelCounts[l]}`)
      .join(" ");
    const examples = g.examples
      .slice(0, maxExamples)
      .map((line) => `  - ${clip(scrub ? scrubSecrets(line) : line, maxExampleLength)}`);
    return [
      `## Group ${i + 1}`,
      `signature: ${g.signature}`,
      `count: ${g.count}`,
      `levels: ${levels}`,
      `error_rate: ${formatRate(errorRate(g))}`,
      `exceptions: ${g.exceptionTokens.length ? g.exceptionTokens.join(", ") : "(none)"}`,
      g.firstSeen ? `first_seen: ${g.firstSeen}` : undefined,
      g.lastSeen ? `last_seen: ${g.lastSeen}` : undefined,
      examples.length ? `examples:\n${examples.join("\n")}` : undefined,
    ]
      .filter(Boolean)
      .join("\n");
  });

  const header = `Total events: ${total} across ${groups.length} group(s).`;
  const footer = omitted > 0 ? `\n\n(${omitted} more groups omitted)` : "";
  const userPrompt = `${header}\n\n${blocks.join("\n\n")}${footer}`;

  return { systemPrompt: SYSTEM_PROMPT, userPrompt };
}

/** Mask credentials and personal data before lines leave the process */
export function scrubSecrets(text: string): string {
  return text
    .replace(/(bearer|api[-_ ]?key|token|password|secret)([\s:=]+)[^\s,;"']{8,}/gi, "$1$2****")
    .replace(/\beyJ[\w-]+\.[\w-]+\.[\w-]+/g, "***.***.***")
    .replace(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi, "****@****")
    .replace(/\b\d{1,3}(?:\.\d{1,3}){3}\b/g, "***.***.***.***");
}

/* ---------------- helpers ---------------- */

function clip(line: string, max: number): string {
  return line.length > max ? `${line.slice(0, max - 1)}…` : line;
}

function formatRate(rate: number): string {
  return rate.toFixed(3).replace(/\.?0+$/, "") || "0";
}
