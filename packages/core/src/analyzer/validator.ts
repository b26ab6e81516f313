import type { CandidateFinding, Finding, Severity } from "../domain/Finding.js";
import { errorRate, type Group } from "../domain/LogEvent.js";
import { childLogger } from "../logger.js";
import { parseLine } from "./parser.js";

const log = childLogger("validator");

const PLACEHOLDER_TEXT =
  /^(?:n\/?a|none|null|nil|unknown|undefined|tbd|todo|tba|-+|\.{2,}|…|<[^>]*>|\{[^}]*\}|string|probable[ _]root[ _]cause|root cause)$/i;

const MAX_TOKENS_IN_CAUSE = 3;
const MAX_CLAUSE_LENGTH = 120;

/**
 * Reconcile model output with the groups it describes.
 *
 * Returns exactly one finding per group, in group order. Counts and error
 * rates always come from the group; the model only contributes text.
 */
export function validateFindings(groups: readonly Group[], candidates: readonly CandidateFinding[]): Finding[] {
  const known = new Set(groups.map((g) => g.signature));
  const bySignature = new Map<string, CandidateFinding>();
  let hallucinated = 0;
  let duplicates = 0;

  for (const c of candidates) {
    if (!known.has(c.signatureRef)) {
      hallucinated++;
    } else if (bySignature.has(c.signatureRef)) {
      duplicates++;
    } else {
      bySignature.set(c.signatureRef, c);
    }
  }

  let repaired = 0;
  const findings = groups.map((g): Finding => {
    const candidate = bySignature.get(g.signature);
    const cause = usableText(candidate?.probableRootCause);
    const recommendation = usableText(candidate?.recommendation);
    if (!cause) repaired++;
    return {
      signatureRef: g.signature,
      totalEvents: g.count,
      errorRate: errorRate(g),
      probableRootCause: cause ?? fallbackRootCause(g),
      severity: candidate?.severity ?? deriveSeverity(g),
      ...(recommendation ? { recommendation } : {}),
      rootCauseSource: cause ? "llm" : "rule",
    };
  });

  log.debug("validated findings", {
    groups: groups.length,
    candidates: candidates.length,
    matched: bySignature.size,
    hallucinated,
    duplicates,
    fallbackRootCauses: repaired,
  });
  return findings;
}

/**
 * Root cause built from the group alone: its most frequent exception tokens,
 * or the leading clause of its most frequent example message.
 */
export function fallbackRootCause(group: Group): string {
  if (group.exceptionTokens.length) {
    return group.exceptionTokens.slice(0, MAX_TOKENS_IN_CAUSE).join(", ");
  }
  const message = mostFrequentMessage(group.examples);
  const clause = message ? leadingClause(message) : "";
  return clause || group.signature;
}

export function deriveSeverity(group: Group): Severity {
  if (group.levelCounts.ERROR > 0) return errorRate(group) >= 0.5 ? "high" : "medium";
  return "low";
}

/* ---------------- helpers ---------------- */

function usableText(text: string | undefined): string | undefined {
  const trimmed = text?.trim();
  if (!trimmed || PLACEHOLDER_TEXT.test(trimmed)) return undefined;
  return trimmed;
}

function mostFrequentMessage(examples: readonly string[]): string | undefined {
  const counts = new Map<string, number>();
  for (const line of examples) {
    const message = parseLine(line)?.message ?? line.trim();
    if (message) counts.set(message, (counts.get(message) ?? 0) + 1);
  }
  let best: string | undefined;
  let bestCount = 0;
  for (const [message, n] of counts) {
    if (n > bestCount) {
      best = message;
      bestCount = n;
    }
  }
  return best;
}

function leadingClause(message: string): string {
  const clause = message.split(/[.;,(]\s|\s[-–—|]\s|[:;]\s/)[0] ?? message;
  const trimmed = clause.trim();
  return trimmed.length > MAX_CLAUSE_LENGTH ? `${trimmed.slice(0, MAX_CLAUSE_LENGTH - 1)}…` : trimmed;
}
