import type { Finding, Report, ReportSummary } from "../domain/Finding.js";
import type { Group } from "../domain/LogEvent.js";
import { scrubSecrets } from "../analyzer/prompt.js";
import { describeError } from "../errors.js";
import { childLogger } from "../logger.js";
import type { DedupStorePort, IssueDraft, IssueTrackerPort, SinkPort } from "../ports/index.js";
import { dedupKey } from "../stores/MemoryDedupStore.js";

const log = childLogger("issue-sink");

export interface IssueTrackerSinkOptions {
  issueType?: string; // default: "Bug"
  clock?: () => Date;
}

/**
 * Opens one issue per finding that saw ERROR events, at most once per
 * signature per day. The day's key is recorded only after the tracker
 * returns an issue, so a failed creation is logged and retried on the next
 * report.
 */
export function makeIssueTrackerSink(
  tracker: IssueTrackerPort,
  dedup: DedupStorePort,
  opts: IssueTrackerSinkOptions = {},
): SinkPort & { readonly created: readonly string[] } {
  const issueType = opts.issueType ?? "Bug";
  const clock = opts.clock ?? (() => new Date());
  const created: string[] = [];

  return {
    name: "issue-tracker",
    created,
    async publish(report: Report, summary: ReportSummary, groups: readonly Group[] = []): Promise<void> {
      const today = clock();
      const examples = new Map(groups.map((g) => [g.signature, g.examples]));
      for (const f of report.findings) {
        const errors = errorCount(f);
        if (errors === 0) continue;

        const key = dedupKey(f.signatureRef, today);
        let issueKey: string;
        try {
          if (await dedup.has(key)) {
            log.debug("issue already filed today", { key });
            continue;
          }
          const draft = issueDraft(f, errors, summary.totalEvents, issueType, examples.get(f.signatureRef));
          issueKey = (await tracker.createIssue(draft)).key;
        } catch (err) {
          log.error("issue creation failed", { signature: f.signatureRef, error: describeError(err) });
          continue;
        }

        created.push(issueKey);
        log.info("issue created", { issue: issueKey, signature: f.signatureRef });
        try {
          await dedup.set(key, issueKey);
        } catch (err) {
          log.error("could not record filed issue", { key, issue: issueKey, error: describeError(err) });
        }
      }
    },
  };
}

export function issueDraft(
  f: Finding,
  errors: number,
  totalEvents: number,
  issueType = "Bug",
  examples: readonly string[] = [],
): IssueDraft {
  const lines = [
    "h2. Automated log analysis",
    "",
    `Signature: ${f.signatureRef}`,
    `Errors: ${errors} of ${totalEvents}`,
    `Probable root cause: ${f.probableRootCause}`,
  ];
  if (f.severity) lines.push(`Severity: ${f.severity}`);
  if (f.recommendation) lines.push(`Recommendation: ${f.recommendation}`);
  if (examples.length) lines.push("Examples:", ...examples.map((line) => scrubSecrets(line)));
  return {
    summary: `[Auto] ${f.signatureRef} (${errors} errors)`,
    description: lines.join("\n"),
    issueType,
  };
}

function errorCount(f: Finding): number {
  return Math.round(f.errorRate * f.totalEvents);
}
