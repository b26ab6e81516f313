import type { Finding, Report, ReportSummary, RootCauseTotal } from "../domain/Finding.js";
import { childLogger } from "../logger.js";
import { writeFilesAtomic } from "../util/atomicWrite.js";

const log = childLogger("report");

export const DEFAULT_TOP_ROOT_CAUSES = 3;

/** Serialized form written to the JSON artifact */
export interface ReportDocument {
  findings: {
    signature_ref: string;
    total_events: number;
    error_rate: number;
    probable_root_cause: string;
    severity: string | null;
    recommendation?: string;
    root_cause_source: string;
  }[];
  summary: {
    total_events: number;
    overall_error_rate: number;
    top_root_causes: { probable_root_cause: string; total_events: number }[];
  };
  generated_at: string;
  source_files: string[];
}

export interface ReportPaths {
  jsonPath: string;
  markdownPath: string;
}

export function buildReport(findings: readonly Finding[], sourceFiles: readonly string[], now: Date = new Date()): Report {
  return Object.freeze({
    findings: Object.freeze([...findings]),
    generatedAt: now.toISOString(),
    sourceFiles: Object.freeze([...sourceFiles]),
  });
}

export function summarizeReport(report: Report, topN: number = DEFAULT_TOP_ROOT_CAUSES): ReportSummary {
  let totalEvents = 0;
  let errorEvents = 0;
  const byCause = new Map<string, number>();

  for (const f of report.findings) {
    totalEvents += f.totalEvents;
    // errorRate is errors/total, so this recovers the exact integer
    errorEvents += Math.round(f.errorRate * f.totalEvents);
    byCause.set(f.probableRootCause, (byCause.get(f.probableRootCause) ?? 0) + f.totalEvents);
  }

  const topRootCauses: RootCauseTotal[] = [...byCause.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, Math.max(0, topN))
    .map(([probableRootCause, events]) => ({ probableRootCause, totalEvents: events }));

  return {
    totalEvents,
    overallErrorRate: totalEvents > 0 ? errorEvents / totalEvents : 0,
    topRootCauses,
  };
}

export function toReportDocument(report: Report, summary: ReportSummary): ReportDocument {
  return {
    findings: report.findings.map((f) => ({
      signature_ref: f.signatureRef,
      total_events: f.totalEvents,
      error_rate: f.errorRate,
      probable_root_cause: f.probableRootCause,
      severity: f.severity ?? null,
      ...(f.recommendation ? { recommendation: f.recommendation } : {}),
      root_cause_source: f.rootCauseSource,
    })),
    summary: {
      total_events: summary.totalEvents,
      overall_error_rate: summary.overallErrorRate,
      top_root_causes: summary.topRootCauses.map((c) => ({
        probable_root_cause: c.probableRootCause,
        total_events: c.totalEvents,
      })),
    },
    generated_at: report.generatedAt,
    source_files: [...report.sourceFiles],
  };
}

export function renderMarkdown(report: Report, summary: ReportSummary): string {
  const files = report.sourceFiles.length ? report.sourceFiles.map((f) => `\`${f}\``).join(", ") : "(no files)";
  const lines = [
    "# Log Analysis Report",
    "",
    `Generated ${report.generatedAt} from ${report.sourceFiles.length} source file(s): ${files}. ` +
      `${report.findings.length} distinct signature(s) found.`,
    "",
    `**Total events:** ${summary.totalEvents} • **Overall error rate:** ${percent(summary.overallErrorRate)}`,
    "",
  ];

  if (summary.topRootCauses.length) {
    lines.push("## Top root causes", "");
    summary.topRootCauses.forEach((c, i) => lines.push(`${i + 1}. ${c.probableRootCause} (${c.totalEvents} events)`));
    lines.push("");
  }

  lines.push(
    "## Findings",
    "",
    "| Signature | Count | Error rate | Severity | Probable root cause |",
    "| --- | ---: | ---: | --- | --- |",
  );
  for (const f of report.findings) {
    lines.push(
      `| ${cell(f.signatureRef)} | ${f.totalEvents} | ${percent(f.errorRate)} | ${f.severity ?? "-"} | ${cell(f.probableRootCause)} |`,
    );
  }

  return `${lines.join("\n")}\n`;
}

/**
 * Write the JSON and markdown artifacts. Both land at their final paths or
 * neither does (WriteFailure).
 */
export async function writeReport(
  report: Report,
  summary: ReportSummary,
  paths: ReportPaths,
  signal?: AbortSignal,
): Promise<ReportPaths> {
  const [jsonPath = paths.jsonPath, markdownPath = paths.markdownPath] = await writeFilesAtomic(
    [
      { target: paths.jsonPath, content: `${JSON.stringify(toReportDocument(report, summary), null, 2)}\n` },
      { target: paths.markdownPath, content: renderMarkdown(report, summary) },
    ],
    signal,
  );
  log.info("report written", { jsonPath, markdownPath, findings: report.findings.length });
  return { jsonPath, markdownPath };
}

/* ---------------- helpers ---------------- */

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}
