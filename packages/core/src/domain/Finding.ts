export const SEVERITIES = ["critical", "high", "medium", "low"] as const;

export type Severity = (typeof SEVERITIES)[number];

export type RootCauseSource = "llm" | "rule";

/** A finding as the model returned it. Nothing here is trusted. */
export interface CandidateFinding {
  signatureRef: string;
  totalEvents?: number;
  errorRate?: number;
  probableRootCause?: string;
  severity?: Severity;
  recommendation?: string;
}

/** A finding reconciled against its group */
export interface Finding {
  readonly signatureRef: string;
  readonly totalEvents: number;
  readonly errorRate: number; // 0-1
  readonly probableRootCause: string;
  readonly severity?: Severity;
  readonly recommendation?: string;
  readonly rootCauseSource: RootCauseSource;
}

export interface Report {
  readonly findings: readonly Finding[];
  readonly generatedAt: string; // ISO string
  readonly sourceFiles: readonly string[];
}

export interface RootCauseTotal {
  readonly probableRootCause: string;
  readonly totalEvents: number;
}

export interface ReportSummary {
  readonly totalEvents: number;
  readonly overallErrorRate: number;
  readonly topRootCauses: readonly RootCauseTotal[];
}
