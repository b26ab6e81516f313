import type { Report, ReportSummary } from "../domain/Finding.js";
import type { Group } from "../domain/LogEvent.js";

export interface SinkPort {
  readonly name?: string;
  /** `groups` are the aggregated groups the report was built from */
  publish(report: Report, summary: ReportSummary, groups?: readonly Group[]): Promise<void>;
}
