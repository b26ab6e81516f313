import type { Report, ReportSummary } from "../domain/Finding.js";
import type { SinkPort } from "../ports/index.js";

export const consoleSink: SinkPort = {
  name: "console",
  async publish(r: Report, summary: ReportSummary) {
    const head = `\n❌ ${r.findings.length} group(s), ${summary.totalEvents} event(s)`;
    const body = r.findings.map((f) => {
      const fix = f.recommendation ? `🛠 Suggested Fix: ${f.recommendation}` : "🛠 Suggested Fix: (none)";
      return [`• ${f.signatureRef} x${f.totalEvents}`, `  🔎 ${f.probableRootCause}`, `  ${fix}`].join("\n");
    });
    // eslint-disable-next-line no-console
    console.log([head, ...body].join("\n"));
  },
};
