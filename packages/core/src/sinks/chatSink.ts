import type { Report, ReportSummary } from "../domain/Finding.js";
import { childLogger } from "../logger.js";
import type { ChatNotifierPort, SinkPort } from "../ports/index.js";

const log = childLogger("chat-sink");

const TOP_FINDINGS = 3;

export interface ChatSinkOptions {
  channel?: string;
}

export function makeChatSink(notifier: ChatNotifierPort, opts: ChatSinkOptions = {}): SinkPort {
  return {
    name: "chat",
    async publish(report: Report, summary: ReportSummary): Promise<void> {
      if (!report.findings.length) {
        log.info("no findings, skipping chat notification");
        return;
      }
      await notifier.postMessage(formatChatSummary(report, summary), opts.channel);
      log.info("chat summary posted", { findings: report.findings.length });
    },
  };
}

export function formatChatSummary(report: Report, summary: ReportSummary): string {
  const lines = [
    "*Log Analysis Summary*",
    `*Total events:* ${summary.totalEvents} • *Error rate:* ${summary.overallErrorRate.toFixed(2)}`,
  ];
  for (const f of report.findings.slice(0, TOP_FINDINGS)) {
    const errors = Math.round(f.errorRate * f.totalEvents);
    lines.push(`• ${f.signatureRef} (errors: ${errors}): ${f.probableRootCause}`);
    if (f.recommendation) lines.push(`  ↳ ${f.recommendation}`);
  }
  return lines.join("\n");
}
