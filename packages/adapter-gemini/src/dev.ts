import "dotenv/config";
import * as path from "node:path";
import { createAnalyzer } from "@logsift/core";
import { makeGeminiTransport } from "./index.js";

const files = process.argv.slice(2);
if (!files.length) {
  console.error("usage: dev.ts <log file> [more files...]");
  process.exit(2);
}

const outDir = process.env.LOGSIFT_OUT_DIR ?? "out";
const analyzer = createAnalyzer({ transport: makeGeminiTransport() });
console.log("CWD:", process.cwd());

(async () => {
  const { summary, artifacts } = await analyzer.analyzeFiles(files, {
    output: {
      jsonPath: path.join(outDir, "log_summary.json"),
      markdownPath: path.join(outDir, "log_summary.md"),
    },
  });
  console.log(`Analyzed ${summary.totalEvents} event(s); report at ${artifacts?.markdownPath ?? "(none)"}`);
})().catch((err: unknown) => {
  console.error("Analysis failed:", err);
  process.exitCode = 1;
});
