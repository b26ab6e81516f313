import { createAnalyzer } from "./analyzer/createAnalyzer.js";
import { parseLines } from "./analyzer/parser.js";

const analyzer = createAnalyzer();

const lines = [
  "2024-05-01 10:00:00 ERROR ConnectionTimeoutError at db.ts:45",
  "2024-05-01 10:00:02 ERROR ConnectionTimeoutError at db.ts:45",
  "2024-05-01 10:00:05 INFO service started",
];

for (const evt of parseLines(lines)) analyzer.ingest(evt);

console.log(`Ingested ${analyzer.pending} event(s) in dev mode`);

analyzer.flush().catch((err: unknown) => {
  console.error("Dev flush failed:", err);
  process.exitCode = 1;
});
