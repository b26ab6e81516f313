export * from "./domain/LogEvent.js";
export * from "./domain/Finding.js";
export * from "./ports/index.js";
export * from "./errors.js";
export { logger, childLogger } from "./logger.js";
export * from "./config.js";

export { parseLine, parseLines } from "./analyzer/parser.js";
export { normalizeSignature, DEFAULT_SIGNATURE_OPTIONS, type SignatureOptions } from "./analyzer/signature.js";
export { extractExceptionTokens } from "./analyzer/exceptions.js";
export { GroupAggregator, DEFAULT_MAX_EXAMPLES, type AggregatorOptions } from "./analyzer/aggregator.js";
export { buildPrompt, scrubSecrets, SYSTEM_PROMPT, type Prompt, type PromptOptions } from "./analyzer/prompt.js";
export {
  synthesizeFindings,
  parseCandidates,
  isTransient,
  type SynthesizerOptions,
} from "./analyzer/synthesizer.js";
export { validateFindings, fallbackRootCause, deriveSeverity } from "./analyzer/validator.js";
export {
  buildReport,
  summarizeReport,
  toReportDocument,
  renderMarkdown,
  writeReport,
  DEFAULT_TOP_ROOT_CAUSES,
  type ReportDocument,
  type ReportPaths,
} from "./analyzer/report.js";
export {
  runPipeline,
  aggregateFiles,
  analyzeGroups,
  applyKnowledgeBase,
  type PipelineDeps,
  type PipelineInput,
  type PipelineResult,
} from "./analyzer/pipeline.js";
export {
  createAnalyzer,
  defaultKB,
  offlineTransport,
  type Analyzer,
  type AnalyzerConfig,
  type AnalyzeOptions,
} from "./analyzer/createAnalyzer.js";

export { consoleSink } from "./sinks/consoleSink.js";
export { makeIssueTrackerSink, issueDraft, type IssueTrackerSinkOptions } from "./sinks/issueSink.js";
export { makeChatSink, formatChatSummary, type ChatSinkOptions } from "./sinks/chatSink.js";
export { MemoryDedupStore, dedupKey } from "./stores/MemoryDedupStore.js";
export { JsonFileDedupStore } from "./stores/JsonFileDedupStore.js";
export { writeFileAtomic, writeFilesAtomic, type StagedFile } from "./util/atomicWrite.js";
