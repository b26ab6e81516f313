import { loadSettings, type AnalyzerSettings, type SettingsOverrides } from "../config.js";
import type { LogEvent } from "../domain/LogEvent.js";
import { childLogger } from "../logger.js";
import type { KBItem, KnowledgeBasePort, LlmTransportPort, SinkPort } from "../ports/index.js";
import { consoleSink } from "../sinks/consoleSink.js";
import { GroupAggregator } from "./aggregator.js";
import { analyzeGroups, runPipeline, type PipelineDeps, type PipelineResult } from "./pipeline.js";
import type { ReportPaths } from "./report.js";

const log = childLogger("analyzer");

export interface AnalyzerConfig {
  transport?: LlmTransportPort;
  kb?: KnowledgeBasePort;
  sinks?: SinkPort[];
  settings?: SettingsOverrides;
  env?: Record<string, string | undefined>; // default: process.env
  clock?: () => Date;
}

export interface AnalyzeOptions {
  output?: ReportPaths;
  signal?: AbortSignal;
}

export interface Analyzer {
  readonly settings: AnalyzerSettings;
  /** Events ingested since the last flush */
  readonly pending: number;
  analyzeFiles(paths: string[], opts?: AnalyzeOptions): Promise<PipelineResult>;
  ingest(event: LogEvent): void;
  flush(opts?: AnalyzeOptions): Promise<PipelineResult>;
}

// --- defaults ---
export const offlineTransport: LlmTransportPort = {
  async complete() {
    log.warn("no LLM transport configured, root causes come from the rules");
    return "[]";
  },
};

const KB_ITEMS: KBItem[] = [
  {
    pattern: "ConnectionTimeoutError",
    fix: "Check DB connection string, network reachability, and firewall rules.",
  },
  {
    pattern: "ECONNREFUSED",
    fix: "Verify target service is listening on the given host:port and not blocked by firewall.",
  },
  {
    pattern: "ETIMEDOUT",
    fix: "Check latency to the upstream and raise client timeouts only after ruling out saturation.",
  },
  {
    pattern: "OutOfMemoryError",
    fix: "Capture a heap dump and review recent changes to caching and batch sizes.",
  },
];

export const defaultKB: KnowledgeBasePort = {
  async lookup(q) {
    return KB_ITEMS.filter((i) => q.includes(i.pattern));
  },
};

export function createAnalyzer(cfg: AnalyzerConfig = {}): Analyzer {
  const settings = loadSettings(cfg.env ?? process.env, cfg.settings);
  const deps: PipelineDeps = {
    transport: cfg.transport ?? offlineTransport,
    kb: cfg.kb ?? defaultKB,
    sinks: cfg.sinks ?? [consoleSink],
    settings,
    clock: cfg.clock,
  };
  const fresh = () => new GroupAggregator({ maxExamples: settings.maxExamples, signature: settings.signature });
  let live = fresh();

  return {
    settings,
    get pending() {
      return live.totalEvents;
    },

    analyzeFiles(paths, opts = {}) {
      return runPipeline({ files: paths, ...opts }, deps);
    },

    ingest(event) {
      live.add(event);
    },

    async flush(opts = {}) {
      const batch = live;
      live = fresh();
      log.info("flushing ingested events", { events: batch.totalEvents, groups: batch.size });
      return analyzeGroups(batch.finalize(), [], deps, opts);
    },
  };
}
