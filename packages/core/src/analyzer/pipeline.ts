import { open } from "node:fs/promises";
import { createInterface } from "node:readline";
import type { Finding, Report, ReportSummary } from "../domain/Finding.js";
import type { Group } from "../domain/LogEvent.js";
import { describeError, InputFailure, PublishFailure, TransportFailure } from "../errors.js";
import { childLogger } from "../logger.js";
import type { KnowledgeBasePort, LlmTransportPort, SinkPort } from "../ports/index.js";
import type { AnalyzerSettings } from "../config.js";
import { GroupAggregator } from "./aggregator.js";
import { parseLine } from "./parser.js";
import { buildPrompt } from "./prompt.js";
import { buildReport, summarizeReport, writeReport, type ReportPaths } from "./report.js";
import { synthesizeFindings } from "./synthesizer.js";
import { validateFindings } from "./validator.js";

const log = childLogger("pipeline");

export interface PipelineDeps {
  transport: LlmTransportPort;
  kb: KnowledgeBasePort;
  sinks: SinkPort[];
  settings: AnalyzerSettings;
  clock?: () => Date;
}

export interface PipelineInput {
  files: string[];
  output?: ReportPaths;
  signal?: AbortSignal;
}

export interface PipelineResult {
  groups: Group[];
  report: Report;
  summary: ReportSummary;
  artifacts?: ReportPaths;
}

/** Read files, then analyze the merged groups */
export async function runPipeline(input: PipelineInput, deps: PipelineDeps): Promise<PipelineResult> {
  log.info("pipeline started", { files: input.files.length });
  const aggregator = await aggregateFiles(input.files, deps.settings, input.signal);
  return analyzeGroups(aggregator.finalize(), input.files, deps, input);
}

/**
 * Parse every file into its own aggregator, concurrently, then merge.
 * Unparsable lines are skipped; an unreadable file raises InputFailure.
 */
export async function aggregateFiles(
  files: readonly string[],
  settings: Pick<AnalyzerSettings, "maxExamples" | "signature">,
  signal?: AbortSignal,
): Promise<GroupAggregator> {
  const perFile = await Promise.all(files.map((file) => aggregateFile(file, settings, signal)));
  const merged = GroupAggregator.merge(...perFile);
  log.info("aggregated input", { files: files.length, events: merged.totalEvents, groups: merged.size });
  return merged;
}

async function aggregateFile(
  file: string,
  settings: Pick<AnalyzerSettings, "maxExamples" | "signature">,
  signal?: AbortSignal,
): Promise<GroupAggregator> {
  const aggregator = new GroupAggregator({ maxExamples: settings.maxExamples, signature: settings.signature });
  let lines = 0;
  try {
    const handle = await open(file, "r");
    const input = handle.createReadStream({ encoding: "utf8" });
    try {
      for await (const line of createInterface({ input, crlfDelay: Infinity })) {
        signal?.throwIfAborted();
        lines++;
        const event = parseLine(line);
        if (event) aggregator.add(event);
      }
    } finally {
      input.destroy();
    }
  } catch (err) {
    throw new InputFailure(file, err);
  }
  log.debug("file aggregated", { file, lines, events: aggregator.totalEvents, skipped: lines - aggregator.totalEvents });
  return aggregator;
}

/**
 * Everything after aggregation: prompt, model, validation, knowledge base,
 * report, artifacts, sinks. A TransportFailure leaves with the groups attached
 * and nothing written.
 */
export async function analyzeGroups(
  groups: Group[],
  sourceFiles: readonly string[],
  deps: PipelineDeps,
  opts: { output?: ReportPaths; signal?: AbortSignal } = {},
): Promise<PipelineResult> {
  const { settings } = deps;

  let candidates: Awaited<ReturnType<typeof synthesizeFindings>> = [];
  if (groups.length) {
    const prompt = buildPrompt(groups, {
      maxGroups: settings.maxGroupsInPrompt,
      maxExamples: settings.maxExamples,
      maxExampleLength: settings.maxExampleLength,
    });
    try {
      candidates = await synthesizeFindings(prompt, deps.transport, {
        model: settings.model,
        temperature: settings.temperature,
        timeoutMs: settings.timeoutMs,
        maxAttempts: settings.maxAttempts,
        retryBaseDelayMs: settings.retryBaseDelayMs,
        signal: opts.signal,
      });
    } catch (err) {
      if (err instanceof TransportFailure) throw err.withGroups(groups);
      throw err;
    }
  } else {
    log.info("no parsable events, skipping the model");
  }

  const validated = validateFindings(groups, candidates);
  const findings = await applyKnowledgeBase(validated, groups, deps.kb);

  const report = buildReport(findings, sourceFiles, (deps.clock ?? (() => new Date()))());
  const summary = summarizeReport(report, settings.topRootCauses);

  const artifacts = opts.output ? await writeReport(report, summary, opts.output, opts.signal) : undefined;
  await publish(deps.sinks, report, summary, groups);

  log.info("pipeline finished", { findings: findings.length, totalEvents: summary.totalEvents });
  return { groups, report, summary, artifacts };
}

/**
 * Fill recommendations the model left out: a knowledge-base fix for the
 * group's exception tokens, else a pointer at the top token.
 */
export async function applyKnowledgeBase(
  findings: readonly Finding[],
  groups: readonly Group[],
  kb: KnowledgeBasePort,
): Promise<Finding[]> {
  const bySignature = new Map(groups.map((g) => [g.signature, g]));
  return Promise.all(
    findings.map(async (f): Promise<Finding> => {
      if (f.recommendation) return f;
      const group = bySignature.get(f.signatureRef);
      const tokens = group?.exceptionTokens ?? [];

      const query = [f.signatureRef, f.probableRootCause, ...tokens].join("\n");
      const [hit] = await kb.lookup(query);
      if (hit) return { ...f, recommendation: hit.fix };
      const [top] = tokens;
      return top ? { ...f, recommendation: `Investigate ${top} and related services` } : f;
    }),
  );
}

async function publish(
  sinks: readonly SinkPort[],
  report: Report,
  summary: ReportSummary,
  groups: readonly Group[],
): Promise<void> {
  const results = await Promise.allSettled(sinks.map((s) => s.publish(report, summary, groups)));
  const failures = results.flatMap((r, i) => (r.status === "rejected" ? [{ sink: sinks[i], reason: r.reason }] : []));
  for (const f of failures) {
    log.error("sink failed", { sink: f.sink?.name ?? "anonymous", error: describeError(f.reason) });
  }
  const [first] = failures;
  if (first) throw new PublishFailure(first.sink?.name ?? "anonymous", first.reason);
}
