import { emptyLevelCounts, LOG_LEVELS } from "../domain/LogEvent.js";
import type { Group, LevelCounts, LogEvent } from "../domain/LogEvent.js";
import { extractExceptionTokens } from "./exceptions.js";
import { normalizeSignature, type SignatureOptions } from "./signature.js";

export const DEFAULT_MAX_EXAMPLES = 3;

export interface AggregatorOptions {
  maxExamples?: number;
  signature?: SignatureOptions;
}

interface GroupAccumulator {
  signature: string;
  count: number;
  levelCounts: LevelCounts;
  examples: string[];
  exceptionCounts: Map<string, number>;
  firstSeen?: string;
  lastSeen?: string;
}

/**
 * Builds one Group per signature from a stream of events.
 *
 * Aggregators for different files share nothing; combine them with
 * GroupAggregator.merge once every file has been read.
 */
export class GroupAggregator {
  readonly maxExamples: number;
  private readonly signatureOptions: SignatureOptions;
  private readonly groups = new Map<string, GroupAccumulator>();
  private events = 0;

  constructor(opts: AggregatorOptions = {}) {
    this.maxExamples = Math.max(1, opts.maxExamples ?? DEFAULT_MAX_EXAMPLES);
    this.signatureOptions = opts.signature ?? {};
  }

  get size(): number {
    return this.groups.size;
  }

  get totalEvents(): number {
    return this.events;
  }

  add(event: LogEvent): void {
    const signature = normalizeSignature(event.message, this.signatureOptions);
    let g = this.groups.get(signature);
    if (!g) {
      g = {
        signature,
        count: 0,
        levelCounts: emptyLevelCounts(),
        examples: [],
        exceptionCounts: new Map(),
      };
      this.groups.set(signature, g);
    }

    g.count++;
    g.levelCounts[event.level]++;
    if (g.examples.length < this.maxExamples) g.examples.push(event.rawLine);
    for (const token of extractExceptionTokens(event.message)) {
      g.exceptionCounts.set(token, (g.exceptionCounts.get(token) ?? 0) + 1);
    }
    if (event.timestamp) {
      if (!g.firstSeen || event.timestamp < g.firstSeen) g.firstSeen = event.timestamp;
      if (!g.lastSeen || event.timestamp > g.lastSeen) g.lastSeen = event.timestamp;
    }
    this.events++;
  }

  addAll(events: Iterable<LogEvent>): this {
    for (const e of events) this.add(e);
    return this;
  }

  /** Groups by descending count, ties by signature */
  finalize(): Group[] {
    return [...this.groups.values()]
      .sort((a, b) => b.count - a.count || compare(a.signature, b.signature))
      .map(toGroup);
  }

  /**
   * Combine independent aggregations into a new aggregator. Counts, level
   * histograms and exception token counts are summed; examples are unioned
   * up to the largest cap among the inputs.
   */
  static merge(...aggregators: GroupAggregator[]): GroupAggregator {
    const merged = new GroupAggregator({
      maxExamples: aggregators.length ? Math.max(...aggregators.map((a) => a.maxExamples)) : DEFAULT_MAX_EXAMPLES,
      signature: aggregators[0]?.signatureOptions,
    });

    for (const agg of aggregators) {
      merged.events += agg.events;
      for (const g of agg.groups.values()) {
        const into = merged.groups.get(g.signature);
        merged.groups.set(g.signature, into ? combine(into, g, merged.maxExamples) : clone(g));
      }
    }
    return merged;
  }
}

/* ---------------- helpers ---------------- */

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function clone(g: GroupAccumulator): GroupAccumulator {
  return {
    ...g,
    levelCounts: { ...g.levelCounts },
    examples: [...g.examples],
    exceptionCounts: new Map(g.exceptionCounts),
  };
}

function combine(a: GroupAccumulator, b: GroupAccumulator, maxExamples: number): GroupAccumulator {
  const levelCounts = emptyLevelCounts();
  for (const level of LOG_LEVELS) levelCounts[level] = a.levelCounts[level] + b.levelCounts[level];

  const examples = [...a.examples];
  for (const line of b.examples) {
    if (examples.length >= maxExamples) break;
    if (!examples.includes(line)) examples.push(line);
  }

  const exceptionCounts = new Map(a.exceptionCounts);
  for (const [token, n] of b.exceptionCounts) exceptionCounts.set(token, (exceptionCounts.get(token) ?? 0) + n);

  return {
    signature: a.signature,
    count: a.count + b.count,
    levelCounts,
    examples,
    exceptionCounts,
    firstSeen: earliest(a.firstSeen, b.firstSeen),
    lastSeen: latest(a.lastSeen, b.lastSeen),
  };
}

function earliest(a?: string, b?: string): string | undefined {
  if (!a) return b;
  if (!b) return a;
  return a < b ? a : b;
}

function latest(a?: string, b?: string): string | undefined {
  if (!a) return b;
  if (!b) return a;
  return a > b ? a : b;
}

function toGroup(g: GroupAccumulator): Group {
  const exceptionTokens = [...g.exceptionCounts.entries()]
    .sort((x, y) => y[1] - x[1] || compare(x[0], y[0]))
    .map(([token]) => token);
  return {
    signature: g.signature,
    count: g.count,
    levelCounts: { ...g.levelCounts },
    examples: [...g.examples],
    exceptionTokens,
    ...(g.firstSeen ? { firstSeen: g.firstSeen } : {}),
    ...(g.lastSeen ? { lastSeen: g.lastSeen } : {}),
  };
}
