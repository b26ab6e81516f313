export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR" | "UNKNOWN";

export const LOG_LEVELS: readonly LogLevel[] = ["DEBUG", "INFO", "WARN", "ERROR", "UNKNOWN"];

/** One parsed log line */
export interface LogEvent {
  readonly timestamp?: string; // ISO string, UTC
  readonly level: LogLevel;
  readonly message: string;
  readonly rawLine: string;
}

export type LevelCounts = Record<LogLevel, number>;

/** Aggregate of every event sharing one signature */
export interface Group {
  readonly signature: string; // stable grouping key
  readonly count: number;
  readonly levelCounts: Readonly<LevelCounts>;
  readonly examples: readonly string[]; // first-seen raw lines, capped
  readonly exceptionTokens: readonly string[]; // most frequent first
  readonly firstSeen?: string;
  readonly lastSeen?: string;
}

export function emptyLevelCounts(): LevelCounts {
  return { DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, UNKNOWN: 0 };
}

export function errorRate(group: Pick<Group, "count" | "levelCounts">): number {
  return group.count > 0 ? group.levelCounts.ERROR / group.count : 0;
}
