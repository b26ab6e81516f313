import type { LogEvent, LogLevel } from "../domain/LogEvent.js";

const PATTERNS = {
  // 2024-01-01 10:00:00, 2024-01-01T10:00:00.123Z, [2024-01-01 10:00:00,123 +02:00]
  TIMESTAMP:
    /^\[?(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:[.,](\d{1,9}))?\s?(Z|[+-]\d{2}:?\d{2})?\]?/,
  LEVEL: /(^|[\s[(|<])(\[?)(TRACE|DEBUG|INFO|WARNING|WARN|ERROR|FATAL|CRITICAL|SEVERE)(\]?)(?=$|[\s\]:)|>-])/gi,
  LEADING_SEPARATORS: /^[\s\]:|>-]+/,
};

const LEVEL_ALIASES: Record<string, LogLevel> = {
  TRACE: "DEBUG",
  DEBUG: "DEBUG",
  INFO: "INFO",
  WARN: "WARN",
  WARNING: "WARN",
  ERROR: "ERROR",
  FATAL: "ERROR",
  CRITICAL: "ERROR",
  SEVERE: "ERROR",
};

/**
 * Parse one raw line into a LogEvent.
 *
 * Returns undefined for lines that carry neither a timestamp nor a level, or
 * whose message is empty. Never throws.
 */
export function parseLine(rawLine: string): LogEvent | undefined {
  const line = rawLine.replace(/\r$/, "");
  if (!line.trim()) return undefined;

  let rest = line;
  let timestamp: string | undefined;
  let hasTimestamp = false;

  const ts = PATTERNS.TIMESTAMP.exec(rest);
  if (ts) {
    hasTimestamp = true;
    timestamp = toIso(ts);
    rest = rest.slice(ts[0].length);
  }

  let level: LogLevel = "UNKNOWN";
  const lv = findLevel(rest);
  if (lv) {
    level = lv.level;
    rest = rest.slice(lv.end);
  }

  if (!hasTimestamp && level === "UNKNOWN") return undefined;

  const message = rest.replace(PATTERNS.LEADING_SEPARATORS, "").trim();
  if (!message) return undefined;

  return { timestamp, level, message, rawLine: line };
}

/** Parse many lines, dropping the unparsable ones */
export function parseLines(lines: Iterable<string>): LogEvent[] {
  const events: LogEvent[] = [];
  for (const line of lines) {
    const event = parseLine(line);
    if (event) events.push(event);
  }
  return events;
}

/* ---------------- helpers ---------------- */

/**
 * First level keyword that leads the line, is bracketed, or is written in
 * capitals. A lower-case "error" in the middle of a sentence is message text.
 */
function findLevel(text: string): { level: LogLevel; end: number } | undefined {
  for (const m of text.matchAll(PATTERNS.LEVEL)) {
    const [whole, lead = "", open, word = "", close] = m;
    const start = (m.index ?? 0) + lead.length;
    const leading = text.slice(0, start).trim() === "";
    const bracketed = open === "[" && close === "]";
    if (leading || bracketed || word === word.toUpperCase()) {
      const level = LEVEL_ALIASES[word.toUpperCase()];
      if (level) return { level, end: (m.index ?? 0) + whole.length };
    }
  }
  return undefined;
}

function toIso(m: RegExpExecArray): string | undefined {
  const [, y, mo, d, h, mi, s, frac, zone] = m;
  const millis = (frac ?? "0").padEnd(3, "0").slice(0, 3);
  let offset = "Z";
  if (zone && zone !== "Z") {
    offset = zone.includes(":") ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
  }
  const iso = `${y}-${mo}-${d}T${h}:${mi}:${s}.${millis}${offset}`;
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return undefined;
  // Date rolls 2024-02-30 over into March; reject instead of guessing
  if (offset === "Z" && date.toISOString().slice(0, 19) !== iso.slice(0, 19)) return undefined;
  return date.toISOString();
}
