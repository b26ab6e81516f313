import Transport from "winston-transport";
import type winston from "winston";
import { childLogger, describeError } from "@logsift/core";
import type { Analyzer, LogEvent, LogLevel } from "@logsift/core";

const log = childLogger("winston-transport");

export interface LogsiftWinstonTransportOptions extends Transport.TransportStreamOptions {
  level?: string; // default: "warn"
  service?: string; // default: "unknown"
  clock?: () => Date;
}

const LEVELS: Record<string, LogLevel> = {
  emerg: "ERROR",
  alert: "ERROR",
  crit: "ERROR",
  error: "ERROR",
  warning: "WARN",
  warn: "WARN",
  notice: "INFO",
  info: "INFO",
  http: "INFO",
  verbose: "DEBUG",
  debug: "DEBUG",
  silly: "DEBUG",
};

/**
 * Feeds winston records into an analyzer's live aggregation. Call
 * analyzer.flush() to analyze what has been collected.
 */
export class LogsiftWinstonTransport extends Transport {
  private analyzer: Pick<Analyzer, "ingest">;
  private service: string;
  private clock: () => Date;

  constructor(analyzer: Pick<Analyzer, "ingest">, opts: LogsiftWinstonTransportOptions = {}) {
    super({ ...opts, level: opts.level ?? "warn" });
    this.analyzer = analyzer;
    this.service = opts.service ?? "unknown";
    this.clock = opts.clock ?? (() => new Date());
  }

  override log(info: winston.Logform.TransformableInfo, next: () => void): void {
    setImmediate(() => this.emit("logged", info));

    try {
      this.analyzer.ingest(toLogEvent(info, this.service, this.clock()));
    } catch (e) {
      // don't crash the app if the analyzer fails
      log.error("could not ingest winston record", { error: describeError(e) });
    }

    next();
  }
}

export function toLogEvent(info: winston.Logform.TransformableInfo, service: string, now: Date): LogEvent {
  const level = LEVELS[stripAnsi(String(info.level)).toLowerCase()] ?? "UNKNOWN";
  const timestamp = typeof info.timestamp === "string" && !Number.isNaN(Date.parse(info.timestamp))
    ? new Date(info.timestamp).toISOString()
    : now.toISOString();

  let message = typeof info.message === "string" ? info.message : JSON.stringify(info.message ?? "");
  const head = stackHead(info.stack);
  // logger.error(err) carries the error type only in the stack
  if (head && !message.includes(head)) message = message ? `${head} ${message}` : head;

  return {
    timestamp,
    level,
    message,
    rawLine: `${timestamp} ${level} [${service}] ${message}`,
  };
}

/* ---------------- helpers ---------------- */

function stackHead(stack: unknown): string | undefined {
  if (typeof stack !== "string") return undefined;
  return /^([A-Za-z_$][\w$.]*(?:Error|Exception))\b/.exec(stack.trimStart())?.[1];
}

function stripAnsi(s: string): string {
  return s.replace(/\u001b\[[0-9;]*m/g, "");
}
