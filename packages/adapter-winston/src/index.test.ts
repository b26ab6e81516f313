import { describe, expect, it, vi } from "vitest";
import winston from "winston";
import type { LogEvent } from "@logsift/core";
import { LogsiftWinstonTransport, toLogEvent } from "./index.js";

const now = new Date("2024-05-01T10:00:00Z");

describe("toLogEvent", () => {
  it("maps a winston record to a log event", () => {
    expect(toLogEvent({ level: "warn", message: "disk low", timestamp: "2024-05-01T09:00:00Z" }, "api", now)).toEqual({
      timestamp: "2024-05-01T09:00:00.000Z",
      level: "WARN",
      message: "disk low",
      rawLine: "2024-05-01T09:00:00.000Z WARN [api] disk low",
    });
  });

  it("falls back to the clock and maps syslog levels", () => {
    expect(toLogEvent({ level: "crit", message: "down" }, "api", now)).toMatchObject({
      timestamp: "2024-05-01T10:00:00.000Z",
      level: "ERROR",
    });
    expect(toLogEvent({ level: "\u001b[31merror\u001b[39m", message: "x" }, "api", now).level).toBe("ERROR");
    expect(toLogEvent({ level: "custom", message: "x" }, "api", now).level).toBe("UNKNOWN");
  });

  it("takes the error type from the stack", () => {
    const e = toLogEvent({ level: "error", message: "boom", stack: "TypeError: boom\n    at run (app.js:1:1)" }, "api", now);
    expect(e.message).toBe("TypeError boom");
  });

  it("serializes non-string messages", () => {
    expect(toLogEvent({ level: "error", message: { code: 7 } }, "api", now).message).toBe('{"code":7}');
  });
});

describe("LogsiftWinstonTransport", () => {
  it("ingests records logged through winston", async () => {
    const events: LogEvent[] = [];
    const transport = new LogsiftWinstonTransport({ ingest: (e) => events.push(e) }, { service: "checkout" });
    const logger = winston.createLogger({ transports: [transport] });

    const logged = new Promise((resolve) => transport.once("logged", resolve));
    logger.error("payment failed: ECONNRESET");
    await logged;

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ level: "ERROR", message: "payment failed: ECONNRESET" });
    expect(events[0]?.rawLine).toMatch(/ ERROR \[checkout\] payment failed: ECONNRESET$/);
  });

  it("defaults to warn and forwards each record", async () => {
    const ingest = vi.fn();
    const transport = new LogsiftWinstonTransport({ ingest });
    const next = vi.fn();

    expect(transport.level).toBe("warn");
    transport.log({ level: "error", message: "x" }, next);
    expect(ingest).toHaveBeenCalledTimes(1);
    expect(next).toHaveBeenCalledTimes(1);
  });

  it("keeps going when the analyzer throws", () => {
    const transport = new LogsiftWinstonTransport({
      ingest: () => {
        throw new Error("analyzer broke");
      },
    });
    const next = vi.fn();
    expect(() => transport.log({ level: "error", message: "x" }, next)).not.toThrow();
    expect(next).toHaveBeenCalledTimes(1);
  });
});
