import { describe, expect, it } from "vitest";
import { parseLine, parseLines } from "./parser.js";

describe("parseLine", () => {
  it("reads timestamp, level and message", () => {
    expect(parseLine("2024-05-01 10:00:00 ERROR NullPointerException at Foo.java:42")).toEqual({
      timestamp: "2024-05-01T10:00:00.000Z",
      level: "ERROR",
      message: "NullPointerException at Foo.java:42",
      rawLine: "2024-05-01 10:00:00 ERROR NullPointerException at Foo.java:42",
    });
  });

  it("handles bracketed levels and zone offsets", () => {
    const e = parseLine("[2024-05-01T10:00:00.5+02:00] [WARN] disk low");
    expect(e?.timestamp).toBe("2024-05-01T08:00:00.500Z");
    expect(e?.level).toBe("WARN");
    expect(e?.message).toBe("disk low");
  });

  it("maps level aliases", () => {
    expect(parseLine("FATAL out of memory")?.level).toBe("ERROR");
    expect(parseLine("warning: cache miss")).toMatchObject({ level: "WARN", message: "cache miss" });
    expect(parseLine("2024-05-01 10:00:00 TRACE enter handler")?.level).toBe("DEBUG");
  });

  it("keeps a timestamped line without a level as UNKNOWN", () => {
    expect(parseLine("2024-05-01 10:00:00 worker 3 idle")).toMatchObject({
      level: "UNKNOWN",
      message: "worker 3 idle",
    });
  });

  it("skips lines with neither timestamp nor level", () => {
    expect(parseLine("just some text")).toBeUndefined();
    expect(parseLine("user reported an error in checkout")).toBeUndefined();
    expect(parseLine("   ")).toBeUndefined();
  });

  it("skips lines whose message is empty", () => {
    expect(parseLine("ERROR")).toBeUndefined();
    expect(parseLine("2024-05-01 10:00:00 INFO   ")).toBeUndefined();
  });

  it("drops impossible dates but keeps the event", () => {
    expect(parseLine("2024-02-30 10:00:00 INFO x")).toEqual({
      timestamp: undefined,
      level: "INFO",
      message: "x",
      rawLine: "2024-02-30 10:00:00 INFO x",
    });
  });

  it("strips a trailing carriage return", () => {
    expect(parseLine("2024-05-01 10:00:00 INFO hello\r")?.rawLine).toBe("2024-05-01 10:00:00 INFO hello");
  });
});

describe("parseLines", () => {
  it("drops unparsable lines", () => {
    const events = parseLines(["INFO a", "noise", "ERROR b"]);
    expect(events.map((e) => e.message)).toEqual(["a", "b"]);
  });
});
