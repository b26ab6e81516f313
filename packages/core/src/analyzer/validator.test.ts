import { describe, expect, it } from "vitest";
import type { Group } from "../domain/LogEvent.js";
import { GroupAggregator } from "./aggregator.js";
import { parseLines } from "./parser.js";
import { deriveSeverity, fallbackRootCause, validateFindings } from "./validator.js";

const NPE = "nullpointerexception at <path>";

const groups = new GroupAggregator()
  .addAll(
    parseLines([
      "2024-05-01 10:00:00 ERROR NullPointerException at Foo.java:42",
      "2024-05-01 10:00:01 ERROR NullPointerException at Foo.java:42",
      "2024-05-01 10:00:02 INFO service started",
    ]),
  )
  .finalize();

function group(overrides: Partial<Group>): Group {
  return {
    signature: "sig",
    count: 1,
    levelCounts: { DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, UNKNOWN: 0 },
    examples: [],
    exceptionTokens: [],
    ...overrides,
  };
}

describe("validateFindings", () => {
  it("takes counts from the groups and text from the model", () => {
    const findings = validateFindings(groups, [
      {
        signatureRef: NPE,
        totalEvents: 99,
        errorRate: 0.1,
        probableRootCause: "Null config in Foo",
        severity: "critical",
        recommendation: "Add a null check",
      },
      { signatureRef: "made up", probableRootCause: "x" },
    ]);

    expect(findings).toEqual([
      {
        signatureRef: NPE,
        totalEvents: 2,
        errorRate: 1,
        probableRootCause: "Null config in Foo",
        severity: "critical",
        recommendation: "Add a null check",
        rootCauseSource: "llm",
      },
      {
        signatureRef: "service started",
        totalEvents: 1,
        errorRate: 0,
        probableRootCause: "service started",
        severity: "low",
        rootCauseSource: "rule",
      },
    ]);
  });

  it("falls back to exception tokens when the model gave nothing", () => {
    const [npe] = validateFindings(groups, []);
    expect(npe).toMatchObject({
      signatureRef: NPE,
      totalEvents: 2,
      probableRootCause: "NullPointerException",
      severity: "high",
      rootCauseSource: "rule",
    });
    expect(npe?.recommendation).toBeUndefined();
  });

  it("treats placeholder text as missing", () => {
    const [npe] = validateFindings(groups, [{ signatureRef: NPE, probableRootCause: "N/A", recommendation: "  " }]);
    expect(npe?.probableRootCause).toBe("NullPointerException");
    expect(npe?.rootCauseSource).toBe("rule");
    expect(npe).not.toHaveProperty("recommendation");
  });

  it("keeps the first candidate for a repeated signature", () => {
    const [npe] = validateFindings(groups, [
      { signatureRef: NPE, probableRootCause: "first" },
      { signatureRef: NPE, probableRootCause: "second" },
    ]);
    expect(npe?.probableRootCause).toBe("first");
  });

  it("returns one finding per group, in group order", () => {
    const findings = validateFindings(groups, [{ signatureRef: "service started", probableRootCause: "deploy" }]);
    expect(findings.map((f) => f.signatureRef)).toEqual([NPE, "service started"]);
  });
});

describe("fallbackRootCause", () => {
  it("joins up to three tokens", () => {
    expect(fallbackRootCause(group({ exceptionTokens: ["A", "B", "C", "D"] }))).toBe("A, B, C");
  });

  it("uses the leading clause of the most frequent example", () => {
    const g = group({
      examples: [
        "2024-05-01 10:00:00 WARN pool exhausted; waiting for a connection",
        "2024-05-01 10:00:01 WARN cache cold",
        "2024-05-01 10:00:02 WARN pool exhausted; waiting for a connection",
      ],
    });
    expect(fallbackRootCause(g)).toBe("pool exhausted");
  });

  it("ends with the signature", () => {
    expect(fallbackRootCause(group({ signature: "odd <num>" }))).toBe("odd <num>");
  });
});

describe("deriveSeverity", () => {
  const levels = (ERROR: number, INFO: number) => ({ DEBUG: 0, INFO, WARN: 0, ERROR, UNKNOWN: 0 });

  it("rates by the share of ERROR events", () => {
    expect(deriveSeverity(group({ count: 2, levelCounts: levels(1, 1) }))).toBe("high");
    expect(deriveSeverity(group({ count: 3, levelCounts: levels(1, 2) }))).toBe("medium");
    expect(deriveSeverity(group({ count: 3, levelCounts: levels(0, 3) }))).toBe("low");
  });
});
