import { describe, expect, it } from "vitest";
import { GroupAggregator } from "./aggregator.js";
import { parseLines } from "./parser.js";
import { buildPrompt, scrubSecrets, SYSTEM_PROMPT } from "./prompt.js";

const LINES = [
  "2024-05-01 10:00:00 ERROR NullPointerException at Foo.java:42",
  "2024-05-01 10:00:01 ERROR NullPointerException at Foo.java:42",
  "2024-05-01 10:00:02 INFO service started",
];

const groups = new GroupAggregator().addAll(parseLines(LINES)).finalize();

describe("buildPrompt", () => {
  it("serializes every group", () => {
    const { systemPrompt, userPrompt } = buildPrompt(groups);
    expect(systemPrompt).toBe(SYSTEM_PROMPT);
    expect(userPrompt).toBe(
      [
        "Total events: 3 across 2 group(s).",
        "",
        "## Group 1",
        "signature: nullpointerexception at <path>",
        "count: 2",
        "levels: ERROR=2",
        "error_rate: 1",
        "exceptions: NullPointerException",
        "first_seen: 2024-05-01T10:00:00.000Z",
        "last_seen: 2024-05-01T10:00:01.000Z",
        "examples:",
        `  - ${LINES[0]}`,
        `  - ${LINES[1]}`,
        "",
        "## Group 2",
        "signature: service started",
        "count: 1",
        "levels: INFO=1",
        "error_rate: 0",
        "exceptions: (none)",
        "first_seen: 2024-05-01T10:00:02.000Z",
        "last_seen: 2024-05-01T10:00:02.000Z",
        "examples:",
        `  - ${LINES[2]}`,
      ].join("\n"),
    );
  });

  it("is deterministic", () => {
    expect(buildPrompt(groups)).toEqual(buildPrompt(groups));
  });

  it("notes groups left out", () => {
    const { userPrompt } = buildPrompt(groups, { maxGroups: 1 });
    expect(userPrompt).toContain("## Group 1");
    expect(userPrompt).not.toContain("## Group 2");
    expect(userPrompt.endsWith("(1 more groups omitted)")).toBe(true);
  });

  it("limits and clips examples", () => {
    const { userPrompt } = buildPrompt(groups, { maxGroups: 1, maxExamples: 1, maxExampleLength: 20 });
    expect(userPrompt).toContain("examples:\n  - 2024-05-01 10:00:00…\n");
  });
});

describe("scrubSecrets", () => {
  it("masks credentials, emails and addresses", () => {
    expect(scrubSecrets("Authorization: Bearer abcdef123456789 from 10.0.0.1 user bob@example.com")).toBe(
      "Authorization: Bearer **** from ***.***.***.*** user ****@****",
    );
    expect(scrubSecrets("login password=test-secret")).toBe("login password=****");
  });

  it("leaves ordinary text alone", () => {
    expect(scrubSecrets("NullPointerException at Foo.java:42")).toBe("NullPointerException at Foo.java:42");
  });
});
