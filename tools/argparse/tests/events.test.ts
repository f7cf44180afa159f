import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, test } from "vitest";
import {
  emitParserEvent,
  formatPrettyForTest,
  initializeEventEmitter,
  redactEventForTest,
  resetEventEmitter,
  shouldPrintToTerminalForTest,
  type ParserEvent,
} from "../lib/events.js";
import { Logger } from "../lib/logger.js";

function sampleEvent(overrides: Partial<ParserEvent> = {}): ParserEvent {
  return {
    ts: "2026-02-26T00:00:00.000Z",
    level: "info",
    eventType: "parse.start",
    prog: "items",
    message: "parsing",
    ...overrides,
  };
}

describe("event redaction", () => {
  test("redacts secret-like keys, nested ones included", () => {
    const redacted = redactEventForTest(
      sampleEvent({
        apiKey: "abc123",
        env: { DB_PASSWORD: "hunter", HOME: "/home/test" },
      })
    );

    expect(redacted.apiKey).toBe("[REDACTED]");
    expect(redacted.env).toEqual({ DB_PASSWORD: "[REDACTED]", HOME: "/home/test" });
  });

  test("truncates long strings", () => {
    const redacted = redactEventForTest(sampleEvent({ message: "x".repeat(500) }));
    expect(redacted.message).toBe(`${"x".repeat(240)}...[truncated]`);
  });
});

describe("event formatting", () => {
  test("pretty format includes prog, eventType, message and extras", () => {
    const line = formatPrettyForTest(
      sampleEvent({ eventType: "schema.field", message: "registered count", field: "count" })
    );

    expect(line).toBe(
      '2026-02-26T00:00:00.000Z [items] [schema.field] registered count field="count"'
    );
  });
});

describe("terminal filtering", () => {
  test("non-verbose hides debug and routine info", () => {
    expect(shouldPrintToTerminalForTest(sampleEvent({ level: "debug" }), false)).toBe(false);
    expect(shouldPrintToTerminalForTest(sampleEvent({ eventType: "parse.end" }), false)).toBe(false);
  });

  test("non-verbose shows warnings and failures", () => {
    expect(shouldPrintToTerminalForTest(sampleEvent({ level: "warn" }), false)).toBe(true);
    expect(shouldPrintToTerminalForTest(sampleEvent({ eventType: "parse.fail" }), false)).toBe(true);
  });

  test("verbose mode prints everything", () => {
    expect(shouldPrintToTerminalForTest(sampleEvent({ level: "debug" }), true)).toBe(true);
  });
});

describe("event file", () => {
  let dir = "";

  afterEach(() => {
    resetEventEmitter();
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  test("is a no-op until initialized", () => {
    expect(() => emitParserEvent({ level: "info", message: "x", eventType: "parse.start", prog: "p" })).not.toThrow();
  });

  test("logger writes one JSON line per event", () => {
    dir = mkdtempSync(join(tmpdir(), "argparse-events-"));
    const eventFilePath = join(dir, "nested", "events.jsonl");
    initializeEventEmitter({ format: "json", verbose: false, terminal: false, eventFilePath });

    const logger = new Logger("items");
    logger.debug("registered name", { eventType: "schema.field", field: "name" });
    logger.warn("argument --count: expected one argument", {
      eventType: "parse.fail",
      errorCode: "ARGUMENT_ERROR",
    });

    const lines = readFileSync(eventFilePath, "utf8").trim().split("\n");
    expect(lines).toHaveLength(2);
    const [first, second]: unknown[] = lines.map((line) => JSON.parse(line));
    expect(first).toMatchObject({
      level: "debug",
      eventType: "schema.field",
      prog: "items",
      message: "registered name",
      field: "name",
    });
    expect(second).toMatchObject({ level: "warn", eventType: "parse.fail", errorCode: "ARGUMENT_ERROR" });
  });
});
