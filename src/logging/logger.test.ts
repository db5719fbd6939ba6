import { describe, it, expect } from "vitest";
import type { LogLevel } from "../config/index.js";
import { createLogger, errorMessage, formatLogLine } from "./logger.js";

const FIXED = new Date("2025-03-01T10:00:00.000Z");

function capture() {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  return {
    lines,
    sink: (level: LogLevel, line: string) => {
      lines.push({ level, line });
    },
  };
}

describe("formatLogLine", () => {
  it("omits empty fields", () => {
    expect(formatLogLine(FIXED, "info", "Data saved")).toBe(
      "2025-03-01T10:00:00.000Z INFO Data saved",
    );
    expect(formatLogLine(FIXED, "info", "Data saved", {})).toBe(
      "2025-03-01T10:00:00.000Z INFO Data saved",
    );
  });

  it("appends fields as JSON", () => {
    expect(formatLogLine(FIXED, "warn", "Rejected", { session_id: "S1" })).toBe(
      '2025-03-01T10:00:00.000Z WARN Rejected {"session_id":"S1"}',
    );
  });
});

describe("createLogger", () => {
  it("drops entries below the threshold", () => {
    const { lines, sink } = capture();
    const logger = createLogger({ level: "warn", sink, now: () => FIXED });

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(lines.map((l) => l.level)).toEqual(["warn", "error"]);
  });

  it("defaults to info", () => {
    const { lines, sink } = capture();
    const logger = createLogger({ sink, now: () => FIXED });

    logger.debug("hidden");
    logger.info("shown");

    expect(lines).toEqual([
      { level: "info", line: "2025-03-01T10:00:00.000Z INFO shown" },
    ]);
  });

  it("prefixes the scope", () => {
    const { lines, sink } = capture();
    const logger = createLogger({ scope: "store", sink, now: () => FIXED });

    logger.error("Error saving data", { file: "/tmp/x.json" });

    expect(lines[0].line).toBe(
      '2025-03-01T10:00:00.000Z ERROR [store] Error saving data {"file":"/tmp/x.json"}',
    );
  });
});

describe("errorMessage", () => {
  it("uses Error#message", () => {
    expect(errorMessage(new Error("disk full"))).toBe("disk full");
  });

  it("stringifies other values", () => {
    expect(errorMessage(42)).toBe("42");
  });
});
