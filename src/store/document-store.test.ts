import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { LogLevel } from "../config/index.js";
import { createLogger } from "../logging/logger.js";
import { QueryEngine } from "../query/query-engine.js";
import { DocumentStore } from "./document-store.js";

// ── Test helpers ────────────────────────────────────────────────────

let tmpDir: string;
let filePath: string;
let current: Date;
const now = () => current;

function readFile(): unknown {
  return JSON.parse(fs.readFileSync(filePath, "utf-8"));
}

function captureLogger() {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  const logger = createLogger({
    level: "debug",
    now,
    sink: (level, line) => lines.push({ level, line }),
  });
  return { lines, logger };
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "calldesk-store-test-"));
  filePath = path.join(tmpDir, "data", "shared_information.json");
  current = new Date("2025-03-01T10:00:00.000Z");
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ── load ────────────────────────────────────────────────────────────

describe("DocumentStore.open", () => {
  it("initialises and persists a missing file", () => {
    const store = DocumentStore.open({ filePath, now });

    expect(fs.existsSync(filePath)).toBe(true);
    expect(readFile()).toEqual({
      sessions: {},
      information_shared: [],
      call_logs: [],
      active_sessions: {},
      metadata: {
        created_at: "2025-03-01T10:00:00.000Z",
        version: "1.0",
        last_updated: "2025-03-01T10:00:00.000Z",
      },
    });
    expect(store.document.metadata.last_updated).toBe("2025-03-01T10:00:00.000Z");
  });

  it("writes indented JSON", () => {
    DocumentStore.open({ filePath, now });
    const raw = fs.readFileSync(filePath, "utf-8");
    expect(raw.startsWith('{\n  "sessions": {}')).toBe(true);
  });

  it("loads an existing document", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(
      filePath,
      JSON.stringify({
        sessions: {},
        information_shared: [
          {
            id: "i1",
            session_id: "S1",
            caller_id: "X",
            information: "Has a dog",
            category: "general",
            timestamp: "2025-02-01T00:00:00.000Z",
            status: "received",
          },
        ],
        call_logs: [],
        active_sessions: {},
        metadata: {
          created_at: "2025-01-01T00:00:00.000Z",
          version: "1.0",
          last_updated: "2025-02-01T00:00:00.000Z",
        },
      }),
    );

    const store = DocumentStore.open({ filePath, now });
    expect(store.document.information_shared).toHaveLength(1);
    expect(store.document.information_shared[0].information).toBe("Has a dog");
    expect(store.document.metadata.created_at).toBe("2025-01-01T00:00:00.000Z");
  });

  it("fills missing collections and metadata with empty defaults", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "{}");

    const store = DocumentStore.open({ filePath, now });
    expect(store.document).toEqual({
      sessions: {},
      information_shared: [],
      call_logs: [],
      active_sessions: {},
      metadata: {
        created_at: "2025-03-01T10:00:00.000Z",
        version: "1.0",
        last_updated: null,
      },
    });
  });

  it("backs up a corrupt file and starts empty without throwing", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "NOT VALID JSON{{{");
    const { lines, logger } = captureLogger();

    const store = DocumentStore.open({ filePath, now, logger });

    expect(store.document.information_shared).toEqual([]);
    const backup = `${filePath}.bak.${current.getTime()}`;
    expect(fs.readFileSync(backup, "utf-8")).toBe("NOT VALID JSON{{{");
    expect(lines[0].level).toBe("error");
    expect(lines[0].line).toContain("Error loading data: invalid JSON");
  });

  it("treats a wrongly shaped document as corrupt", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({ information_shared: "oops" }));

    const store = DocumentStore.open({ filePath, now });

    expect(store.document.information_shared).toEqual([]);
    expect(fs.existsSync(`${filePath}.bak.${current.getTime()}`)).toBe(true);
  });

  it("does not overwrite a corrupt file until the next save", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "[1, 2");

    DocumentStore.open({ filePath, now });

    expect(fs.readFileSync(filePath, "utf-8")).toBe("[1, 2");
  });
});

// ── save ────────────────────────────────────────────────────────────

describe("DocumentStore.save", () => {
  it("stamps last_updated with the save time", () => {
    const store = DocumentStore.open({ filePath, now });
    current = new Date("2025-03-01T11:30:00.000Z");

    expect(store.save()).toBe(true);

    const onDisk = readFile();
    expect(onDisk).toMatchObject({
      metadata: {
        created_at: "2025-03-01T10:00:00.000Z",
        last_updated: "2025-03-01T11:30:00.000Z",
      },
    });
  });

  it("writes in-memory mutations", () => {
    const store = DocumentStore.open({ filePath, now });
    store.document.active_sessions.S1 = "2025-03-01T10:00:00.000Z";
    store.save();

    expect(readFile()).toMatchObject({
      active_sessions: { S1: "2025-03-01T10:00:00.000Z" },
    });
  });

  it("leaves no temp file behind", () => {
    const store = DocumentStore.open({ filePath, now });
    store.save();
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(["shared_information.json"]);
  });

  it("logs and returns false when the target cannot be written", () => {
    const blocker = path.join(tmpDir, "blocker");
    fs.writeFileSync(blocker, "not a directory");
    const { lines, logger } = captureLogger();

    const store = DocumentStore.open({
      filePath: path.join(blocker, "shared_information.json"),
      now,
      logger,
    });

    expect(store.save()).toBe(false);
    expect(store.document.metadata.last_updated).toBeNull();
    expect(lines.some((l) => l.level === "error" && l.line.includes("Error saving data"))).toBe(
      true,
    );
  });
});

// ── snapshot / close ────────────────────────────────────────────────

describe("DocumentStore.snapshot", () => {
  it("returns a deep copy", () => {
    const store = DocumentStore.open({ filePath, now });
    const snap = store.snapshot();
    snap.active_sessions.S9 = "x";

    expect(store.document.active_sessions).toEqual({});
  });
});

describe("DocumentStore.close", () => {
  it("leaves a clean store's file byte-identical", () => {
    DocumentStore.open({ filePath, now }).close();
    const before = fs.readFileSync(filePath, "utf-8");

    current = new Date("2025-06-01T00:00:00.000Z");
    const store = DocumentStore.open({ filePath, now });
    new QueryEngine(store).getSummary();

    expect(store.isDirty).toBe(false);
    expect(store.close()).toBe(true);
    expect(fs.readFileSync(filePath, "utf-8")).toBe(before);
  });

  it("flushes unsaved changes once", () => {
    const store = DocumentStore.open({ filePath, now });
    store.document.active_sessions.S1 = "2025-03-01T10:00:00.000Z";
    store.markDirty();
    current = new Date("2025-03-01T12:00:00.000Z");

    expect(store.close()).toBe(true);
    expect(store.isDirty).toBe(false);
    expect(readFile()).toMatchObject({
      active_sessions: { S1: "2025-03-01T10:00:00.000Z" },
      metadata: { last_updated: "2025-03-01T12:00:00.000Z" },
    });

    store.markDirty();
    current = new Date("2025-03-01T13:00:00.000Z");
    expect(store.close()).toBe(true);
    expect(readFile()).toMatchObject({
      metadata: { last_updated: "2025-03-01T12:00:00.000Z" },
    });
  });

  it("retries the flush after a failed save", () => {
    const blocker = path.join(tmpDir, "blocker");
    fs.writeFileSync(blocker, "not a directory");
    const store = DocumentStore.open({
      filePath: path.join(blocker, "shared_information.json"),
      now,
    });

    expect(store.isDirty).toBe(true);
    expect(store.close()).toBe(false);
  });
});
