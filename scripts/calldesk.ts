#!/usr/bin/env node
/**
 * CLI for inspecting the store and issuing function calls by hand.
 *
 * Usage:
 *   node --import tsx scripts/calldesk.ts call <function> [json] [--session <id>]
 *   node --import tsx scripts/calldesk.ts summary | sessions | session <id> | raw
 *   node --import tsx scripts/calldesk.ts tools [function]
 *   node --import tsx scripts/calldesk.ts calls [--limit n]
 *   node --import tsx scripts/calldesk.ts information [--category c] [--caller c] [--limit n]
 *   node --import tsx scripts/calldesk.ts                 # interactive mode
 *
 * Reads config from ~/.calldesk/calldesk.json (scaffolded if missing).
 * In interactive mode every line is `<function> [json]`, all under one session.
 */

import crypto from "node:crypto";
import readline from "node:readline";
import { parseArgs } from "node:util";

import {
  findTool,
  getToolNames,
  loadConfig,
  openDispatcher,
  scaffoldConfigIfMissing,
  type Dispatcher,
} from "../src/index.js";

// ── Helpers ────────────────────────────────────────────────────────

function log(msg: string): void {
  console.log(msg);
}

function printJson(value: unknown): void {
  log(JSON.stringify(value, null, 2));
}

function parseJsonArg(raw: string | undefined): unknown {
  if (!raw?.trim()) return {};
  return JSON.parse(raw);
}

function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n < 0) throw new Error(`Invalid --limit: ${raw}`);
  return n;
}

// ── One-shot commands ──────────────────────────────────────────────

async function runCommand(dispatcher: Dispatcher, argv: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      session: { type: "string" },
      limit: { type: "string" },
      category: { type: "string" },
      caller: { type: "string" },
    },
  });
  const [command, ...rest] = positionals;
  const query = dispatcher.query;

  switch (command) {
    case "call": {
      const [fn, json] = rest;
      if (!fn) throw new Error("Usage: call <function> [json] [--session <id>]");
      printJson(await dispatcher.handle(fn, parseJsonArg(json), values.session));
      break;
    }
    case "summary":
      printJson(query.getSummary());
      break;
    case "sessions":
      printJson(query.getAllSessions());
      break;
    case "session":
      if (!rest[0]) throw new Error("Usage: session <id>");
      printJson(query.getSessionInfo(rest[0]));
      break;
    case "calls":
      printJson(query.getCallLogs(parseLimit(values.limit)));
      break;
    case "information":
      printJson(
        await dispatcher.handle(
          "get_shared_information",
          { category: values.category, caller_id: values.caller, limit: parseLimit(values.limit) },
          values.session,
        ),
      );
      break;
    case "tools":
      if (rest[0]) {
        printJson(findTool(rest[0]) ?? { error: `Unknown function: ${rest[0]}` });
      } else {
        printJson(getToolNames());
      }
      break;
    case "raw":
      printJson(query.rawDocument());
      break;
    default:
      throw new Error(`Unknown command: ${command}`);
  }
}

// ── Interactive mode ───────────────────────────────────────────────

async function runInteractive(dispatcher: Dispatcher): Promise<void> {
  const sessionId = crypto.randomUUID();
  log(`📝 Session: ${sessionId}`);
  log(`Type "<function> [json]" and press Enter. Type "exit" or Ctrl+C to quit.\n`);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "call> ",
  });

  rl.prompt();

  for await (const line of rl) {
    const trimmed = line.trim();
    if (!trimmed) {
      rl.prompt();
      continue;
    }
    if (trimmed === "exit" || trimmed === "quit") break;

    const space = trimmed.indexOf(" ");
    const fn = space === -1 ? trimmed : trimmed.slice(0, space);
    const json = space === -1 ? undefined : trimmed.slice(space + 1);

    try {
      printJson(await dispatcher.handle(fn, parseJsonArg(json), sessionId));
    } catch (err) {
      log(`❌ ${err instanceof Error ? err.message : String(err)}`);
    }
    rl.prompt();
  }

  rl.close();
}

// ── Entry point ────────────────────────────────────────────────────

async function main(): Promise<void> {
  scaffoldConfigIfMissing();
  const dispatcher = openDispatcher(loadConfig());

  try {
    const argv = process.argv.slice(2);
    if (argv.length > 0) {
      await runCommand(dispatcher, argv);
    } else {
      await runInteractive(dispatcher);
    }
  } finally {
    await dispatcher.close();
  }
}

main().catch((err: unknown) => {
  log(`❌ ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
