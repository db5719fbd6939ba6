/**
 * Standard directory and config path resolution.
 *
 * State dir:  ~/.calldesk/                 (mutable data: store file, backups)
 * Config:     ~/.calldesk/calldesk.json
 * Store:      ~/.calldesk/data/shared_information.json
 *
 * Override via env vars:
 *   CALLDESK_STATE_DIR   — override state directory
 *   CALLDESK_CONFIG_PATH — override config file path
 *   CALLDESK_HOME        — override the home used for `~` expansion
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const STATE_DIRNAME = ".calldesk";
const CONFIG_FILENAME = "calldesk.json";
const STORE_FILENAME = "shared_information.json";

// ── Home directory ──────────────────────────────────────────────────

function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.CALLDESK_HOME?.trim();
  if (override) return override;
  return os.homedir();
}

// ── Tilde expansion ─────────────────────────────────────────────────

function expandTilde(filepath: string, home: string): string {
  if (filepath === "~") return home;
  if (filepath.startsWith("~/") || filepath.startsWith("~\\")) {
    return path.join(home, filepath.slice(2));
  }
  return filepath;
}

/** Expand `~` and resolve to an absolute path. Empty input stays empty. */
export function resolveUserPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  return path.resolve(expandTilde(trimmed, resolveHomeDir(env)));
}

// ── State directory ─────────────────────────────────────────────────

/**
 * Resolve the state directory for mutable data.
 *
 * Override: `CALLDESK_STATE_DIR` env var.
 * Default:  `~/.calldesk`
 */
export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.CALLDESK_STATE_DIR?.trim();
  if (override) return resolveUserPath(override, env);
  return path.join(resolveHomeDir(env), STATE_DIRNAME);
}

// ── Config file path ────────────────────────────────────────────────

/**
 * Resolve the config file path (JSON5).
 *
 * Override: `CALLDESK_CONFIG_PATH` env var.
 * Default:  `~/.calldesk/calldesk.json`
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  stateDir: string = resolveStateDir(env),
): string {
  const override = env.CALLDESK_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override, env);
  return path.join(stateDir, CONFIG_FILENAME);
}

// ── Data directory ──────────────────────────────────────────────────

/** Directory holding the shared-information document. */
export function resolveDataDir(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, "data");
}

/**
 * Resolve the store file path.
 * Priority: config `store.filePath` → `<state>/data/shared_information.json`.
 */
export function resolveStoreFilePath(
  configured?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (configured?.trim()) return resolveUserPath(configured, env);
  return path.join(resolveDataDir(resolveStateDir(env)), STORE_FILENAME);
}

// ── Ensure dirs ─────────────────────────────────────────────────────

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}
