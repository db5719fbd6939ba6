/**
 * Default values for all config keys.
 *
 * Each `apply*Defaults()` function returns a **new** config object
 * with defaults merged in (no mutation). They are composed in a chain
 * by `applyAllDefaults()`.
 */

import type { CalldeskConfig } from "./schema.js";
import { resolveStoreFilePath } from "./paths.js";

// ── Constants ───────────────────────────────────────────────────────

export const DEFAULT_INFORMATION_LIMIT = 10;
export const DEFAULT_CALL_LOG_LIMIT = 50;
export const DEFAULT_LOG_LEVEL = "info" as const;

// ── Store defaults ──────────────────────────────────────────────────

/** Resolves `store.filePath` to an absolute path (env decides the state dir). */
export function applyStoreDefaults(
  cfg: CalldeskConfig,
  env: NodeJS.ProcessEnv = process.env,
): CalldeskConfig {
  return {
    ...cfg,
    store: {
      ...cfg.store,
      filePath: resolveStoreFilePath(cfg.store?.filePath, env),
    },
  };
}

// ── Query defaults ──────────────────────────────────────────────────

export function applyQueryDefaults(cfg: CalldeskConfig): CalldeskConfig {
  const query = cfg.query;
  if (query?.defaultLimit !== undefined && query.callLogLimit !== undefined) {
    return cfg;
  }

  return {
    ...cfg,
    query: {
      defaultLimit: query?.defaultLimit ?? DEFAULT_INFORMATION_LIMIT,
      callLogLimit: query?.callLogLimit ?? DEFAULT_CALL_LOG_LIMIT,
    },
  };
}

// ── Logging defaults ────────────────────────────────────────────────

export function applyLoggingDefaults(cfg: CalldeskConfig): CalldeskConfig {
  if (cfg.logging?.level !== undefined) return cfg;

  return {
    ...cfg,
    logging: { level: DEFAULT_LOG_LEVEL },
  };
}

// ── Compose all defaults ────────────────────────────────────────────

/**
 * Apply all default chains to a validated config.
 * Order: store → query → logging.
 */
export function applyAllDefaults(
  cfg: CalldeskConfig,
  env: NodeJS.ProcessEnv = process.env,
): CalldeskConfig {
  return applyLoggingDefaults(applyQueryDefaults(applyStoreDefaults(cfg, env)));
}
