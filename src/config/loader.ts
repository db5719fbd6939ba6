/**
 * Config loader.
 *
 * read → JSON5 parse → Zod validation → defaults → store path check.
 *
 * The result carries the absolute store file path, so callers open the
 * document without resolving `~` or the state dir themselves. A store
 * path that names an existing directory is a validation error.
 */

import JSON5 from "json5";
import fs from "node:fs";
import path from "node:path";

import { applyAllDefaults } from "./defaults.js";
import {
  ensureDir,
  resolveConfigPath,
  resolveStateDir,
  resolveStoreFilePath,
} from "./paths.js";
import { errorMessage } from "../logging/logger.js";
import { CalldeskConfigSchema, type CalldeskConfig } from "./schema.js";

export type LoadConfigOptions = {
  configPath?: string;
  /** Env used for `CALLDESK_*` overrides and `~` expansion. */
  env?: NodeJS.ProcessEnv;
};

export type ConfigResult = {
  config: CalldeskConfig;
  /** Config file that was read. */
  path: string;
  /** Absolute path of the shared-information document. */
  storePath: string;
};

export function loadConfig(options: LoadConfigOptions = {}): ConfigResult {
  const env = options.env ?? process.env;
  const configPath = path.resolve(options.configPath ?? resolveConfigPath(env));

  const parsed = readConfigFile(configPath);

  const result = CalldeskConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigValidationError(configPath, result.error.issues);
  }

  const config = applyAllDefaults(result.data, env);
  const storePath = resolveStoreFilePath(config.store?.filePath, env);

  if (fs.existsSync(storePath) && fs.statSync(storePath).isDirectory()) {
    throw new ConfigValidationError(configPath, [
      { path: ["store", "filePath"], message: `${storePath} is a directory` },
    ]);
  }

  return { config, path: configPath, storePath };
}

function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    throw new ConfigFileNotFoundError(configPath);
  }
  const raw = fs.readFileSync(configPath, "utf-8");
  try {
    return JSON5.parse(raw);
  } catch (err) {
    throw new ConfigParseError(configPath, errorMessage(err));
  }
}

// ── Scaffold ────────────────────────────────────────────────────────

/**
 * Create a default config file if none exists.
 * Returns the path to the (possibly newly created) config file.
 */
export function scaffoldConfigIfMissing(
  env: NodeJS.ProcessEnv = process.env,
): string {
  const stateDir = resolveStateDir(env);
  const configPath = resolveConfigPath(env, stateDir);

  if (fs.existsSync(configPath)) return configPath;

  ensureDir(path.dirname(configPath));

  const template = `// calldesk configuration
{
  // store: {
  //   filePath: "~/.calldesk/data/shared_information.json",
  // },

  // query: {
  //   defaultLimit: 10,
  //   callLogLimit: 50,
  // },

  logging: {
    level: "info",
  },
}
`;

  fs.writeFileSync(configPath, template, "utf-8");
  return configPath;
}

// ── Error classes ───────────────────────────────────────────────────

/** Base for every error the loader throws; carries the config file path. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigFileNotFoundError extends ConfigError {
  constructor(filePath: string) {
    super(`No calldesk config at ${filePath}`, filePath);
  }
}

export class ConfigParseError extends ConfigError {
  constructor(
    filePath: string,
    public readonly parseError: string,
  ) {
    super(`${filePath} is not valid JSON5: ${parseError}`, filePath);
  }
}

export type ConfigIssue = { path: PropertyKey[]; message: string };

export class ConfigValidationError extends ConfigError {
  constructor(
    filePath: string,
    public readonly issues: ConfigIssue[],
  ) {
    const lines = issues.map((i) => `  - ${i.path.map(String).join(".")}: ${i.message}`);
    super(`Invalid calldesk config in ${filePath}:\n${lines.join("\n")}`, filePath);
  }
}
