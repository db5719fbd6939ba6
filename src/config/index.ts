/**
 * Config layer — public API.
 *
 * @example
 * ```ts
 * import { loadConfig } from "./config/index.js";
 *
 * const { config, storePath } = loadConfig();
 * console.log(storePath);                  // "/home/me/.calldesk/data/shared_information.json"
 * console.log(config.query?.defaultLimit); // 10
 * ```
 */

export {
  loadConfig,
  scaffoldConfigIfMissing,
  ConfigError,
  ConfigFileNotFoundError,
  ConfigParseError,
  ConfigValidationError,
  type LoadConfigOptions,
  type ConfigResult,
  type ConfigIssue,
} from "./loader.js";

export {
  CalldeskConfigSchema,
  LogLevelSchema,
  type CalldeskConfig,
  type StoreConfig,
  type QueryConfig,
  type LoggingConfig,
  type LogLevel,
} from "./schema.js";

export {
  resolveStateDir,
  resolveConfigPath,
  resolveDataDir,
  resolveStoreFilePath,
  resolveUserPath,
  ensureDir,
} from "./paths.js";

export {
  applyAllDefaults,
  applyStoreDefaults,
  applyQueryDefaults,
  applyLoggingDefaults,
  DEFAULT_INFORMATION_LIMIT,
  DEFAULT_CALL_LOG_LIMIT,
  DEFAULT_LOG_LEVEL,
} from "./defaults.js";
