/**
 * calldesk — function-call dispatcher with JSON-backed session tracking.
 *
 * @example
 * ```ts
 * import { loadConfig, openDispatcher } from "calldesk";
 *
 * const dispatcher = openDispatcher(loadConfig());
 * await dispatcher.handle("end_call", { reason: "customer_satisfied", duration: 300 }, "call-42");
 * await dispatcher.close();
 * ```
 */

import { DEFAULT_LOG_LEVEL, type ConfigResult } from "./config/index.js";
import { createDispatcher, type Dispatcher } from "./dispatcher/index.js";
import { createLogger, type Logger } from "./logging/logger.js";

export * from "./config/index.js";
export * from "./dispatcher/index.js";
export * from "./query/index.js";
export * from "./store/index.js";
export * from "./tools/index.js";
export {
  createLogger,
  silentLogger,
  formatLogLine,
  errorMessage,
  type Logger,
  type LogFields,
  type LogSink,
  type CreateLoggerOptions,
} from "./logging/logger.js";

/** Build a dispatcher over the store a loaded config points at. */
export function openDispatcher(
  loaded: ConfigResult,
  options: { logger?: Logger } = {},
): Dispatcher {
  const { config, storePath } = loaded;
  const logger =
    options.logger ??
    createLogger({ level: config.logging?.level ?? DEFAULT_LOG_LEVEL, scope: "calldesk" });

  return createDispatcher({
    filePath: storePath,
    logger,
    query: {
      defaultLimit: config.query?.defaultLimit,
      callLogLimit: config.query?.callLogLimit,
    },
  });
}
