/**
 * Dispatcher layer — public API.
 *
 * @example
 * ```ts
 * import { createDispatcher } from "./dispatcher/index.js";
 *
 * const dispatcher = createDispatcher({ filePath: "/tmp/shared_information.json" });
 * const result = await dispatcher.handle(
 *   "share_information",
 *   { information: "Owns a two-bedroom flat", category: "qualification" },
 *   "call-42",
 * );
 * if (result.success) console.log(result);
 * await dispatcher.close();
 * ```
 */

export {
  Dispatcher,
  createDispatcher,
  type DispatcherOptions,
  type CreateDispatcherOptions,
} from "./dispatcher.js";

export type {
  Envelope,
  SuccessEnvelope,
  FailureEnvelope,
  ShareInformationResult,
  EndCallResult,
  GetSharedInformationResult,
} from "./types.js";
