/**
 * Store layer — public API.
 *
 * @example
 * ```ts
 * import { DocumentStore, SessionRegistry, RecordLog } from "./store/index.js";
 *
 * const store = DocumentStore.open({ filePath: "/tmp/shared_information.json" });
 * const sessions = new SessionRegistry(store);
 * const log = new RecordLog(store);
 *
 * const session = sessions.getOrCreate("call-1", "+15550100");
 * log.appendInformation({
 *   sessionId: session.id,
 *   callerId: session.caller_id,
 *   information: "Prefers a callback after 5pm",
 *   category: "scheduling",
 * });
 * sessions.recordInformation(session);
 * store.save();
 * ```
 */

export { DocumentStore, type DocumentStoreOptions } from "./document-store.js";

export { SessionRegistry } from "./session-registry.js";

export {
  RecordLog,
  randomId,
  type IdGenerator,
  type InformationInput,
  type CallInput,
} from "./record-log.js";

export {
  SCHEMA_VERSION,
  emptyDocument,
  ledgerDocumentSchema,
  type LedgerDocument,
  type DocumentMetadata,
  type Session,
  type SessionStatus,
  type InformationRecord,
  type CallRecord,
} from "./types.js";
