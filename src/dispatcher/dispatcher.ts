/**
 * Dispatcher — routes a named function call to its handler and returns
 * a uniform result envelope.
 *
 * Calls are serialised through a single promise chain, so one handler
 * runs to completion (mutate, then persist) before the next starts.
 * `handle()` never rejects: unknown names, invalid parameters and
 * handler exceptions all come back as `{ success: false, error }`.
 */

import {
  errorMessage,
  silentLogger,
  type LogFields,
  type Logger,
} from "../logging/logger.js";
import { QueryEngine, type QueryEngineOptions } from "../query/query-engine.js";
import {
  DocumentStore,
  RecordLog,
  SessionRegistry,
  randomId,
  type IdGenerator,
} from "../store/index.js";
import {
  parseFunctionCall,
  type EndCallArgs,
  type GetSharedInformationArgs,
  type ShareInformationArgs,
} from "../tools/index.js";
import type {
  EndCallResult,
  Envelope,
  FailureEnvelope,
  GetSharedInformationResult,
  ShareInformationResult,
} from "./types.js";

export interface DispatcherOptions {
  store: DocumentStore;
  logger?: Logger;
  /** Id source for records and for calls that arrive without a session id. */
  generateId?: IdGenerator;
  query?: QueryEngineOptions;
}

export interface CreateDispatcherOptions extends Omit<DispatcherOptions, "store"> {
  /** Backing JSON file. */
  filePath: string;
  now?: () => Date;
}

function failure(error: string, sessionId: string): FailureEnvelope {
  return { success: false, error, session_id: sessionId };
}

export class Dispatcher {
  readonly store: DocumentStore;
  readonly sessions: SessionRegistry;
  readonly records: RecordLog;
  readonly query: QueryEngine;
  private readonly logger: Logger;
  private readonly generateId: IdGenerator;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: DispatcherOptions) {
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.generateId = options.generateId ?? randomId;
    this.sessions = new SessionRegistry(this.store);
    this.records = new RecordLog(this.store, this.generateId);
    this.query = new QueryEngine(this.store, options.query);
  }

  /**
   * Dispatch `functionName` with `parameters`. A missing or empty
   * `sessionId` is replaced by a fresh id, echoed in the envelope.
   */
  handle(
    functionName: string,
    parameters: unknown = {},
    sessionId?: string | null,
  ): Promise<Envelope> {
    const run = this.queue.then(() =>
      this.dispatch(functionName, parameters, sessionId),
    );
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async dispatch(
    functionName: string,
    parameters: unknown,
    sessionId: string | null | undefined,
  ): Promise<Envelope> {
    const sid =
      typeof sessionId === "string" && sessionId.trim() ? sessionId : this.newSessionId();

    try {
      this.log("info", "Handling function call", {
        function: functionName,
        session_id: sid,
      });

      const parsed = parseFunctionCall(functionName, parameters);
      if (!parsed.ok) {
        this.log("warn", "Rejected function call", {
          function: functionName,
          session_id: sid,
          error: parsed.error,
        });
        return failure(parsed.error, sid);
      }

      const call = parsed.call;
      switch (call.name) {
        case "share_information":
          return this.shareInformation(call.params, sid);
        case "end_call":
          return this.endCall(call.params, sid);
        case "get_shared_information":
          return this.getSharedInformation(call.params, sid);
      }
    } catch (err) {
      this.log("error", "Error handling function call", {
        function: functionName,
        session_id: sid,
        error: errorMessage(err),
      });
      return failure(errorMessage(err), sid);
    }
  }

  private newSessionId(): string {
    try {
      return this.generateId();
    } catch (err) {
      this.log("warn", "Id generator failed; using a random session id", {
        error: errorMessage(err),
      });
      return randomId();
    }
  }

  /** Log through the injected logger; a throwing logger falls back to stderr. */
  private log(level: keyof Logger, message: string, fields: LogFields): void {
    try {
      this.logger[level](message, fields);
    } catch (err) {
      console.error(`Logger failed (${errorMessage(err)}): ${message}`);
    }
  }

  // ── Handlers ──────────────────────────────────────────────────────

  private shareInformation(
    params: ShareInformationArgs,
    sessionId: string,
  ): ShareInformationResult {
    const record = this.records.appendInformation({
      sessionId,
      callerId: params.caller_id,
      information: params.information,
      category: params.category,
    });

    const session = this.sessions.getOrCreate(sessionId, params.caller_id);
    this.sessions.recordInformation(session);
    this.store.save();

    this.log("info", "Information shared", {
      session_id: sessionId,
      info_id: record.id,
      category: record.category,
    });

    return {
      success: true,
      message: `Information received and stored successfully. Category: ${record.category}`,
      info_id: record.id,
      session_id: sessionId,
      total_shared: this.records.information().length,
    };
  }

  private endCall(params: EndCallArgs, sessionId: string): EndCallResult {
    const record = this.records.appendCall({
      sessionId,
      callerId: params.caller_id,
      reason: params.reason,
      duration: params.duration,
    });

    const session = this.sessions.getOrCreate(sessionId, params.caller_id);
    this.sessions.end(session, params.reason);
    this.store.save();

    this.log("info", "Call ended", {
      session_id: sessionId,
      reason: params.reason,
      information_shared_count: record.information_shared_count,
    });

    return {
      success: true,
      message: `Call ended successfully. Reason: ${params.reason}`,
      call_log_id: record.id,
      session_id: sessionId,
      information_shared_count: record.information_shared_count,
      total_calls: this.records.calls().length,
    };
  }

  private getSharedInformation(
    params: GetSharedInformationArgs,
    sessionId: string,
  ): GetSharedInformationResult {
    const page = this.query.listInformation({
      category: params.category,
      callerId: params.caller_id,
      since: params.since,
      until: params.until,
      limit: params.limit,
      offset: params.offset,
    });

    return {
      success: true,
      information: page.items.map((info) => ({ ...info })),
      count: page.items.length,
      total_available: page.totalAvailable,
      session_id: sessionId,
    };
  }

  // ── Lifecycle ─────────────────────────────────────────────────────

  /** Wait for in-flight calls, then flush the store. */
  async close(): Promise<boolean> {
    await this.queue;
    return this.store.close();
  }
}

/** Open the store at `filePath` and build a dispatcher around it. */
export function createDispatcher(options: CreateDispatcherOptions): Dispatcher {
  const { filePath, now, ...rest } = options;
  const store = DocumentStore.open({ filePath, now, logger: rest.logger });
  return new Dispatcher({ ...rest, store });
}
