/**
 * Record log — the two append-only sequences of the document:
 * information records and call-end records.
 *
 * Appended entries are frozen; nothing here edits or removes them.
 */

import crypto from "node:crypto";

import type { DocumentStore } from "./document-store.js";
import type { CallRecord, InformationRecord } from "./types.js";

export type IdGenerator = () => string;

export const randomId: IdGenerator = () => crypto.randomUUID();

export interface InformationInput {
  sessionId: string;
  callerId: string;
  information: string;
  category: string;
}

export interface CallInput {
  sessionId: string;
  callerId: string;
  reason: string;
  duration: number;
}

export class RecordLog {
  constructor(
    private readonly store: DocumentStore,
    private readonly generateId: IdGenerator = randomId,
  ) {}

  appendInformation(input: InformationInput): InformationRecord {
    const record: InformationRecord = Object.freeze({
      id: this.generateId(),
      session_id: input.sessionId,
      caller_id: input.callerId,
      information: input.information,
      category: input.category,
      timestamp: this.store.timestamp(),
      status: "received" as const,
    });
    this.store.document.information_shared.push(record);
    this.store.markDirty();
    return record;
  }

  /**
   * Append a call-end record. `information_shared_count` is counted
   * from the information log now and frozen with the record.
   */
  appendCall(input: CallInput): CallRecord {
    const record: CallRecord = Object.freeze({
      id: this.generateId(),
      session_id: input.sessionId,
      caller_id: input.callerId,
      end_time: this.store.timestamp(),
      reason: input.reason,
      duration: input.duration,
      information_shared_count: this.countForSession(input.sessionId),
    });
    this.store.document.call_logs.push(record);
    this.store.markDirty();
    return record;
  }

  /** Number of information records carrying `sessionId`. */
  countForSession(sessionId: string): number {
    let count = 0;
    for (const info of this.store.document.information_shared) {
      if (info.session_id === sessionId) count++;
    }
    return count;
  }

  information(): readonly InformationRecord[] {
    return this.store.document.information_shared;
  }

  calls(): readonly CallRecord[] {
    return this.store.document.call_logs;
  }
}
