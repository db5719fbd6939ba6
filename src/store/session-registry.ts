/**
 * Session registry — session id → metadata, stored in the document's
 * `sessions` map.
 *
 * Sessions are created on first reference through `getOrCreate()` and
 * never deleted. Status only moves `active` → `ended`.
 */

import type { DocumentStore } from "./document-store.js";
import type { Session } from "./types.js";

export class SessionRegistry {
  constructor(private readonly store: DocumentStore) {}

  /**
   * Return the session for `sessionId`, creating it when unseen.
   * A new session is also marked in `active_sessions`.
   */
  getOrCreate(sessionId: string, callerId: string): Session {
    const doc = this.store.document;
    const existing = doc.sessions[sessionId];
    if (existing) return existing;

    const now = this.store.timestamp();
    const session: Session = {
      id: sessionId,
      caller_id: callerId,
      created_at: now,
      last_activity: now,
      information_count: 0,
      status: "active",
    };
    doc.sessions[sessionId] = session;
    doc.active_sessions[sessionId] = now;
    this.store.markDirty();
    return session;
  }

  /** Count one more information record against the session. */
  recordInformation(session: Session): void {
    session.information_count += 1;
    session.last_activity = this.store.timestamp();
    this.store.markDirty();
  }

  /**
   * Mark the session ended. Ending an ended session overwrites
   * `end_time` / `end_reason`.
   */
  end(session: Session, reason: string): void {
    const now = this.store.timestamp();
    session.status = "ended";
    session.end_time = now;
    session.end_reason = reason;
    session.last_activity = now;
    delete this.store.document.active_sessions[session.id];
    this.store.markDirty();
  }

  get(sessionId: string): Session | undefined {
    return this.store.document.sessions[sessionId];
  }

  all(): Record<string, Session> {
    return this.store.document.sessions;
  }

  isActive(sessionId: string): boolean {
    return sessionId in this.store.document.active_sessions;
  }
}
