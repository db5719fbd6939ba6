/**
 * Query engine — read-only projections over the document: filtered
 * information pages, call logs, sessions and summary statistics.
 *
 * Nothing here mutates the store.
 */

import {
  DEFAULT_CALL_LOG_LIMIT,
  DEFAULT_INFORMATION_LIMIT,
} from "../config/index.js";
import type {
  CallRecord,
  DocumentStore,
  InformationRecord,
  LedgerDocument,
  Session,
} from "../store/index.js";

// ── Types ───────────────────────────────────────────────────────────

export interface InformationQuery {
  /** Exact category match. Empty string means no filter. */
  category?: string;
  /** Exact caller match. Empty string means no filter. */
  callerId?: string;
  /** Inclusive lower bound on `timestamp` (ISO-8601). */
  since?: string;
  /** Inclusive upper bound on `timestamp` (ISO-8601). */
  until?: string;
  limit?: number;
  offset?: number;
}

export interface InformationPage {
  /** Newest first. */
  items: InformationRecord[];
  /** Records that passed the filters, before paging. */
  matched: number;
  /** Unfiltered log length. */
  totalAvailable: number;
}

export interface InformationSummary {
  total_information_shared: number;
  total_sessions: number;
  total_calls: number;
  category_breakdown: Record<string, number>;
  last_updated: string | null;
}

export interface QueryEngineOptions {
  defaultLimit?: number;
  callLogLimit?: number;
}

// ── Helpers ─────────────────────────────────────────────────────────

/** Descending comparison of ISO timestamps; ties keep log order. */
function newestFirst(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? 1 : -1;
}

// ── Engine ──────────────────────────────────────────────────────────

export class QueryEngine {
  private readonly defaultLimit: number;
  private readonly callLogLimit: number;

  constructor(
    private readonly store: DocumentStore,
    options: QueryEngineOptions = {},
  ) {
    this.defaultLimit = options.defaultLimit ?? DEFAULT_INFORMATION_LIMIT;
    this.callLogLimit = options.callLogLimit ?? DEFAULT_CALL_LOG_LIMIT;
  }

  listInformation(query: InformationQuery = {}): InformationPage {
    const log = this.store.document.information_shared;
    const { category, callerId, since, until } = query;
    const limit = query.limit ?? this.defaultLimit;
    const offset = query.offset ?? 0;

    let filtered = log;
    if (category) filtered = filtered.filter((i) => i.category === category);
    if (callerId) filtered = filtered.filter((i) => i.caller_id === callerId);
    if (since) filtered = filtered.filter((i) => i.timestamp >= since);
    if (until) filtered = filtered.filter((i) => i.timestamp <= until);

    const sorted = [...filtered].sort((a, b) => newestFirst(a.timestamp, b.timestamp));

    return {
      items: sorted.slice(offset, offset + limit),
      matched: sorted.length,
      totalAvailable: log.length,
    };
  }

  /** Call records, most recent `end_time` first. */
  getCallLogs(limit: number = this.callLogLimit): CallRecord[] {
    return [...this.store.document.call_logs]
      .sort((a, b) => newestFirst(a.end_time, b.end_time))
      .slice(0, limit);
  }

  getSummary(): InformationSummary {
    const doc = this.store.document;
    const categoryBreakdown: Record<string, number> = {};
    for (const info of doc.information_shared) {
      categoryBreakdown[info.category] = (categoryBreakdown[info.category] ?? 0) + 1;
    }

    return {
      total_information_shared: doc.information_shared.length,
      total_sessions: Object.keys(doc.sessions).length,
      total_calls: doc.call_logs.length,
      category_breakdown: categoryBreakdown,
      last_updated: doc.metadata.last_updated,
    };
  }

  getAllSessions(): Record<string, Session> {
    return structuredClone(this.store.document.sessions);
  }

  /** Session metadata, or `{}` for an unknown id. */
  getSessionInfo(sessionId: string): Session | Record<string, never> {
    const session = this.store.document.sessions[sessionId];
    return session ? { ...session } : {};
  }

  rawDocument(): LedgerDocument {
    return this.store.snapshot();
  }
}
