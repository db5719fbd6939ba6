/**
 * Persisted document shape.
 *
 * The JSON file uses snake_case keys; the same names flow out through
 * dispatcher envelopes, so the types keep them as-is.
 */

import { z } from "zod";

export const SCHEMA_VERSION = "1.0";

// ── Records ─────────────────────────────────────────────────────────

export type SessionStatus = "active" | "ended";

export interface Session {
  id: string;
  caller_id: string;
  created_at: string;
  last_activity: string;
  /** Number of information records attributed to this session. */
  information_count: number;
  status: SessionStatus;
  end_time?: string;
  end_reason?: string;
}

export interface InformationRecord {
  readonly id: string;
  readonly session_id: string;
  readonly caller_id: string;
  readonly information: string;
  /** Free-form tag, e.g. "qualification". */
  readonly category: string;
  readonly timestamp: string;
  readonly status: "received";
}

export interface CallRecord {
  readonly id: string;
  readonly session_id: string;
  readonly caller_id: string;
  readonly end_time: string;
  readonly reason: string;
  /** Seconds. */
  readonly duration: number;
  /** Snapshot taken when the call ended; never recomputed. */
  readonly information_shared_count: number;
}

export interface DocumentMetadata {
  created_at: string;
  version: string;
  last_updated: string | null;
}

export interface LedgerDocument {
  sessions: Record<string, Session>;
  information_shared: InformationRecord[];
  call_logs: CallRecord[];
  /** session id → ISO timestamp the session became active. */
  active_sessions: Record<string, string>;
  metadata: DocumentMetadata;
}

// ── Parsing ─────────────────────────────────────────────────────────

const SessionSchema = z.object({
  id: z.string(),
  caller_id: z.string(),
  created_at: z.string(),
  last_activity: z.string(),
  information_count: z.number().int().nonnegative(),
  status: z.enum(["active", "ended"]),
  end_time: z.string().optional(),
  end_reason: z.string().optional(),
});

const InformationRecordSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  caller_id: z.string(),
  information: z.string(),
  category: z.string(),
  timestamp: z.string(),
  status: z.literal("received"),
});

const CallRecordSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  caller_id: z.string(),
  end_time: z.string(),
  reason: z.string(),
  duration: z.number().int().nonnegative(),
  information_shared_count: z.number().int().nonnegative(),
});

/**
 * Schema for a document read from disk. Missing collections come back
 * empty; missing metadata is stamped with `createdAt`.
 */
export function ledgerDocumentSchema(
  createdAt: string,
): z.ZodType<LedgerDocument, z.ZodTypeDef, unknown> {
  return z.object({
    sessions: z.record(SessionSchema).default({}),
    information_shared: z.array(InformationRecordSchema).default([]),
    call_logs: z.array(CallRecordSchema).default([]),
    active_sessions: z.record(z.string()).default({}),
    metadata: z
      .object({
        created_at: z.string(),
        version: z.string().default(SCHEMA_VERSION),
        last_updated: z.string().nullable().default(null),
      })
      .default({ created_at: createdAt }),
  });
}

/** A document with empty collections. */
export function emptyDocument(createdAt: string): LedgerDocument {
  return {
    sessions: {},
    information_shared: [],
    call_logs: [],
    active_sessions: {},
    metadata: {
      created_at: createdAt,
      version: SCHEMA_VERSION,
      last_updated: null,
    },
  };
}
