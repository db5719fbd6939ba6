/**
 * Zod schema for the calldesk config file (~/.calldesk/calldesk.json).
 *
 * Uses `.strict()` on objects to reject unknown keys early. Every section
 * is optional: an empty `{}` is a valid config.
 */

import { z } from "zod";

// ── Store ───────────────────────────────────────────────────────────

export const StoreSchema = z
  .object({
    /** Backing JSON file. Default: ~/.calldesk/data/shared_information.json */
    filePath: z.string().min(1).optional(),
  })
  .strict();

export type StoreConfig = z.infer<typeof StoreSchema>;

// ── Query ───────────────────────────────────────────────────────────

export const QuerySchema = z
  .object({
    /** Page size for `get_shared_information` when no limit is given. Default: 10. */
    defaultLimit: z.number().int().nonnegative().optional(),
    /** Page size for call-log listings. Default: 50. */
    callLogLimit: z.number().int().nonnegative().optional(),
  })
  .strict();

export type QueryConfig = z.infer<typeof QuerySchema>;

// ── Logging ─────────────────────────────────────────────────────────

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LoggingSchema = z
  .object({
    /** Log level. Default: "info". */
    level: LogLevelSchema.optional(),
  })
  .strict();

export type LoggingConfig = z.infer<typeof LoggingSchema>;

// ── Root config ─────────────────────────────────────────────────────

export const CalldeskConfigSchema = z
  .object({
    store: StoreSchema.optional(),
    query: QuerySchema.optional(),
    logging: LoggingSchema.optional(),
  })
  .strict();

export type CalldeskConfig = z.infer<typeof CalldeskConfigSchema>;
