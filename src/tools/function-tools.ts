/**
 * Function tools — the three calls a voice agent may make, published
 * with TypeBox parameter schemas.
 *
 * The schemas serve twice: they are the JSON Schema handed to an LLM
 * function-calling API, and the dispatcher validates incoming parameter
 * bags against them.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

// ── Parameter schemas ───────────────────────────────────────────────

export const ShareInformationParams = Type.Object({
  information: Type.String({
    description:
      "The fact the caller shared, in one or two sentences. Must not be empty.",
  }),
  category: Type.String({
    description:
      'Free-form tag for the fact, e.g. "qualification", "contact", "scheduling".',
    default: "general",
  }),
  caller_id: Type.String({
    description: "Identifier of the caller (phone number or CRM id).",
    default: "unknown",
  }),
});

export type ShareInformationArgs = Static<typeof ShareInformationParams>;

export const EndCallParams = Type.Object({
  reason: Type.String({
    description: 'Why the call is ending, e.g. "not_qualified", "customer_satisfied".',
    default: "user_requested",
  }),
  caller_id: Type.String({
    description: "Identifier of the caller.",
    default: "unknown",
  }),
  duration: Type.Integer({
    description: "Call duration in seconds.",
    minimum: 0,
    default: 0,
  }),
});

export type EndCallArgs = Static<typeof EndCallParams>;

export const GetSharedInformationParams = Type.Object({
  category: Type.Optional(
    Type.String({ description: "Only return facts with exactly this category." }),
  ),
  caller_id: Type.Optional(
    Type.String({ description: "Only return facts from this caller." }),
  ),
  limit: Type.Optional(
    Type.Integer({ description: "Maximum number of facts to return.", minimum: 0 }),
  ),
  offset: Type.Optional(
    Type.Integer({ description: "Number of matching facts to skip.", minimum: 0 }),
  ),
  since: Type.Optional(
    Type.String({ description: "ISO-8601 timestamp; only facts at or after it." }),
  ),
  until: Type.Optional(
    Type.String({ description: "ISO-8601 timestamp; only facts at or before it." }),
  ),
});

export type GetSharedInformationArgs = Static<typeof GetSharedInformationParams>;

// ── Tool definitions ────────────────────────────────────────────────

export type FunctionName = "share_information" | "end_call" | "get_shared_information";

export interface FunctionTool<TParams extends TSchema = TSchema> {
  name: string;
  description: string;
  parameters: TParams;
}

export const shareInformationTool = {
  name: "share_information",
  description:
    "Record a piece of information the caller shared. Call this every time the caller provides new details.",
  parameters: ShareInformationParams,
} satisfies FunctionTool;

export const endCallTool = {
  name: "end_call",
  description: "End the current call and log why it ended.",
  parameters: EndCallParams,
} satisfies FunctionTool;

export const getSharedInformationTool = {
  name: "get_shared_information",
  description:
    "Look up information recorded so far, newest first, optionally filtered by category or caller.",
  parameters: GetSharedInformationParams,
} satisfies FunctionTool;

export const FUNCTION_TOOLS: readonly FunctionTool[] = [
  shareInformationTool,
  endCallTool,
  getSharedInformationTool,
];

/**
 * Find a tool by name. Returns `undefined` if not found.
 */
export function findTool(name: string): FunctionTool | undefined {
  return FUNCTION_TOOLS.find((t) => t.name === name);
}

/**
 * Tool names, in declaration order.
 */
export function getToolNames(): string[] {
  return FUNCTION_TOOLS.map((t) => t.name);
}
