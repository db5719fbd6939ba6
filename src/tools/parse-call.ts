/**
 * Turn a function name plus an untyped parameter bag into a typed
 * `FunctionCall`, applying schema defaults and validating field types.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import {
  EndCallParams,
  GetSharedInformationParams,
  ShareInformationParams,
  type EndCallArgs,
  type GetSharedInformationArgs,
  type ShareInformationArgs,
} from "./function-tools.js";

// ── Types ───────────────────────────────────────────────────────────

export type FunctionCall =
  | { name: "share_information"; params: ShareInformationArgs }
  | { name: "end_call"; params: EndCallArgs }
  | { name: "get_shared_information"; params: GetSharedInformationArgs };

export type ParseCallResult =
  | { ok: true; call: FunctionCall }
  | { ok: false; error: string };

type Validated<T extends TSchema> =
  | { ok: true; value: Static<T> }
  | { ok: false; error: string };

// ── Helpers ─────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Drop `null` / `undefined` entries so they fall back to defaults. */
export function normalizeParameters(raw: unknown): Record<string, unknown> | null {
  if (raw === undefined || raw === null) return {};
  if (!isPlainObject(raw)) return null;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined && value !== null) out[key] = value;
  }
  return out;
}

function validate<T extends TSchema>(
  schema: T,
  params: Record<string, unknown>,
): Validated<T> {
  const value = Value.Default(schema, Value.Clone(params));
  if (Value.Check(schema, value)) return { ok: true, value };

  const details = [...Value.Errors(schema, value)].map(
    (e) => `${e.path || "/"}: ${e.message}`,
  );
  return { ok: false, error: `Invalid parameters: ${details.join("; ")}` };
}

// ── Parser ──────────────────────────────────────────────────────────

/**
 * Parse a raw call. Unknown names, non-object parameter bags, missing
 * or blank `information`, and wrongly-typed fields come back as
 * `{ ok: false, error }`.
 */
export function parseFunctionCall(name: string, raw: unknown): ParseCallResult {
  const params = normalizeParameters(raw);

  switch (name) {
    case "share_information": {
      if (!params) return { ok: false, error: "Parameters must be an object" };
      const info = params.information;
      if (info === undefined || (typeof info === "string" && !info.trim())) {
        return { ok: false, error: "No information provided" };
      }
      const v = validate(ShareInformationParams, params);
      return v.ok ? { ok: true, call: { name, params: v.value } } : v;
    }
    case "end_call": {
      if (!params) return { ok: false, error: "Parameters must be an object" };
      const v = validate(EndCallParams, params);
      return v.ok ? { ok: true, call: { name, params: v.value } } : v;
    }
    case "get_shared_information": {
      if (!params) return { ok: false, error: "Parameters must be an object" };
      const v = validate(GetSharedInformationParams, params);
      return v.ok ? { ok: true, call: { name, params: v.value } } : v;
    }
    default:
      return { ok: false, error: `Unknown function: ${name}` };
  }
}
