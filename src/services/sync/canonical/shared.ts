import { Value } from "@sinclair/typebox/value";

import { partitionKeyOf, formatUtc } from "./timestamps.js";

import type { TokenLookup } from "./token-metadata.js";
import type { CanonicalTransaction } from "../../../types/canonical.js";
import type { TSchema, Static } from "@sinclair/typebox";

// ============================================================================
// Types
// ============================================================================

export type NormalizeResult =
  | { ok: true; record: CanonicalTransaction }
  | { ok: false; reason: string; externalId: string | null };

/** What a normalizer may read from the run it executes in */
export interface NormalizeContext {
  tokens: TokenLookup;
}

export type RecordFields = Omit<
  CanonicalTransaction,
  "occurred_at" | "year" | "month"
>;

// ============================================================================
// Helpers
// ============================================================================

export function drop(
  reason: string,
  externalId: string | null = null
): NormalizeResult {
  return { ok: false, reason, externalId };
}

/**
 * Validate a payload, returning the first schema violation as a reason.
 */
export function checkPayload<T extends TSchema>(
  schema: T,
  payload: unknown
): { valid: true; value: Static<T> } | { valid: false; reason: string } {
  if (Value.Check(schema, payload)) {
    return { valid: true, value: payload };
  }

  const first = Value.Errors(schema, payload).First();
  const reason =
    first === undefined
      ? "payload failed validation"
      : `invalid payload at '${first.path || "/"}': ${first.message}`;
  return { valid: false, reason };
}

/**
 * Parse a number or numeric string. Blank, null and non-finite values give null.
 */
export function toNumber(
  value: number | string | null | undefined
): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" && value.trim() === "") {
    return null;
  }
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function nonEmpty(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

/**
 * Scale an integer amount of base units by a token's decimals.
 *
 * Division happens on BigInt so large raw values keep their digits until the
 * final conversion.
 */
export function scaleUnits(rawAmount: string, decimals: number): number {
  let units = BigInt(rawAmount);
  if (units < 0n) {
    units = -units;
  }
  if (decimals <= 0) {
    return Number(units);
  }

  const divisor = 10n ** BigInt(decimals);
  const whole = units / divisor;
  const fraction = (units % divisor)
    .toString()
    .padStart(decimals, "0")
    .replace(/0+$/, "");

  return Number(
    fraction === "" ? whole.toString() : `${whole.toString()}.${fraction}`
  );
}

export function serializePayload(payload: unknown): string {
  return JSON.stringify(payload);
}

/**
 * Attach the timestamp and its derived partition keys.
 */
export function buildRecord(
  fields: RecordFields,
  occurredAt: Date
): CanonicalTransaction {
  const occurred_at = formatUtc(occurredAt);
  const { year, month } = partitionKeyOf(occurred_at);
  return { ...fields, occurred_at, year, month };
}
