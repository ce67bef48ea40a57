/**
 * Upsert Module - Idempotent insert/replace for canonical transactions
 *
 * Provides natural key computation and batched upserts so that repeating a
 * sync with overlapping or identical data never creates duplicate rows.
 */

import { createHash } from "node:crypto";

import { toUtcInstant, formatUtc } from "./canonical/timestamps.js";
import { STAGED_TABLES } from "../../db/types.js";
import { PersistenceError, errorMessage } from "../../errors.js";
import { dbLogger } from "../../logger.js";

import type { Database, NewTransactionRow } from "../../db/types.js";
import type {
  CanonicalTransaction,
  Domain,
  NaturalKey,
} from "../../types/canonical.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface UpsertResult {
  inserted: number;
  updated: number;
  skipped: number;
}

export interface UpsertOptions {
  chunkSize?: number;
  now?: () => Date;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_UPSERT_CHUNK_SIZE = 200;

// ============================================================================
// Natural Keys
// ============================================================================

/**
 * Compute the natural key hash of a record.
 *
 * The natural key uniquely identifies an economic event:
 * - source: Which provider or chain
 * - external_id: The provider's identifier (trade id, tx hash)
 * - log_index: Position within the transaction, 0 when not applicable
 */
export function computeNaturalKey(record: NaturalKey): string {
  const key = [
    record.source,
    record.external_id,
    String(record.log_index),
  ].join("\u0000");
  return createHash("sha256").update(key).digest("hex");
}

/**
 * Collapse records sharing a natural key; the last occurrence wins.
 */
export function dedupeByNaturalKey<T extends NaturalKey>(
  records: readonly T[]
): T[] {
  const byKey = new Map<string, T>();
  for (const record of records) {
    const key = computeNaturalKey(record);
    // Re-insert so the surviving record keeps the position of its last occurrence
    byKey.delete(key);
    byKey.set(key, record);
  }
  return [...byKey.values()];
}

/**
 * Check the invariants a stored record must satisfy.
 *
 * Returns a reason when the record is invalid, null otherwise.
 */
export function findRecordProblem(
  record: CanonicalTransaction
): string | null {
  if (record.source.trim() === "") {
    return "empty source";
  }
  if (record.external_id.trim() === "") {
    return "empty external id";
  }
  if (!Number.isInteger(record.log_index) || record.log_index < 0) {
    return `invalid log index ${String(record.log_index)}`;
  }
  if (!Number.isFinite(record.amount) || record.amount < 0) {
    return `invalid amount ${String(record.amount)}`;
  }

  const instant = toUtcInstant(record.occurred_at);
  if (instant === null || formatUtc(instant) !== record.occurred_at) {
    return `invalid timestamp '${record.occurred_at}'`;
  }
  if (
    instant.getUTCFullYear() !== record.year ||
    instant.getUTCMonth() + 1 !== record.month
  ) {
    return "partition keys do not match timestamp";
  }
  return null;
}

function toRow(
  record: CanonicalTransaction,
  ingestedAt: string
): NewTransactionRow {
  return {
    domain: record.domain,
    source: record.source,
    occurred_at: record.occurred_at,
    external_id: record.external_id,
    log_index: record.log_index,
    base_asset: record.base_asset,
    quote_asset: record.quote_asset,
    action: record.action,
    amount: record.amount,
    price: record.price,
    fee_asset: record.fee_asset,
    fee_amount: record.fee_amount,
    counterparty_from: record.counterparty_from,
    counterparty_to: record.counterparty_to,
    chain: record.chain,
    raw_payload: record.raw_payload,
    year: record.year,
    month: record.month,
    ingested_at: ingestedAt,
  };
}

// ============================================================================
// Upsert Operations
// ============================================================================

/**
 * Insert new records and replace the ones whose natural key already exists.
 *
 * Invalid records are logged and skipped. The whole batch runs in one
 * transaction, written in chunks of `chunkSize` rows.
 */
export async function upsertTransactions(
  db: Kysely<Database>,
  domain: Domain,
  records: readonly CanonicalTransaction[],
  options: UpsertOptions = {}
): Promise<UpsertResult> {
  const chunkSize = Math.max(
    1,
    options.chunkSize ?? DEFAULT_UPSERT_CHUNK_SIZE
  );
  const table = STAGED_TABLES[domain];
  const result: UpsertResult = { inserted: 0, updated: 0, skipped: 0 };

  const valid: CanonicalTransaction[] = [];
  for (const record of records) {
    const problem =
      record.domain === domain
        ? findRecordProblem(record)
        : `domain '${record.domain}' does not belong in ${table}`;
    if (problem !== null) {
      result.skipped++;
      dbLogger.warn(
        {
          source: record.source,
          externalId: record.external_id,
          reason: problem,
        },
        "Skipping invalid record"
      );
      continue;
    }
    valid.push(record);
  }

  const unique = dedupeByNaturalKey(valid);
  const ingestedAt = formatUtc((options.now ?? (() => new Date()))());

  try {
    await db.transaction().execute(async (trx) => {
      for (let i = 0; i < unique.length; i += chunkSize) {
        const chunk = unique.slice(i, i + chunkSize);

        const existing = await trx
          .selectFrom(table)
          .select(["source", "external_id", "log_index"])
          .where("source", "in", [
            ...new Set(chunk.map((record) => record.source)),
          ])
          .where("external_id", "in", [
            ...new Set(chunk.map((record) => record.external_id)),
          ])
          .execute();
        const existingKeys = new Set(existing.map(computeNaturalKey));

        await trx
          .insertInto(table)
          .values(chunk.map((record) => toRow(record, ingestedAt)))
          .onConflict((oc) =>
            oc
              .columns(["source", "external_id", "log_index"])
              .doUpdateSet((eb) => ({
                domain: eb.ref("excluded.domain"),
                occurred_at: eb.ref("excluded.occurred_at"),
                base_asset: eb.ref("excluded.base_asset"),
                quote_asset: eb.ref("excluded.quote_asset"),
                action: eb.ref("excluded.action"),
                amount: eb.ref("excluded.amount"),
                price: eb.ref("excluded.price"),
                fee_asset: eb.ref("excluded.fee_asset"),
                fee_amount: eb.ref("excluded.fee_amount"),
                counterparty_from: eb.ref("excluded.counterparty_from"),
                counterparty_to: eb.ref("excluded.counterparty_to"),
                chain: eb.ref("excluded.chain"),
                raw_payload: eb.ref("excluded.raw_payload"),
                year: eb.ref("excluded.year"),
                month: eb.ref("excluded.month"),
              }))
          )
          .execute();

        for (const record of chunk) {
          if (existingKeys.has(computeNaturalKey(record))) {
            result.updated++;
          } else {
            result.inserted++;
          }
        }
      }
    });
  } catch (error) {
    throw new PersistenceError(
      `Upsert into ${table} failed: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  dbLogger.debug({ table, ...result }, "Upserted transactions");
  return result;
}
