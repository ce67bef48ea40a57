/**
 * Unification View - one table over every domain
 *
 * `transactions_unified` is a derived table: each rebuild empties it and
 * copies both staged tables into it, with no business logic of its own.
 * Queries, summaries and data-quality checks read from here.
 */

import { PersistenceError, errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import {
  createPaginationMeta,
  validateCursor,
  type PaginatedResult,
  type PaginationOptions,
} from "../../utils/pagination.js";

import type { Database, TransactionRow } from "../../db/types.js";
import type { Domain } from "../../types/canonical.js";
import type { Kysely, SelectQueryBuilder } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface UnifiedFilters {
  domain?: Domain;
  source?: string;
  chain?: string;
  year?: number;
  month?: number;
}

export const SUMMARY_DIMENSIONS = [
  "domain",
  "source",
  "chain",
  "year",
  "month",
] as const;
export type SummaryDimension = (typeof SUMMARY_DIMENSIONS)[number];

export interface SummaryRow {
  group: Partial<Record<SummaryDimension, string | number | null>>;
  count: number;
  totalAmount: number;
}

export interface RebuildSummary {
  exchange: number;
  onchain: number;
  total: number;
}

export interface TableQuality {
  table: string;
  totalRows: number;
  distinctKeys: number;
  duplicateKeys: number;
  /** Empty `occurred_at`; the column itself is NOT NULL */
  missingTimestamps: number;
  nonPositiveAmounts: number;
}

// ============================================================================
// Helpers
// ============================================================================

const COPIED_COLUMNS = [
  "domain",
  "source",
  "occurred_at",
  "external_id",
  "log_index",
  "base_asset",
  "quote_asset",
  "action",
  "amount",
  "price",
  "fee_asset",
  "fee_amount",
  "counterparty_from",
  "counterparty_to",
  "chain",
  "raw_payload",
  "year",
  "month",
  "ingested_at",
] as const;

const QUALITY_TABLES = [
  "exchange_transactions",
  "onchain_transactions",
  "transactions_unified",
] as const;

export function isSummaryDimension(value: string): value is SummaryDimension {
  return SUMMARY_DIMENSIONS.some((dimension) => dimension === value);
}

function applyFilters<O>(
  query: SelectQueryBuilder<Database, "transactions_unified", O>,
  filters: UnifiedFilters
): SelectQueryBuilder<Database, "transactions_unified", O> {
  let filtered = query;
  if (filters.domain !== undefined) {
    filtered = filtered.where("domain", "=", filters.domain);
  }
  if (filters.source !== undefined) {
    filtered = filtered.where("source", "=", filters.source);
  }
  if (filters.chain !== undefined) {
    filtered = filtered.where("chain", "=", filters.chain);
  }
  if (filters.year !== undefined) {
    filtered = filtered.where("year", "=", filters.year);
  }
  if (filters.month !== undefined) {
    filtered = filtered.where("month", "=", filters.month);
  }
  return filtered;
}

// ============================================================================
// Rebuild
// ============================================================================

/**
 * Empty and refill `transactions_unified` from both staged tables in one
 * transaction.
 */
export async function rebuildUnifiedView(
  db: Kysely<Database>
): Promise<RebuildSummary> {
  try {
    const summary = await db.transaction().execute(async (trx) => {
      await trx.deleteFrom("transactions_unified").execute();

      await trx
        .insertInto("transactions_unified")
        .columns(COPIED_COLUMNS)
        .expression(
          trx
            .selectFrom("exchange_transactions")
            .select(COPIED_COLUMNS)
            .unionAll(
              trx.selectFrom("onchain_transactions").select(COPIED_COLUMNS)
            )
        )
        .execute();

      const counts = await trx
        .selectFrom("transactions_unified")
        .select(["domain", (eb) => eb.fn.countAll().as("count")])
        .groupBy("domain")
        .execute();

      const byDomain = new Map(
        counts.map((row) => [row.domain, Number(row.count)])
      );
      const exchange = byDomain.get("exchange") ?? 0;
      const onchain = byDomain.get("onchain") ?? 0;
      return { exchange, onchain, total: exchange + onchain };
    });

    syncLogger.info(summary, "Rebuilt unified transactions");
    return summary;
  } catch (error) {
    throw new PersistenceError(
      `Unified view rebuild failed: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Filtered, cursor-paginated read ordered by `occurred_at`, then `id`.
 */
export async function queryUnified(
  db: Kysely<Database>,
  filters: UnifiedFilters,
  page: PaginationOptions
): Promise<PaginatedResult<TransactionRow>> {
  let query = applyFilters(
    db.selectFrom("transactions_unified").selectAll(),
    filters
  );

  const cursor = validateCursor(page.cursor);
  if (cursor !== null) {
    const sortValue = String(cursor.sortValue);
    query = query.where((eb) =>
      eb.or([
        eb("occurred_at", ">", sortValue),
        eb.and([
          eb("occurred_at", "=", sortValue),
          eb("id", ">", cursor.id),
        ]),
      ])
    );
  }

  const rows = await query
    .orderBy("occurred_at")
    .orderBy("id")
    .limit(page.limit + 1)
    .execute();

  const totalRow = await applyFilters(
    db
      .selectFrom("transactions_unified")
      .select((eb) => eb.fn.countAll().as("count")),
    filters
  ).executeTakeFirst();

  const hasMore = rows.length > page.limit;
  const items = hasMore ? rows.slice(0, page.limit) : rows;

  return {
    items,
    pagination: createPaginationMeta(
      items,
      page.limit,
      (item) => item.occurred_at,
      hasMore,
      Number(totalRow?.count ?? 0)
    ),
  };
}

/**
 * Count and total amount grouped by any subset of the summary dimensions.
 */
export async function summarizeUnified(
  db: Kysely<Database>,
  groupBy: readonly SummaryDimension[],
  filters: UnifiedFilters = {}
): Promise<SummaryRow[]> {
  const dimensions = [...new Set(groupBy)];

  let query = applyFilters(
    db
      .selectFrom("transactions_unified")
      .select((eb) => [
        eb.fn.countAll().as("count"),
        eb.fn.sum<number | string | null>("amount").as("total_amount"),
      ]),
    filters
  );

  if (dimensions.length > 0) {
    query = query.groupBy(dimensions);
    for (const dimension of dimensions) {
      query = query.orderBy(dimension);
    }
  }

  const rows = await query.select(dimensions).execute();

  return rows.map((row) => {
    const group: SummaryRow["group"] = {};
    for (const dimension of dimensions) {
      group[dimension] = row[dimension];
    }
    return {
      group,
      count: Number(row.count),
      totalAmount: Number(row.total_amount ?? 0),
    };
  });
}

// ============================================================================
// Data Quality
// ============================================================================

async function checkTable(
  db: Kysely<Database>,
  table: (typeof QUALITY_TABLES)[number]
): Promise<TableQuality> {
  const totals = await db
    .selectFrom(table)
    .select((eb) => [
      eb.fn.countAll().as("total_rows"),
      eb.fn
        .count("id")
        .filterWhere("occurred_at", "=", "")
        .as("missing_timestamps"),
      eb.fn
        .count("id")
        .filterWhere("amount", "<=", 0)
        .as("non_positive_amounts"),
    ])
    .executeTakeFirst();

  const distinct = await db
    .selectFrom(
      db
        .selectFrom(table)
        .select(["source", "external_id", "log_index"])
        .distinct()
        .as("keys")
    )
    .select((eb) => eb.fn.countAll().as("count"))
    .executeTakeFirst();

  const totalRows = Number(totals?.total_rows ?? 0);
  const distinctKeys = Number(distinct?.count ?? 0);

  return {
    table,
    totalRows,
    distinctKeys,
    duplicateKeys: totalRows - distinctKeys,
    missingTimestamps: Number(totals?.missing_timestamps ?? 0),
    nonPositiveAmounts: Number(totals?.non_positive_amounts ?? 0),
  };
}

/**
 * Row, key and value sanity counts for every ledger table.
 */
export async function checkDataQuality(
  db: Kysely<Database>
): Promise<TableQuality[]> {
  const results: TableQuality[] = [];
  for (const table of QUALITY_TABLES) {
    results.push(await checkTable(db, table));
  }
  return results;
}
