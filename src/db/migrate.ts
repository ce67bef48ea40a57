import { sql, type Kysely } from "kysely";

import { dbLogger } from "../logger.js";

import type { Database, SqlDialect } from "./types.js";

const TRANSACTION_TABLES = [
  "exchange_transactions",
  "onchain_transactions",
  "transactions_unified",
] as const;

export const LEDGER_TABLES = [...TRANSACTION_TABLES, "sync_watermarks"] as const;
export type LedgerTable = (typeof LEDGER_TABLES)[number];

// ============================================================================
// Table Builders
// ============================================================================

async function createTransactionTable(
  db: Kysely<Database>,
  dialect: SqlDialect,
  table: (typeof TRANSACTION_TABLES)[number],
  withNaturalKey: boolean
): Promise<void> {
  let builder = db.schema
    .createTable(table)
    .ifNotExists()
    .addColumn("id", dialect === "postgres" ? "serial" : "integer", (col) =>
      dialect === "postgres"
        ? col.primaryKey()
        : col.primaryKey().autoIncrement()
    )
    .addColumn("domain", "varchar(16)", (col) => col.notNull())
    .addColumn("source", "varchar(64)", (col) => col.notNull())
    .addColumn("occurred_at", "varchar(32)", (col) => col.notNull())
    .addColumn("external_id", "varchar(255)", (col) => col.notNull())
    .addColumn("log_index", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("base_asset", "varchar(64)", (col) => col.notNull())
    .addColumn("quote_asset", "varchar(64)", (col) =>
      col.notNull().defaultTo("")
    )
    .addColumn("action", "varchar(16)", (col) => col.notNull())
    .addColumn("amount", "double precision", (col) => col.notNull())
    .addColumn("price", "double precision")
    .addColumn("fee_asset", "varchar(64)")
    .addColumn("fee_amount", "double precision")
    .addColumn("counterparty_from", "varchar(255)")
    .addColumn("counterparty_to", "varchar(255)")
    .addColumn("chain", "varchar(32)")
    .addColumn("raw_payload", "text", (col) => col.notNull())
    .addColumn("year", "integer", (col) => col.notNull())
    .addColumn("month", "integer", (col) => col.notNull())
    .addColumn("ingested_at", "varchar(32)", (col) => col.notNull());

  if (withNaturalKey) {
    builder = builder.addUniqueConstraint(`${table}_natural_key`, [
      "source",
      "external_id",
      "log_index",
    ]);
  }

  await builder.execute();

  await db.schema
    .createIndex(`${table}_occurred_at_idx`)
    .ifNotExists()
    .on(table)
    .columns(["occurred_at", "id"])
    .execute();

  await db.schema
    .createIndex(`${table}_period_idx`)
    .ifNotExists()
    .on(table)
    .columns(["year", "month"])
    .execute();
}

async function createWatermarkTable(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createTable("sync_watermarks")
    .ifNotExists()
    .addColumn("source", "varchar(64)", (col) => col.primaryKey())
    .addColumn("domain", "varchar(16)", (col) => col.notNull())
    .addColumn("last_sync_at", "varchar(32)")
    .addColumn("last_run_record_count", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("last_run_status", "varchar(16)", (col) => col.notNull())
    .addColumn("last_error", "text")
    .addColumn("updated_at", "varchar(32)", (col) => col.notNull())
    .execute();
}

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create the ledger schema. Safe to run repeatedly.
 */
export async function runMigration(
  db: Kysely<Database>,
  dialect: SqlDialect,
  options?: { fresh?: boolean }
): Promise<void> {
  if (options?.fresh === true) {
    dbLogger.info("Dropping existing tables (--fresh mode)...");
    for (const table of LEDGER_TABLES) {
      await db.schema.dropTable(table).ifExists().execute();
    }
  }

  dbLogger.info({ dialect }, "Running schema migration...");

  await createTransactionTable(db, dialect, "exchange_transactions", true);
  await createTransactionTable(db, dialect, "onchain_transactions", true);
  // Derived table: a plain copy of the staged rows, no uniqueness of its own
  await createTransactionTable(db, dialect, "transactions_unified", false);
  await createWatermarkTable(db);

  dbLogger.info("Schema migration completed successfully");
}

/**
 * Row count per ledger table; null when the table does not exist yet.
 */
export async function getTableCounts(
  db: Kysely<Database>
): Promise<Record<LedgerTable, number | null>> {
  const counts: Record<LedgerTable, number | null> = {
    exchange_transactions: null,
    onchain_transactions: null,
    transactions_unified: null,
    sync_watermarks: null,
  };

  const existing = new Set(
    (await db.introspection.getTables()).map((table) => table.name)
  );

  for (const table of LEDGER_TABLES) {
    if (!existing.has(table)) {
      continue;
    }
    const result = await sql<{ count: number | string }>`
      SELECT COUNT(*) AS count FROM ${sql.table(table)}
    `.execute(db);
    counts[table] = Number(result.rows[0]?.count ?? 0);
  }

  return counts;
}
