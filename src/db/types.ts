import type {
  Domain,
  TransactionAction,
} from "../types/canonical.js";
import type { Generated, Insertable, Selectable } from "kysely";

// ============================================================================
// Enum Types
// ============================================================================

export type RunStatus = "success" | "failed";

export type SqlDialect = "sqlite" | "postgres";

// ============================================================================
// Table Definitions
// ============================================================================

/**
 * Column set shared by both staged tables and the unified table.
 *
 * Timestamps are stored as ISO-8601 text in both dialects so the values
 * round-trip identically through SQLite and PostgreSQL.
 */
export interface TransactionTable {
  id: Generated<number>;
  domain: Domain;
  source: string;
  occurred_at: string;
  external_id: string;
  log_index: number;
  base_asset: string;
  quote_asset: string;
  action: TransactionAction;
  amount: number;
  price: number | null;
  fee_asset: string | null;
  fee_amount: number | null;
  counterparty_from: string | null;
  counterparty_to: string | null;
  chain: string | null;
  raw_payload: string;
  year: number;
  month: number;
  ingested_at: string;
}

export interface SyncWatermarkTable {
  source: string;
  domain: Domain;
  /** Null until the source has completed one successful run */
  last_sync_at: string | null;
  last_run_record_count: number;
  last_run_status: RunStatus;
  last_error: string | null;
  updated_at: string;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  exchange_transactions: TransactionTable;
  onchain_transactions: TransactionTable;
  transactions_unified: TransactionTable;
  sync_watermarks: SyncWatermarkTable;
}

export type StagedTableName = "exchange_transactions" | "onchain_transactions";

export const STAGED_TABLES: Record<Domain, StagedTableName> = {
  exchange: "exchange_transactions",
  onchain: "onchain_transactions",
};

// ============================================================================
// Helper Types
// ============================================================================

export type TransactionRow = Selectable<TransactionTable>;
export type NewTransactionRow = Insertable<TransactionTable>;

export type SyncWatermark = Selectable<SyncWatermarkTable>;
