/**
 * Canonical ledger types shared by normalizers, partitions and the store.
 *
 * Field names follow the table columns so a canonical record can be written
 * as-is.
 */

export const DOMAINS = ["exchange", "onchain"] as const;
export type Domain = (typeof DOMAINS)[number];

export const TRANSACTION_ACTIONS = [
  "trade-buy",
  "trade-sell",
  "deposit",
  "withdrawal",
  "send",
  "receive",
  "approve",
  "swap",
  "unknown",
] as const;
export type TransactionAction = (typeof TRANSACTION_ACTIONS)[number];

export const ENTITY_KINDS = [
  "trades",
  "deposits",
  "withdrawals",
  "transfers",
] as const;
export type EntityKind = (typeof ENTITY_KINDS)[number];

export interface CanonicalTransaction {
  domain: Domain;
  source: string;
  /** UTC, `YYYY-MM-DDTHH:MM:SSZ` */
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
}

export type NaturalKey = Pick<
  CanonicalTransaction,
  "source" | "external_id" | "log_index"
>;

/**
 * A unit of ingestion. Domain, source and entity travel with the records
 * instead of being inferred from where they end up on disk.
 */
export interface IngestBatch {
  domain: Domain;
  source: string;
  entity: EntityKind;
  records: CanonicalTransaction[];
}

export function isDomain(value: string): value is Domain {
  return DOMAINS.some((domain) => domain === value);
}

export function isTransactionAction(value: string): value is TransactionAction {
  return TRANSACTION_ACTIONS.some((action) => action === value);
}
