/**
 * Raw source record variants.
 *
 * Fetch clients hand records over untouched as `payload: unknown`, tagged with
 * the family they belong to. Each normalizer validates its payload against
 * the matching schema below before mapping it.
 */

import { Type, type Static } from "@sinclair/typebox";

// ============================================================================
// Shared field schemas
// ============================================================================

/** Exchanges return numbers, some return numeric strings */
const NumberLike = Type.Union([Type.Number(), Type.String()]);
const OptionalNumberLike = Type.Optional(Type.Union([NumberLike, Type.Null()]));
const OptionalString = Type.Optional(Type.Union([Type.String(), Type.Null()]));
const Identifier = Type.Union([Type.String(), Type.Number()]);

export const FeeSchema = Type.Object({
  currency: OptionalString,
  cost: OptionalNumberLike,
});

// ============================================================================
// Exchange trades (ccxt `Trade`)
// ============================================================================

export const ExchangeTradePayloadSchema = Type.Object({
  id: Identifier,
  timestamp: OptionalNumberLike,
  datetime: OptionalString,
  symbol: Type.String(),
  side: Type.String(),
  amount: NumberLike,
  price: OptionalNumberLike,
  fee: Type.Optional(Type.Union([FeeSchema, Type.Null()])),
  order: OptionalString,
});

export type ExchangeTradePayload = Static<typeof ExchangeTradePayloadSchema>;

// ============================================================================
// Exchange deposits / withdrawals (ccxt `Transaction`)
// ============================================================================

export const ExchangeTransferPayloadSchema = Type.Object({
  id: Type.Optional(Type.Union([Identifier, Type.Null()])),
  txid: OptionalString,
  timestamp: OptionalNumberLike,
  datetime: OptionalString,
  currency: OptionalString,
  amount: NumberLike,
  fee: Type.Optional(Type.Union([FeeSchema, Type.Null()])),
  address: OptionalString,
  addressFrom: OptionalString,
  addressTo: OptionalString,
  status: OptionalString,
});

export type ExchangeTransferPayload = Static<
  typeof ExchangeTransferPayloadSchema
>;

// ============================================================================
// On-chain history items (DeBank `history_list` entries)
// ============================================================================

export const OnchainLegSchema = Type.Object({
  token_id: Type.String({ minLength: 1 }),
  /** Decimal-scaled quantity */
  amount: Type.Optional(Type.Number()),
  /** Integer base units, scaled by the token's decimals when `amount` is absent */
  raw_amount: Type.Optional(Type.String({ pattern: "^-?[0-9]+$" })),
  from_addr: OptionalString,
  to_addr: OptionalString,
});

export type OnchainLeg = Static<typeof OnchainLegSchema>;

export const TokenApproveSchema = Type.Object({
  spender: Type.String(),
  token_id: Type.String({ minLength: 1 }),
  value: Type.Number(),
});

export const OnchainTxSchema = Type.Object({
  from_addr: OptionalString,
  to_addr: OptionalString,
  name: OptionalString,
  eth_gas_fee: OptionalNumberLike,
  status: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
});

export const OnchainTransferPayloadSchema = Type.Object({
  id: Type.String(),
  time_at: NumberLike,
  chain: OptionalString,
  cate_id: OptionalString,
  is_scam: Type.Optional(Type.Boolean()),
  log_index: Type.Optional(Type.Integer({ minimum: 0 })),
  tx: Type.Optional(Type.Union([OnchainTxSchema, Type.Null()])),
  sends: Type.Optional(Type.Array(OnchainLegSchema)),
  receives: Type.Optional(Type.Array(OnchainLegSchema)),
  token_approve: Type.Optional(Type.Union([TokenApproveSchema, Type.Null()])),
});

export type OnchainTransferPayload = Static<
  typeof OnchainTransferPayloadSchema
>;

// ============================================================================
// ERC-20 `Transfer` logs read from a JSON-RPC node
// ============================================================================

const Address = Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" });

export const Erc20TransferPayloadSchema = Type.Object({
  transactionHash: Type.String({ minLength: 1 }),
  logIndex: Type.Integer({ minimum: 0 }),
  blockNumber: Type.Integer({ minimum: 0 }),
  /** Block time, unix seconds */
  timestamp: Type.Integer({ minimum: 0 }),
  token: Address,
  from: Address,
  to: Address,
  /** Integer base units */
  value: Type.String({ pattern: "^[0-9]+$" }),
  topics: Type.Optional(Type.Array(Type.String())),
  data: Type.Optional(Type.String()),
});

export type Erc20TransferPayload = Static<typeof Erc20TransferPayloadSchema>;

// ============================================================================
// Tagged variants
// ============================================================================

export type TransferDirection = "deposit" | "withdrawal";

interface RawRecordBase {
  /** Provider identifier the record is stored under, e.g. `binance`, `debank_eth` */
  source: string;
  payload: unknown;
}

export interface RawExchangeTrade extends RawRecordBase {
  family: "exchange-trade";
}

export interface RawExchangeTransfer extends RawRecordBase {
  family: "exchange-transfer";
  direction: TransferDirection;
  /** Currency the record was probed with, for providers needing one per query */
  probedCurrency?: string;
}

export interface RawOnchainTransfer extends RawRecordBase {
  family: "onchain-transfer";
  chain: string;
  /** Owned address the history was fetched for */
  owner: string;
}

export interface RawErc20Transfer extends RawRecordBase {
  family: "erc20-transfer";
  chain: string;
  /** Owned address the logs were queried for */
  owner: string;
}

export type RawSourceRecord =
  | RawExchangeTrade
  | RawExchangeTransfer
  | RawOnchainTransfer
  | RawErc20Transfer;
