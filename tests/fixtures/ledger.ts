/**
 * Raw and canonical records shared by the sync tests
 */

import type { CanonicalTransaction } from "../../src/types/canonical.js";
import type {
  RawErc20Transfer,
  RawExchangeTrade,
  RawExchangeTransfer,
  RawOnchainTransfer,
} from "../../src/types/raw.js";

export const OWNER = "0x00000000000000000000000000000000000000aa";
export const COUNTERPARTY = "0x00000000000000000000000000000000000000bb";
export const ROUTER = "0x00000000000000000000000000000000000000cc";
export const USDC_ETH = "0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48";

/** 2024-03-15T10:00:00Z */
export const MARCH_15_SECONDS = 1_710_496_800;

export function canonicalRecord(
  overrides: Partial<CanonicalTransaction> = {}
): CanonicalTransaction {
  return {
    domain: "exchange",
    source: "binance",
    occurred_at: "2024-03-15T10:00:00Z",
    external_id: "T-1",
    log_index: 0,
    base_asset: "BTC",
    quote_asset: "USDT",
    action: "trade-buy",
    amount: 0.5,
    price: 65000,
    fee_asset: "USDT",
    fee_amount: 1.5,
    counterparty_from: null,
    counterparty_to: null,
    chain: null,
    raw_payload: "{}",
    year: 2024,
    month: 3,
    ...overrides,
  };
}

export function exchangeTrade(
  payload: Record<string, unknown> = {},
  source = "binance"
): RawExchangeTrade {
  return {
    family: "exchange-trade",
    source,
    payload: {
      id: "T-1",
      timestamp: MARCH_15_SECONDS * 1000,
      symbol: "BTC/USDT",
      side: "buy",
      amount: 0.5,
      price: 65000,
      fee: { currency: "USDT", cost: 1.5 },
      ...payload,
    },
  };
}

export function exchangeTransfer(
  direction: "deposit" | "withdrawal",
  payload: Record<string, unknown> = {},
  probedCurrency?: string
): RawExchangeTransfer {
  return {
    family: "exchange-transfer",
    source: "coinbase",
    direction,
    probedCurrency,
    payload: {
      id: "D-1",
      txid: "0xfeed",
      timestamp: MARCH_15_SECONDS * 1000,
      currency: "ETH",
      amount: 2,
      address: COUNTERPARTY,
      fee: { currency: "ETH", cost: 0.001 },
      status: "ok",
      ...payload,
    },
  };
}

export function onchainItem(
  payload: Record<string, unknown> = {},
  chain = "eth"
): RawOnchainTransfer {
  return {
    family: "onchain-transfer",
    source: `debank_${chain}`,
    chain,
    owner: OWNER,
    payload: {
      id: "0xabc",
      time_at: MARCH_15_SECONDS,
      cate_id: null,
      is_scam: false,
      tx: { from_addr: OWNER, to_addr: ROUTER, eth_gas_fee: 0.002 },
      sends: [],
      receives: [],
      token_approve: null,
      ...payload,
    },
  };
}

export function erc20Log(
  payload: Record<string, unknown> = {},
  owner = OWNER
): RawErc20Transfer {
  return {
    family: "erc20-transfer",
    source: "rpc_eth",
    chain: "eth",
    owner,
    payload: {
      transactionHash: "0xFEED",
      logIndex: 7,
      blockNumber: 19_440_000,
      timestamp: MARCH_15_SECONDS,
      token: USDC_ETH,
      from: OWNER,
      to: COUNTERPARTY,
      value: "2500000",
      ...payload,
    },
  };
}
