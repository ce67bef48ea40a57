import {
  buildRecord,
  checkPayload,
  drop,
  nonEmpty,
  serializePayload,
  toNumber,
  type NormalizeResult,
} from "./shared.js";
import { toUtcInstant } from "./timestamps.js";
import { ExchangeTradePayloadSchema } from "../../../types/raw.js";

import type { TransactionAction } from "../../../types/canonical.js";
import type { RawExchangeTrade } from "../../../types/raw.js";

const SYMBOL_SEPARATOR = "/";

const SIDE_ACTIONS: Record<string, TransactionAction> = {
  buy: "trade-buy",
  sell: "trade-sell",
};

/**
 * Split a market symbol such as `BTC/USDT` into base and quote.
 */
export function splitSymbol(
  symbol: string
): { base: string; quote: string } | null {
  const index = symbol.indexOf(SYMBOL_SEPARATOR);
  if (index === -1) {
    return null;
  }

  const base = symbol.slice(0, index).trim();
  const quote = symbol.slice(index + 1).trim();
  if (base === "" || quote === "" || quote.includes(SYMBOL_SEPARATOR)) {
    return null;
  }
  return { base, quote };
}

export function normalizeExchangeTrade(raw: RawExchangeTrade): NormalizeResult {
  const checked = checkPayload(ExchangeTradePayloadSchema, raw.payload);
  if (!checked.valid) {
    return drop(checked.reason);
  }
  const trade = checked.value;

  const externalId = nonEmpty(String(trade.id));
  if (externalId === null) {
    return drop("missing trade id");
  }

  const action = SIDE_ACTIONS[trade.side];
  if (action === undefined) {
    return drop(`unsupported side '${trade.side}'`, externalId);
  }

  const pair = splitSymbol(trade.symbol);
  if (pair === null) {
    return drop(`unparseable symbol '${trade.symbol}'`, externalId);
  }

  const occurredAt = toUtcInstant(trade.timestamp ?? trade.datetime);
  if (occurredAt === null) {
    return drop("unparseable timestamp", externalId);
  }

  const amount = toNumber(trade.amount);
  if (amount === null) {
    return drop("invalid amount", externalId);
  }

  const feeAmount = toNumber(trade.fee?.cost);

  return {
    ok: true,
    record: buildRecord(
      {
        domain: "exchange",
        source: raw.source,
        external_id: externalId,
        log_index: 0,
        base_asset: pair.base,
        quote_asset: pair.quote,
        action,
        amount: Math.abs(amount),
        price: toNumber(trade.price),
        fee_asset: feeAmount === null ? null : nonEmpty(trade.fee?.currency),
        fee_amount: feeAmount === null ? null : Math.abs(feeAmount),
        counterparty_from: null,
        counterparty_to: null,
        chain: null,
        raw_payload: serializePayload(raw.payload),
      },
      occurredAt
    ),
  };
}
