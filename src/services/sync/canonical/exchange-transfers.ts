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
import { ExchangeTransferPayloadSchema } from "../../../types/raw.js";

import type { RawExchangeTransfer } from "../../../types/raw.js";

/**
 * Map a deposit or withdrawal. The direction comes from the query that
 * produced the record, not from the payload.
 */
export function normalizeExchangeTransfer(
  raw: RawExchangeTransfer
): NormalizeResult {
  const checked = checkPayload(ExchangeTransferPayloadSchema, raw.payload);
  if (!checked.valid) {
    return drop(checked.reason);
  }
  const transfer = checked.value;

  const id =
    transfer.id === null || transfer.id === undefined
      ? null
      : String(transfer.id);
  const externalId = nonEmpty(id) ?? nonEmpty(transfer.txid);
  if (externalId === null) {
    return drop("missing transfer id and txid");
  }

  const asset = nonEmpty(transfer.currency) ?? nonEmpty(raw.probedCurrency);
  if (asset === null) {
    return drop("missing currency", externalId);
  }

  const occurredAt = toUtcInstant(transfer.timestamp ?? transfer.datetime);
  if (occurredAt === null) {
    return drop("unparseable timestamp", externalId);
  }

  const amount = toNumber(transfer.amount);
  if (amount === null) {
    return drop("invalid amount", externalId);
  }

  // The exchange's own side is usually blank; `address` names the other end
  const address = nonEmpty(transfer.address);
  const from =
    nonEmpty(transfer.addressFrom) ??
    (raw.direction === "deposit" ? address : null);
  const to =
    nonEmpty(transfer.addressTo) ??
    (raw.direction === "withdrawal" ? address : null);

  const feeAmount = toNumber(transfer.fee?.cost);

  return {
    ok: true,
    record: buildRecord(
      {
        domain: "exchange",
        source: raw.source,
        external_id: externalId,
        log_index: 0,
        base_asset: asset,
        quote_asset: "",
        action: raw.direction,
        amount: Math.abs(amount),
        price: null,
        fee_asset:
          feeAmount === null
            ? null
            : (nonEmpty(transfer.fee?.currency) ?? asset),
        fee_amount: feeAmount === null ? null : Math.abs(feeAmount),
        counterparty_from: from,
        counterparty_to: to,
        chain: null,
        raw_payload: serializePayload(raw.payload),
      },
      occurredAt
    ),
  };
}
