/**
 * ERC-20 `Transfer` log normalization
 *
 * A log moving tokens out of the owned address is a send, one moving tokens
 * into it a receive. Self-transfers count as sends. Gas is paid per
 * transaction, not per log, so log records carry no fee.
 */

import {
  buildRecord,
  checkPayload,
  drop,
  scaleUnits,
  serializePayload,
  type NormalizeContext,
  type NormalizeResult,
} from "./shared.js";
import { toUtcInstant } from "./timestamps.js";
import { Erc20TransferPayloadSchema } from "../../../types/raw.js";

import type { RawErc20Transfer } from "../../../types/raw.js";

export function normalizeErc20Transfer(
  raw: RawErc20Transfer,
  ctx: NormalizeContext
): NormalizeResult {
  const checked = checkPayload(Erc20TransferPayloadSchema, raw.payload);
  if (!checked.valid) {
    return drop(checked.reason);
  }
  const log = checked.value;
  const externalId = log.transactionHash.toLowerCase();

  const occurredAt = toUtcInstant(log.timestamp);
  if (occurredAt === null) {
    return drop("unparseable timestamp", externalId);
  }

  const owner = raw.owner.toLowerCase();
  const from = log.from.toLowerCase();
  const to = log.to.toLowerCase();
  if (from !== owner && to !== owner) {
    return drop(`transfer does not involve ${owner}`, externalId);
  }

  const chain = raw.chain.toLowerCase();
  const token = ctx.tokens.resolve(chain, log.token);

  return {
    ok: true,
    record: buildRecord(
      {
        domain: "onchain",
        source: raw.source,
        external_id: externalId,
        log_index: log.logIndex,
        base_asset: token.symbol,
        quote_asset: "",
        action: from === owner ? "send" : "receive",
        amount: scaleUnits(log.value, token.decimals),
        price: null,
        fee_asset: null,
        fee_amount: null,
        counterparty_from: from,
        counterparty_to: to,
        chain,
        raw_payload: serializePayload(raw.payload),
      },
      occurredAt
    ),
  };
}

/**
 * Token contract a log refers to, or null for an invalid payload.
 */
export function referencedErc20Token(
  raw: RawErc20Transfer
): { chain: string; tokenIds: string[] } | null {
  const checked = checkPayload(Erc20TransferPayloadSchema, raw.payload);
  if (!checked.valid) {
    return null;
  }
  return {
    chain: raw.chain.toLowerCase(),
    tokenIds: [checked.value.token.toLowerCase()],
  };
}
