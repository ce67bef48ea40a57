/**
 * On-chain history normalization
 *
 * A history item carries zero or more outgoing legs (`sends`), incoming legs
 * (`receives`) and possibly a token approval. The category is inferred from
 * which of these are present:
 *
 * - outgoing and incoming legs of different assets: swap, keyed on the first
 *   outgoing leg
 * - an approval: approve
 * - outgoing legs: send, or deposit when the provider categorised it so
 * - incoming legs only: receive
 * - nothing: unknown, still recorded with a zero amount
 */

import {
  buildRecord,
  checkPayload,
  drop,
  nonEmpty,
  serializePayload,
  toNumber,
  scaleUnits,
  type NormalizeContext,
  type NormalizeResult,
  type RecordFields,
} from "./shared.js";
import { toUtcInstant } from "./timestamps.js";
import { OnchainTransferPayloadSchema } from "../../../types/raw.js";

import type { TransactionAction } from "../../../types/canonical.js";
import type {
  OnchainLeg,
  OnchainTransferPayload,
  RawOnchainTransfer,
} from "../../../types/raw.js";

const DEPOSIT_CATEGORY = "deposit";

type Movement = Pick<
  RecordFields,
  | "action"
  | "base_asset"
  | "quote_asset"
  | "amount"
  | "counterparty_from"
  | "counterparty_to"
>;

// ============================================================================
// Leg helpers
// ============================================================================

function legAmount(
  leg: OnchainLeg,
  chain: string,
  ctx: NormalizeContext
): number | null {
  if (leg.amount !== undefined) {
    return Math.abs(leg.amount);
  }
  if (leg.raw_amount !== undefined) {
    const { decimals } = ctx.tokens.resolve(chain, leg.token_id);
    return scaleUnits(leg.raw_amount, decimals);
  }
  return null;
}

function sameToken(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * The first incoming leg whose token is not also sent, if any.
 */
export function findSwapCounterLeg(
  sends: readonly OnchainLeg[],
  receives: readonly OnchainLeg[]
): OnchainLeg | undefined {
  return receives.find(
    (received) =>
      !sends.some((sent) => sameToken(sent.token_id, received.token_id))
  );
}

// ============================================================================
// Category inference
// ============================================================================

export function inferAction(
  payload: Pick<
    OnchainTransferPayload,
    "sends" | "receives" | "token_approve" | "cate_id"
  >
): TransactionAction {
  const sends = payload.sends ?? [];
  const receives = payload.receives ?? [];

  if (
    sends.length > 0 &&
    receives.length > 0 &&
    findSwapCounterLeg(sends, receives) !== undefined
  ) {
    return "swap";
  }
  if (payload.token_approve !== undefined && payload.token_approve !== null) {
    return "approve";
  }
  if (sends.length > 0) {
    return payload.cate_id === DEPOSIT_CATEGORY ? "deposit" : "send";
  }
  if (receives.length > 0) {
    return "receive";
  }
  return "unknown";
}

function describeMovement(
  item: OnchainTransferPayload,
  action: TransactionAction,
  chain: string,
  owner: string,
  ctx: NormalizeContext
): Movement | string {
  const sends = item.sends ?? [];
  const receives = item.receives ?? [];
  const txFrom = nonEmpty(item.tx?.from_addr);
  const txTo = nonEmpty(item.tx?.to_addr);

  switch (action) {
    case "swap":
    case "send":
    case "deposit": {
      const [leg] = sends;
      if (leg === undefined) {
        return "no outgoing leg";
      }
      const amount = legAmount(leg, chain, ctx);
      if (amount === null) {
        return `outgoing leg ${leg.token_id} has no amount`;
      }
      const counter =
        action === "swap" ? findSwapCounterLeg(sends, receives) : undefined;
      return {
        action,
        base_asset: ctx.tokens.resolve(chain, leg.token_id).symbol,
        quote_asset:
          counter === undefined
            ? ""
            : ctx.tokens.resolve(chain, counter.token_id).symbol,
        amount,
        counterparty_from: nonEmpty(leg.from_addr) ?? owner,
        counterparty_to: nonEmpty(leg.to_addr) ?? txTo,
      };
    }

    case "approve": {
      const grant = item.token_approve;
      if (grant === undefined || grant === null) {
        return "missing approval";
      }
      return {
        action,
        base_asset: ctx.tokens.resolve(chain, grant.token_id).symbol,
        quote_asset: "",
        amount: Math.abs(grant.value),
        counterparty_from: owner,
        counterparty_to: nonEmpty(grant.spender),
      };
    }

    case "receive": {
      const [leg] = receives;
      if (leg === undefined) {
        return "no incoming leg";
      }
      const amount = legAmount(leg, chain, ctx);
      if (amount === null) {
        return `incoming leg ${leg.token_id} has no amount`;
      }
      return {
        action,
        base_asset: ctx.tokens.resolve(chain, leg.token_id).symbol,
        quote_asset: "",
        amount,
        counterparty_from: nonEmpty(leg.from_addr) ?? txFrom,
        counterparty_to: nonEmpty(leg.to_addr) ?? owner,
      };
    }

    default:
      return {
        action: "unknown",
        base_asset: "",
        quote_asset: "",
        amount: 0,
        counterparty_from: txFrom,
        counterparty_to: txTo,
      };
  }
}

// ============================================================================
// Normalizer
// ============================================================================

export function normalizeOnchainTransfer(
  raw: RawOnchainTransfer,
  ctx: NormalizeContext
): NormalizeResult {
  const checked = checkPayload(OnchainTransferPayloadSchema, raw.payload);
  if (!checked.valid) {
    return drop(checked.reason);
  }
  const item = checked.value;

  const externalId = nonEmpty(item.id);
  if (externalId === null) {
    return drop("missing transaction hash");
  }

  const occurredAt = toUtcInstant(item.time_at);
  if (occurredAt === null) {
    return drop("unparseable timestamp", externalId);
  }

  const chain = (nonEmpty(item.chain) ?? raw.chain).toLowerCase();
  const owner = raw.owner.toLowerCase();

  const movement = describeMovement(
    item,
    inferAction(item),
    chain,
    owner,
    ctx
  );
  if (typeof movement === "string") {
    return drop(movement, externalId);
  }

  const gasFee = toNumber(item.tx?.eth_gas_fee);

  return {
    ok: true,
    record: buildRecord(
      {
        domain: "onchain",
        source: raw.source,
        external_id: externalId,
        log_index: item.log_index ?? 0,
        ...movement,
        price: null,
        fee_asset: gasFee === null ? null : ctx.tokens.nativeAsset(chain),
        fee_amount: gasFee === null ? null : Math.abs(gasFee),
        chain,
        raw_payload: serializePayload(raw.payload),
      },
      occurredAt
    ),
  };
}

/**
 * Chain and token identifiers an item refers to, so their metadata can be
 * fetched before the synchronous normalization pass. Invalid payloads give
 * null.
 */
export function referencedTokens(
  raw: RawOnchainTransfer
): { chain: string; tokenIds: string[] } | null {
  const checked = checkPayload(OnchainTransferPayloadSchema, raw.payload);
  if (!checked.valid) {
    return null;
  }
  const item = checked.value;

  const tokenIds = [...(item.sends ?? []), ...(item.receives ?? [])].map(
    (leg) => leg.token_id
  );
  if (item.token_approve !== undefined && item.token_approve !== null) {
    tokenIds.push(item.token_approve.token_id);
  }

  return {
    chain: (nonEmpty(item.chain) ?? raw.chain).toLowerCase(),
    tokenIds,
  };
}
