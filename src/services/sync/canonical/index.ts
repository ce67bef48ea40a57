/**
 * Source normalizers
 *
 * Maps every raw record family onto the canonical transaction shape.
 * Unmappable records are dropped with a reason, never thrown.
 */

import {
  normalizeErc20Transfer,
  referencedErc20Token,
} from "./erc20-transfers.js";
import { normalizeExchangeTrade } from "./exchange-trades.js";
import { normalizeExchangeTransfer } from "./exchange-transfers.js";
import {
  normalizeOnchainTransfer,
  referencedTokens,
} from "./onchain-transfers.js";
import { NormalizationError } from "../../../errors.js";
import { syncLogger } from "../../../logger.js";

import type { NormalizeContext, NormalizeResult } from "./shared.js";
import type { CanonicalTransaction } from "../../../types/canonical.js";
import type { RawSourceRecord } from "../../../types/raw.js";

export * from "./erc20-transfers.js";
export * from "./exchange-trades.js";
export * from "./exchange-transfers.js";
export * from "./onchain-transfers.js";
export * from "./shared.js";
export * from "./timestamps.js";
export * from "./token-metadata.js";

// ============================================================================
// Types
// ============================================================================

export interface NormalizedBatch {
  records: CanonicalTransaction[];
  /** One error per dropped record; the message is the drop reason */
  dropped: NormalizationError[];
}

// ============================================================================
// Dispatch
// ============================================================================

export function normalizeRecord(
  raw: RawSourceRecord,
  ctx: NormalizeContext
): NormalizeResult {
  switch (raw.family) {
    case "exchange-trade":
      return normalizeExchangeTrade(raw);
    case "exchange-transfer":
      return normalizeExchangeTransfer(raw);
    case "onchain-transfer":
      return normalizeOnchainTransfer(raw, ctx);
    case "erc20-transfer":
      return normalizeErc20Transfer(raw, ctx);
    default: {
      const unhandled: never = raw;
      return unhandled;
    }
  }
}

/**
 * Normalize a page of raw records, logging every drop.
 */
export function normalizeBatch(
  raws: readonly RawSourceRecord[],
  ctx: NormalizeContext
): NormalizedBatch {
  const records: CanonicalTransaction[] = [];
  const dropped: NormalizationError[] = [];

  for (const raw of raws) {
    const result = normalizeRecord(raw, ctx);
    if (result.ok) {
      records.push(result.record);
      continue;
    }

    dropped.push(
      new NormalizationError(result.reason, raw.source, result.externalId)
    );
    syncLogger.warn(
      {
        source: raw.source,
        externalId: result.externalId,
        reason: result.reason,
      },
      "Dropped unmappable record"
    );
  }

  return { records, dropped };
}

/**
 * Token identifiers a record needs metadata for, by chain. Exchange records
 * carry symbols and need none.
 */
export function tokenReferences(
  raw: RawSourceRecord
): { chain: string; tokenIds: string[] } | null {
  switch (raw.family) {
    case "onchain-transfer":
      return referencedTokens(raw);
    case "erc20-transfer":
      return referencedErc20Token(raw);
    default:
      return null;
  }
}

/**
 * Whether the provider flagged an on-chain record as spam.
 */
export function isFlaggedScam(raw: RawSourceRecord): boolean {
  if (raw.family !== "onchain-transfer") {
    return false;
  }
  const payload = raw.payload;
  return (
    typeof payload === "object" &&
    payload !== null &&
    "is_scam" in payload &&
    payload.is_scam === true
  );
}
