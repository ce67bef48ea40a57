import { describe, it, expect } from "vitest";

import {
  TokenMetadataResolver,
  isFlaggedScam,
  normalizeBatch,
  tokenReferences,
} from "../../../../../src/services/sync/canonical/index.js";
import { NormalizationError } from "../../../../../src/errors.js";
import {
  USDC_ETH,
  erc20Log,
  exchangeTrade,
  exchangeTransfer,
  onchainItem,
} from "../../../../fixtures/ledger.js";

describe("canonical/normalizeBatch", () => {
  it("should dispatch each family and keep the good records", () => {
    const batch = normalizeBatch(
      [
        exchangeTrade(),
        exchangeTransfer("deposit"),
        onchainItem({ receives: [{ token_id: "eth", amount: 1 }] }),
        erc20Log(),
      ],
      { tokens: new TokenMetadataResolver() }
    );

    expect(batch.dropped).toEqual([]);
    expect(
      batch.records.map((record) => [record.domain, record.action])
    ).toEqual([
      ["exchange", "trade-buy"],
      ["exchange", "deposit"],
      ["onchain", "receive"],
      ["onchain", "send"],
    ]);
  });

  it("should return dropped records as normalization errors", () => {
    const batch = normalizeBatch(
      [exchangeTrade({ timestamp: null }), exchangeTrade({ id: "T-2" })],
      { tokens: new TokenMetadataResolver() }
    );

    expect(batch.records).toHaveLength(1);
    expect(batch.dropped).toHaveLength(1);

    const [error] = batch.dropped;
    expect(error).toBeInstanceOf(NormalizationError);
    expect(error?.source).toBe("binance");
    expect(error?.externalId).toBe("T-1");
    expect(error?.message).toBe("unparseable timestamp");
  });
});

describe("canonical/isFlaggedScam", () => {
  it("should flag on-chain items marked as scam", () => {
    expect(isFlaggedScam(onchainItem({ is_scam: true }))).toBe(true);
    expect(isFlaggedScam(onchainItem())).toBe(false);
  });

  it("should never flag exchange records", () => {
    expect(isFlaggedScam(exchangeTrade({ is_scam: true }))).toBe(false);
  });
});

describe("canonical/tokenReferences", () => {
  it("should list the tokens on-chain records need metadata for", () => {
    expect(
      tokenReferences(onchainItem({ receives: [{ token_id: "eth", amount: 1 }] }))
    ).toEqual({ chain: "eth", tokenIds: ["eth"] });
    expect(tokenReferences(erc20Log())).toEqual({
      chain: "eth",
      tokenIds: [USDC_ETH],
    });
  });

  it("should have nothing to look up for exchange records", () => {
    expect(tokenReferences(exchangeTrade())).toBeNull();
  });
});
