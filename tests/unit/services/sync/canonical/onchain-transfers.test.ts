import { beforeEach, describe, it, expect } from "vitest";

import {
  inferAction,
  normalizeOnchainTransfer,
  referencedTokens,
} from "../../../../../src/services/sync/canonical/onchain-transfers.js";
import { TokenMetadataResolver } from "../../../../../src/services/sync/canonical/token-metadata.js";
import {
  COUNTERPARTY,
  OWNER,
  ROUTER,
  USDC_ETH,
  onchainItem,
} from "../../../../fixtures/ledger.js";

import type { NormalizeContext } from "../../../../../src/services/sync/canonical/shared.js";

const TOKEN_X = "0x1111111111111111111111111111111111111111";

describe("canonical/onchain-transfers", () => {
  let ctx: NormalizeContext;

  beforeEach(() => {
    const tokens = new TokenMetadataResolver();
    tokens.prime("eth", TOKEN_X, { symbol: "XTK", decimals: 18 });
    ctx = { tokens };
  });

  describe("inferAction", () => {
    it("should infer swap when sent and received assets differ", () => {
      expect(
        inferAction({
          sends: [{ token_id: TOKEN_X, amount: 5 }],
          receives: [{ token_id: USDC_ETH, amount: 10 }],
        })
      ).toBe("swap");
    });

    it("should infer send when both sides move the same asset", () => {
      expect(
        inferAction({
          sends: [{ token_id: TOKEN_X, amount: 5 }],
          receives: [{ token_id: TOKEN_X.toUpperCase(), amount: 1 }],
        })
      ).toBe("send");
    });

    it("should prefer approve over send", () => {
      expect(
        inferAction({
          sends: [{ token_id: "eth", amount: 0.1 }],
          token_approve: { spender: ROUTER, token_id: USDC_ETH, value: 1 },
        })
      ).toBe("approve");
    });

    it("should use the deposit category hint for outgoing legs", () => {
      expect(
        inferAction({
          sends: [{ token_id: "eth", amount: 1 }],
          cate_id: "deposit",
        })
      ).toBe("deposit");
    });

    it("should infer receive and unknown", () => {
      expect(inferAction({ receives: [{ token_id: "eth", amount: 1 }] })).toBe(
        "receive"
      );
      expect(inferAction({})).toBe("unknown");
    });
  });

  describe("normalizeOnchainTransfer", () => {
    it("should record a single outgoing leg as send", () => {
      const raw = onchainItem({
        sends: [{ token_id: TOKEN_X, amount: 5, to_addr: COUNTERPARTY }],
      });

      const result = normalizeOnchainTransfer(raw, ctx);

      expect(result).toEqual({
        ok: true,
        record: {
          domain: "onchain",
          source: "debank_eth",
          external_id: "0xabc",
          log_index: 0,
          action: "send",
          base_asset: "XTK",
          quote_asset: "",
          amount: 5,
          counterparty_from: OWNER,
          counterparty_to: COUNTERPARTY,
          price: null,
          fee_asset: "ETH",
          fee_amount: 0.002,
          chain: "eth",
          raw_payload: JSON.stringify(raw.payload),
          occurred_at: "2024-03-15T10:00:00Z",
          year: 2024,
          month: 3,
        },
      });
    });

    it("should key a swap on the first outgoing leg", () => {
      const result = normalizeOnchainTransfer(
        onchainItem({
          sends: [
            { token_id: TOKEN_X, amount: -5, to_addr: ROUTER },
            { token_id: "eth", amount: 0.01 },
          ],
          receives: [{ token_id: USDC_ETH, amount: 100 }],
        }),
        ctx
      );

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record).toMatchObject({
        action: "swap",
        base_asset: "XTK",
        quote_asset: "USDC",
        amount: 5,
        counterparty_to: ROUTER,
      });
    });

    it("should record the approved quantity and spender", () => {
      const result = normalizeOnchainTransfer(
        onchainItem({
          token_approve: { spender: ROUTER, token_id: USDC_ETH, value: 1000 },
        }),
        ctx
      );

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record).toMatchObject({
        action: "approve",
        base_asset: "USDC",
        amount: 1000,
        counterparty_from: OWNER,
        counterparty_to: ROUTER,
      });
    });

    it("should record incoming legs as receive", () => {
      const result = normalizeOnchainTransfer(
        onchainItem({
          receives: [{ token_id: "eth", amount: 1.25, from_addr: COUNTERPARTY }],
        }),
        ctx
      );

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record).toMatchObject({
        action: "receive",
        base_asset: "ETH",
        amount: 1.25,
        counterparty_from: COUNTERPARTY,
        counterparty_to: OWNER,
      });
    });

    it("should keep items without legs as unknown", () => {
      const result = normalizeOnchainTransfer(onchainItem(), ctx);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record).toMatchObject({
        action: "unknown",
        base_asset: "",
        amount: 0,
        counterparty_from: OWNER,
        counterparty_to: ROUTER,
      });
    });

    it("should scale raw amounts by known decimals", () => {
      const result = normalizeOnchainTransfer(
        onchainItem({ receives: [{ token_id: USDC_ETH, raw_amount: "1234500" }] }),
        ctx
      );

      expect(result.ok && result.record.amount).toBe(1.2345);
    });

    it("should fall back to placeholder metadata for unknown tokens", () => {
      const result = normalizeOnchainTransfer(
        onchainItem({
          receives: [
            { token_id: "0xdeadbeefcafe", raw_amount: "1500000000000000000" },
          ],
        }),
        ctx
      );

      expect(result.ok && result.record.base_asset).toBe("0xdeadbe");
      expect(result.ok && result.record.amount).toBe(1.5);
    });

    it("should take chain and log index from the payload", () => {
      const result = normalizeOnchainTransfer(
        onchainItem({ chain: "ARB", log_index: 3, tx: null }),
        ctx
      );

      expect(result.ok && result.record.chain).toBe("arb");
      expect(result.ok && result.record.log_index).toBe(3);
      expect(result.ok && result.record.fee_asset).toBeNull();
      expect(result.ok && result.record.fee_amount).toBeNull();
    });

    it("should drop outgoing legs without any amount", () => {
      expect(
        normalizeOnchainTransfer(
          onchainItem({ sends: [{ token_id: TOKEN_X }] }),
          ctx
        )
      ).toEqual({
        ok: false,
        reason: `outgoing leg ${TOKEN_X} has no amount`,
        externalId: "0xabc",
      });
    });

    it("should drop unparseable timestamps", () => {
      expect(
        normalizeOnchainTransfer(onchainItem({ time_at: "never" }), ctx)
      ).toEqual({
        ok: false,
        reason: "unparseable timestamp",
        externalId: "0xabc",
      });
    });
  });

  describe("referencedTokens", () => {
    it("should list leg and approval tokens with the lowercased chain", () => {
      expect(
        referencedTokens(
          onchainItem({
            chain: "Eth",
            sends: [{ token_id: TOKEN_X, amount: 1 }],
            receives: [{ token_id: USDC_ETH, amount: 1 }],
            token_approve: { spender: ROUTER, token_id: "eth", value: 1 },
          })
        )
      ).toEqual({ chain: "eth", tokenIds: [TOKEN_X, USDC_ETH, "eth"] });
    });

    it("should return null for invalid payloads", () => {
      expect(referencedTokens(onchainItem({ id: 7 }))).toBeNull();
    });
  });
});
