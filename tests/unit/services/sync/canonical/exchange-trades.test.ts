import { describe, it, expect } from "vitest";

import {
  normalizeExchangeTrade,
  splitSymbol,
} from "../../../../../src/services/sync/canonical/exchange-trades.js";
import { exchangeTrade } from "../../../../fixtures/ledger.js";

describe("canonical/exchange-trades", () => {
  describe("splitSymbol", () => {
    it("should split on the separator", () => {
      expect(splitSymbol("BTC/USDT")).toEqual({ base: "BTC", quote: "USDT" });
    });

    it("should reject symbols without exactly one separator", () => {
      expect(splitSymbol("BTCUSDT")).toBeNull();
      expect(splitSymbol("BTC/USDT/X")).toBeNull();
      expect(splitSymbol("/USDT")).toBeNull();
    });
  });

  describe("normalizeExchangeTrade", () => {
    it("should map a buy into the canonical shape", () => {
      const raw = exchangeTrade();

      const result = normalizeExchangeTrade(raw);

      expect(result).toEqual({
        ok: true,
        record: {
          domain: "exchange",
          source: "binance",
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
          raw_payload: JSON.stringify(raw.payload),
          occurred_at: "2024-03-15T10:00:00Z",
          year: 2024,
          month: 3,
        },
      });
    });

    it("should map sell and store the amount as an absolute value", () => {
      const result = normalizeExchangeTrade(
        exchangeTrade({ side: "sell", amount: "-0.25" })
      );

      expect(result.ok && result.record.action).toBe("trade-sell");
      expect(result.ok && result.record.amount).toBe(0.25);
    });

    it("should stringify numeric ids", () => {
      const result = normalizeExchangeTrade(exchangeTrade({ id: 42 }));

      expect(result.ok && result.record.external_id).toBe("42");
    });

    it("should fall back to datetime when timestamp is missing", () => {
      const result = normalizeExchangeTrade(
        exchangeTrade({ timestamp: null, datetime: "2024-01-02T03:04:05.678Z" })
      );

      expect(result.ok && result.record.occurred_at).toBe(
        "2024-01-02T03:04:05Z"
      );
    });

    it("should leave fee fields empty without a fee cost", () => {
      const result = normalizeExchangeTrade(exchangeTrade({ fee: null }));

      expect(result.ok && result.record.fee_asset).toBeNull();
      expect(result.ok && result.record.fee_amount).toBeNull();
    });

    it("should drop unsupported sides", () => {
      expect(normalizeExchangeTrade(exchangeTrade({ side: "short" }))).toEqual({
        ok: false,
        reason: "unsupported side 'short'",
        externalId: "T-1",
      });
    });

    it("should drop symbols without a separator", () => {
      expect(
        normalizeExchangeTrade(exchangeTrade({ symbol: "BTCUSDT" }))
      ).toEqual({
        ok: false,
        reason: "unparseable symbol 'BTCUSDT'",
        externalId: "T-1",
      });
    });

    it("should drop unparseable timestamps", () => {
      expect(
        normalizeExchangeTrade(
          exchangeTrade({ timestamp: "soon", datetime: null })
        )
      ).toEqual({
        ok: false,
        reason: "unparseable timestamp",
        externalId: "T-1",
      });
    });

    it("should drop payloads failing validation", () => {
      const result = normalizeExchangeTrade({
        family: "exchange-trade",
        source: "binance",
        payload: { id: "T-9", side: "buy" },
      });

      expect(result.ok).toBe(false);
      expect(!result.ok && result.reason).toMatch(/^invalid payload at '\//);
    });
  });
});
