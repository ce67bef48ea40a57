import { describe, it, expect, vi } from "vitest";

import {
  TokenMetadataResolver,
  combineProviders,
  placeholderMetadata,
  type TokenMetadataProvider,
} from "../../../../../src/services/sync/canonical/token-metadata.js";
import { USDC_ETH } from "../../../../fixtures/ledger.js";

describe("canonical/token-metadata", () => {
  describe("resolve", () => {
    it("should resolve well-known tokens regardless of case", () => {
      const resolver = new TokenMetadataResolver();

      expect(resolver.resolve("ETH", USDC_ETH.toUpperCase())).toEqual({
        symbol: "USDC",
        decimals: 6,
      });
    });

    it("should prefer primed metadata over the placeholder", () => {
      const resolver = new TokenMetadataResolver();
      resolver.prime("bsc", "0xCAFE", { symbol: "CAKE", decimals: 18 });

      expect(resolver.resolve("bsc", "0xcafe")).toEqual({
        symbol: "CAKE",
        decimals: 18,
      });
      expect(resolver.size).toBe(1);
    });

    it("should fall back to a placeholder", () => {
      const resolver = new TokenMetadataResolver();

      expect(resolver.resolve("eth", "0x1234567890")).toEqual({
        symbol: "0x123456",
        decimals: 18,
      });
      expect(placeholderMetadata("abc")).toEqual({ symbol: "abc", decimals: 18 });
    });
  });

  describe("nativeAsset", () => {
    it("should name the native coin of known chains", () => {
      const resolver = new TokenMetadataResolver();

      expect(resolver.nativeAsset("eth")).toBe("ETH");
      expect(resolver.nativeAsset("arb")).toBe("ETH");
      expect(resolver.nativeAsset("bsc")).toBe("BNB");
      expect(resolver.nativeAsset("matic")).toBe("MATIC");
    });

    it("should upper-case unknown chain ids", () => {
      expect(new TokenMetadataResolver().nativeAsset("ftm")).toBe("FTM");
    });
  });

  describe("prefetch", () => {
    it("should do nothing without a provider", async () => {
      const resolver = new TokenMetadataResolver();

      expect(await resolver.prefetch("eth", ["0xabc"])).toBe(0);
    });

    it("should look each unknown token up once", async () => {
      const lookup = vi.fn<TokenMetadataProvider["lookup"]>(() =>
        Promise.resolve({ symbol: "NEW", decimals: 9 })
      );
      const resolver = new TokenMetadataResolver({ lookup });

      const first = await resolver.prefetch("eth", [
        "0xnew",
        "0xnew",
        USDC_ETH,
      ]);
      const second = await resolver.prefetch("eth", ["0xNEW"]);

      expect(first).toBe(1);
      expect(second).toBe(0);
      expect(lookup).toHaveBeenCalledTimes(1);
      expect(lookup).toHaveBeenCalledWith("eth", "0xnew");
      expect(resolver.resolve("eth", "0xnew")).toEqual({
        symbol: "NEW",
        decimals: 9,
      });
      expect(resolver.lookupCount).toBe(1);
    });

    it("should cache a placeholder when the lookup fails", async () => {
      const lookup = vi.fn<TokenMetadataProvider["lookup"]>(() =>
        Promise.reject(new Error("boom"))
      );
      const resolver = new TokenMetadataResolver({ lookup });

      await resolver.prefetch("eth", ["0xbroken00"]);
      await resolver.prefetch("eth", ["0xbroken00"]);

      expect(lookup).toHaveBeenCalledTimes(1);
      expect(resolver.resolve("eth", "0xbroken00")).toEqual({
        symbol: "0xbroken",
        decimals: 18,
      });
    });

    it("should cache a placeholder when the provider knows nothing", async () => {
      const resolver = new TokenMetadataResolver({
        lookup: () => Promise.resolve(null),
      });

      await resolver.prefetch("eth", ["0xunknown"]);

      expect(resolver.has("eth", "0xunknown")).toBe(true);
      expect(resolver.resolve("eth", "0xunknown").symbol).toBe("0xunknow");
    });
  });

  describe("combineProviders", () => {
    const knows = (symbol: string): TokenMetadataProvider => ({
      lookup: () => Promise.resolve({ symbol, decimals: 18 }),
    });
    const unknown: TokenMetadataProvider = {
      lookup: () => Promise.resolve(null),
    };
    const failing: TokenMetadataProvider = {
      lookup: () => Promise.reject(new Error("rate limited")),
    };

    it("should pass a single provider through", () => {
      const only = knows("ONE");

      expect(combineProviders([only])).toBe(only);
      expect(combineProviders([])).toBeUndefined();
    });

    it("should answer with the first provider that knows the token", async () => {
      const second = vi.fn<TokenMetadataProvider["lookup"]>(() =>
        Promise.resolve({ symbol: "TWO", decimals: 6 })
      );
      const combined = combineProviders([failing, unknown, { lookup: second }, knows("THREE")]);

      expect(await combined?.lookup("eth", "0xabc")).toEqual({ symbol: "TWO", decimals: 6 });
      expect(second).toHaveBeenCalledWith("eth", "0xabc");
    });

    it("should rethrow a failure when no provider knows the token", async () => {
      await expect(combineProviders([failing, unknown])?.lookup("eth", "0xabc")).rejects.toThrow(
        "rate limited"
      );
      expect(await combineProviders([unknown, unknown])?.lookup("eth", "0xabc")).toBeNull();
    });
  });
});
