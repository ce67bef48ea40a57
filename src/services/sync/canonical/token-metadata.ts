/**
 * Token metadata resolution
 *
 * Resolves (chain, token identifier) to a symbol and decimals. Lookups go
 * through a small table of well-known assets first, then a run-scoped cache,
 * then an optional provider. Anything unresolved falls back to a placeholder.
 */

import { errorMessage } from "../../../errors.js";
import { syncLogger } from "../../../logger.js";

// ============================================================================
// Types
// ============================================================================

export interface TokenMetadata {
  symbol: string;
  decimals: number;
}

export interface TokenMetadataProvider {
  lookup(chain: string, tokenId: string): Promise<TokenMetadata | null>;
}

/** Synchronous view used by normalizers */
export interface TokenLookup {
  resolve(chain: string, tokenId: string): TokenMetadata;
  nativeAsset(chain: string): string;
}

// ============================================================================
// Constants
// ============================================================================

export const PLACEHOLDER_DECIMALS = 18;
const PLACEHOLDER_SYMBOL_LENGTH = 8;

/**
 * Native coins (DeBank uses the chain id as the token id) and the
 * stablecoins/wrappers that make up most of the volume on mainnet.
 */
const WELL_KNOWN_TOKENS: Record<string, TokenMetadata> = {
  "eth:eth": { symbol: "ETH", decimals: 18 },
  "arb:arb": { symbol: "ETH", decimals: 18 },
  "op:op": { symbol: "ETH", decimals: 18 },
  "base:base": { symbol: "ETH", decimals: 18 },
  "bsc:bsc": { symbol: "BNB", decimals: 18 },
  "matic:matic": { symbol: "MATIC", decimals: 18 },
  "avax:avax": { symbol: "AVAX", decimals: 18 },
  "eth:0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48": {
    symbol: "USDC",
    decimals: 6,
  },
  "eth:0xdac17f958d2ee523a2206206994597c13d831ec7": {
    symbol: "USDT",
    decimals: 6,
  },
  "eth:0x6b175474e89094c44da98b954eedeac495271d0f": {
    symbol: "DAI",
    decimals: 18,
  },
  "eth:0xc02aaa39b223fe8d0a0e5c4f27ead9083c756cc2": {
    symbol: "WETH",
    decimals: 18,
  },
  "eth:0x2260fac5e5542a773aa44fbcfedf7c193bc2c599": {
    symbol: "WBTC",
    decimals: 8,
  },
};

// ============================================================================
// Helpers
// ============================================================================

function cacheKey(chain: string, tokenId: string): string {
  return `${chain.toLowerCase()}:${tokenId.toLowerCase()}`;
}

export function placeholderMetadata(tokenId: string): TokenMetadata {
  return {
    symbol: tokenId.slice(0, PLACEHOLDER_SYMBOL_LENGTH),
    decimals: PLACEHOLDER_DECIMALS,
  };
}

export function wellKnownToken(
  chain: string,
  tokenId: string
): TokenMetadata | undefined {
  return WELL_KNOWN_TOKENS[cacheKey(chain, tokenId)];
}

/**
 * Ask each provider in turn until one knows the token. When none does and
 * one of them failed, the last failure is rethrown.
 */
export function combineProviders(
  providers: readonly TokenMetadataProvider[]
): TokenMetadataProvider | undefined {
  if (providers.length <= 1) {
    return providers[0];
  }

  return {
    async lookup(chain, tokenId) {
      let failure: unknown = null;
      for (const provider of providers) {
        try {
          const metadata = await provider.lookup(chain, tokenId);
          if (metadata !== null) {
            return metadata;
          }
        } catch (error) {
          failure = error;
        }
      }
      if (failure !== null) {
        throw failure;
      }
      return null;
    },
  };
}

// ============================================================================
// Resolver
// ============================================================================

export class TokenMetadataResolver implements TokenLookup {
  private readonly cache = new Map<string, TokenMetadata>();
  private lookups = 0;

  constructor(private readonly provider?: TokenMetadataProvider) {}

  /**
   * Seed the cache with metadata a fetch response already carried.
   */
  prime(chain: string, tokenId: string, metadata: TokenMetadata): void {
    this.cache.set(cacheKey(chain, tokenId), metadata);
  }

  has(chain: string, tokenId: string): boolean {
    return (
      wellKnownToken(chain, tokenId) !== undefined ||
      this.cache.has(cacheKey(chain, tokenId))
    );
  }

  resolve(chain: string, tokenId: string): TokenMetadata {
    return (
      wellKnownToken(chain, tokenId) ??
      this.cache.get(cacheKey(chain, tokenId)) ??
      placeholderMetadata(tokenId)
    );
  }

  nativeAsset(chain: string): string {
    return wellKnownToken(chain, chain)?.symbol ?? chain.toUpperCase();
  }

  /**
   * Look up every token not yet known. Each identifier is asked for at most
   * once per run; failures are cached as placeholders.
   */
  async prefetch(chain: string, tokenIds: Iterable<string>): Promise<number> {
    if (this.provider === undefined) {
      return 0;
    }

    let performed = 0;
    for (const tokenId of new Set(tokenIds)) {
      if (this.has(chain, tokenId)) {
        continue;
      }

      performed++;
      this.lookups++;
      let metadata: TokenMetadata | null = null;
      try {
        metadata = await this.provider.lookup(chain, tokenId);
      } catch (error) {
        syncLogger.debug(
          { chain, tokenId, error: errorMessage(error) },
          "Token metadata lookup failed, using placeholder"
        );
      }

      this.prime(chain, tokenId, metadata ?? placeholderMetadata(tokenId));
    }

    return performed;
  }

  get size(): number {
    return this.cache.size;
  }

  get lookupCount(): number {
    return this.lookups;
  }
}
