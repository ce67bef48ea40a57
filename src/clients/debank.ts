/**
 * DeBank client for on-chain history
 *
 * `history_list` returns the newest items first. Paging walks backwards from
 * the oldest `time_at` seen and stops once a page reaches back past the sync
 * window.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { errorMessage, FetchError, type FetchErrorKind } from "../errors.js";
import { fetchLogger } from "../logger.js";
import {
  permanentFailure,
  success,
  transientFailure,
  type FetchOutcome,
} from "../services/sync/retry.js";

import type {
  TokenMetadata,
  TokenMetadataProvider,
} from "../services/sync/canonical/token-metadata.js";
import type {
  FetchPageRequest,
  PageFetcher,
} from "../services/sync/types.js";
import type { RawSourceRecord } from "../types/raw.js";

const BASE_URL = "https://pro-openapi.debank.com/v1";

/** Largest `page_count` the history endpoint accepts */
export const DEBANK_MAX_PAGE_COUNT = 20;

// ============================================================================
// Response Schemas
// ============================================================================

const TokenInfoSchema = Type.Object({
  symbol: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  optimized_symbol: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  decimals: Type.Optional(Type.Union([Type.Integer(), Type.Null()])),
});

const HistoryResponseSchema = Type.Object({
  history_list: Type.Array(Type.Unknown()),
  token_dict: Type.Optional(
    Type.Union([Type.Record(Type.String(), TokenInfoSchema), Type.Null()])
  ),
});

// ============================================================================
// Types
// ============================================================================

export interface DebankClientOptions {
  apiKey: string;
  baseUrl?: string;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

// ============================================================================
// Helpers
// ============================================================================

export function debankSource(chain: string): string {
  return `debank_${chain}`;
}

/**
 * Rate limiting and server errors are worth retrying; other client errors
 * are not.
 */
export function classifyStatus(status: number): FetchErrorKind {
  return status === 429 || status >= 500 ? "transient" : "permanent";
}

function timeAtOf(item: unknown): number | null {
  if (typeof item !== "object" || item === null || !("time_at" in item)) {
    return null;
  }
  const value = item.time_at;
  const parsed = typeof value === "string" ? Number(value) : value;
  return typeof parsed === "number" && Number.isFinite(parsed) ? parsed : null;
}

/**
 * `start_time` is exclusive, so the next page starts one second above the
 * oldest item and re-reads that second; the store absorbs the repeats. A full
 * page inside a single second cannot move that cursor, so paging steps past
 * the second instead.
 */
export function nextStartTime(
  oldest: number,
  cursor: string | null,
  source: string
): string {
  const next = oldest + 1;
  if (cursor !== null && Number(cursor) === next) {
    fetchLogger.warn(
      { source, timeAt: oldest },
      "Full history page within one second, stepping past it"
    );
    return String(oldest);
  }
  return String(next);
}

function toTokenMetadata(info: {
  symbol?: string | null;
  optimized_symbol?: string | null;
  decimals?: number | null;
}): TokenMetadata | null {
  const symbol = info.optimized_symbol ?? info.symbol;
  if (
    symbol === undefined ||
    symbol === null ||
    symbol === "" ||
    info.decimals === undefined ||
    info.decimals === null
  ) {
    return null;
  }
  return { symbol, decimals: info.decimals };
}

// ============================================================================
// DeBank Client
// ============================================================================

export class DebankClient implements TokenMetadataProvider {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: DebankClientOptions) {
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private async request(
    path: string,
    params: Record<string, string>,
    signal?: AbortSignal
  ): Promise<Response> {
    const url = `${this.baseUrl}${path}?${new URLSearchParams(params).toString()}`;
    fetchLogger.debug({ url }, "Sending request to DeBank API");

    const startTime = performance.now();
    const response = await this.fetchImpl(url, {
      headers: { AccessKey: this.options.apiKey, accept: "application/json" },
      signal,
    });
    const duration = Math.round(performance.now() - startTime);

    fetchLogger.debug(
      {
        url,
        status: response.status,
        duration: `${String(duration)}ms`,
      },
      "Received response from DeBank API"
    );

    return response;
  }

  /**
   * Token metadata for identifiers not covered by a history response.
   */
  async lookup(chain: string, tokenId: string): Promise<TokenMetadata | null> {
    const response = await this.request("/token", {
      chain_id: chain,
      id: tokenId,
    });
    if (!response.ok) {
      throw new FetchError(
        `Token lookup failed: ${String(response.status)}`,
        classifyStatus(response.status),
        debankSource(chain)
      );
    }

    const body: unknown = await response.json();
    return Value.Check(TokenInfoSchema, body) ? toTokenMetadata(body) : null;
  }

  /**
   * Paged history of one address on one chain.
   */
  historyFetcher(chain: string, address: string): PageFetcher {
    const source = debankSource(chain);
    const owner = address.toLowerCase();

    return {
      fetchPage: async (
        request: FetchPageRequest
      ): Promise<FetchOutcome<RawSourceRecord>> => {
        const pageCount = Math.min(request.pageSize, DEBANK_MAX_PAGE_COUNT);
        const params: Record<string, string> = {
          id: owner,
          chain_id: chain,
          page_count: String(pageCount),
        };
        if (request.cursor !== null) {
          params.start_time = request.cursor;
        }

        await request.ctx.throttle(source);

        let response: Response;
        try {
          response = await this.request(
            "/user/history_list",
            params,
            request.ctx.signal
          );
        } catch (error) {
          return transientFailure(
            new FetchError(
              `history_list request failed: ${errorMessage(error)}`,
              "transient",
              source,
              { cause: error }
            )
          );
        }

        if (!response.ok) {
          const kind = classifyStatus(response.status);
          const failure = new FetchError(
            `history_list returned ${String(response.status)}`,
            kind,
            source
          );
          return kind === "transient"
            ? transientFailure(failure)
            : permanentFailure(failure);
        }

        let body: unknown;
        try {
          body = await response.json();
        } catch (error) {
          return transientFailure(
            new FetchError(
              `history_list body unreadable: ${errorMessage(error)}`,
              "transient",
              source,
              { cause: error }
            )
          );
        }

        if (!Value.Check(HistoryResponseSchema, body)) {
          return permanentFailure(
            new FetchError(
              "history_list response has an unexpected shape",
              "permanent",
              source
            )
          );
        }

        for (const [tokenId, info] of Object.entries(body.token_dict ?? {})) {
          const metadata = toTokenMetadata(info);
          if (metadata !== null) {
            request.ctx.tokens.prime(chain, tokenId, metadata);
          }
        }

        const sinceSeconds = request.since.getTime() / 1000;
        const records: RawSourceRecord[] = [];
        let oldest: number | null = null;

        for (const item of body.history_list) {
          const timeAt = timeAtOf(item);
          if (timeAt !== null) {
            oldest = oldest === null ? timeAt : Math.min(oldest, timeAt);
            if (timeAt < sinceSeconds) {
              continue;
            }
          }
          records.push({
            family: "onchain-transfer",
            source,
            chain,
            owner,
            payload: item,
          });
        }

        const exhausted =
          body.history_list.length < pageCount ||
          oldest === null ||
          oldest < sinceSeconds;

        fetchLogger.debug(
          { source, owner, count: records.length, exhausted },
          "Fetched history page"
        );

        if (exhausted) {
          return success(records, null);
        }
        return success(records, nextStartTime(oldest, request.cursor, source));
      },
    };
  }
}
