/**
 * Exchange client over ccxt
 *
 * Exposes trades, deposits and withdrawals of one exchange account as
 * paginated streams. Paging moves forward in time: the next page starts one
 * millisecond after the last record of the previous one.
 *
 * Some exchanges refuse history queries without a currency (or a market
 * symbol for trades). For those a list of probes is configured and each probe
 * is paged in turn; a probe the exchange refuses is logged and skipped,
 * while a network failure on a probe is retried like any other page.
 */

import ccxt from "ccxt";

import { errorMessage, FetchError, type FetchErrorKind } from "../errors.js";
import { fetchLogger } from "../logger.js";
import {
  permanentFailure,
  success,
  transientFailure,
  type FetchOutcome,
} from "../services/sync/retry.js";

import type {
  FetchPageRequest,
  PageFetcher,
  SourceStream,
} from "../services/sync/types.js";
import type { RawSourceRecord, TransferDirection } from "../types/raw.js";

// ============================================================================
// Types
// ============================================================================

/** The slice of a ccxt exchange this client calls */
export interface ExchangeApi {
  has: Record<string, unknown>;
  fetchMyTrades(
    symbol?: string,
    since?: number,
    limit?: number
  ): Promise<unknown[]>;
  fetchDeposits(
    code?: string,
    since?: number,
    limit?: number
  ): Promise<unknown[]>;
  fetchWithdrawals(
    code?: string,
    since?: number,
    limit?: number
  ): Promise<unknown[]>;
}

export interface ExchangeCredentials {
  apiKey: string;
  secret: string;
  password?: string;
}

type ExchangeFactory = (credentials: ExchangeCredentials) => ExchangeApi;

type HistoryCall = (
  probe: string | undefined,
  since: number,
  limit: number
) => Promise<unknown[]>;

interface StreamPosition {
  probeIndex: number;
  sinceMs: number;
}

// ============================================================================
// Exchange Factories
// ============================================================================

function clientOptions(credentials: ExchangeCredentials): {
  apiKey: string;
  secret: string;
  password?: string;
  enableRateLimit: boolean;
} {
  return {
    apiKey: credentials.apiKey,
    secret: credentials.secret,
    ...(credentials.password !== undefined
      ? { password: credentials.password }
      : {}),
    enableRateLimit: true,
  };
}

const EXCHANGE_FACTORIES: Record<string, ExchangeFactory> = {
  binance: (credentials) => new ccxt.binance(clientOptions(credentials)),
  bitstamp: (credentials) => new ccxt.bitstamp(clientOptions(credentials)),
  bybit: (credentials) => new ccxt.bybit(clientOptions(credentials)),
  coinbase: (credentials) => new ccxt.coinbase(clientOptions(credentials)),
  kraken: (credentials) => new ccxt.kraken(clientOptions(credentials)),
  kucoin: (credentials) => new ccxt.kucoin(clientOptions(credentials)),
  okx: (credentials) => new ccxt.okx(clientOptions(credentials)),
};

export const SUPPORTED_EXCHANGES = Object.keys(EXCHANGE_FACTORIES);

// ============================================================================
// Helpers
// ============================================================================

/**
 * ccxt network errors (timeouts, rate limits, exchange unavailable) are worth
 * retrying; anything else (auth, bad arguments, unsupported) is not.
 */
export function classifyExchangeError(error: unknown): FetchErrorKind {
  return error instanceof ccxt.NetworkError ? "transient" : "permanent";
}

function timestampOf(payload: unknown): number | null {
  if (
    typeof payload === "object" &&
    payload !== null &&
    "timestamp" in payload &&
    typeof payload.timestamp === "number"
  ) {
    return payload.timestamp;
  }
  return null;
}

function encodePosition(position: StreamPosition): string {
  return `${String(position.probeIndex)}:${String(position.sinceMs)}`;
}

export function decodePosition(cursor: string | null): StreamPosition | null {
  if (cursor === null) {
    return null;
  }
  const match = /^(\d+):(\d+)$/.exec(cursor);
  if (match === null) {
    return null;
  }
  return { probeIndex: Number(match[1]), sinceMs: Number(match[2]) };
}

export function createExchangeApi(
  exchangeId: string,
  credentials: ExchangeCredentials
): ExchangeApi | null {
  const factory = EXCHANGE_FACTORIES[exchangeId];
  return factory === undefined ? null : factory(credentials);
}

// ============================================================================
// Stream Fetcher
// ============================================================================

class CcxtStreamFetcher implements PageFetcher {
  constructor(
    private readonly source: string,
    private readonly operation: string,
    private readonly probes: readonly string[],
    private readonly call: HistoryCall,
    private readonly wrap: (
      payload: unknown,
      probe: string | undefined
    ) => RawSourceRecord
  ) {}

  async fetchPage(
    request: FetchPageRequest
  ): Promise<FetchOutcome<RawSourceRecord>> {
    const startMs = request.since.getTime();
    const position = decodePosition(request.cursor) ?? {
      probeIndex: 0,
      sinceMs: startMs,
    };
    const probing = this.probes.length > 0;
    const probe = probing ? this.probes[position.probeIndex] : undefined;
    if (probing && probe === undefined) {
      return success([], null);
    }

    const nextProbe =
      probing && position.probeIndex + 1 < this.probes.length
        ? encodePosition({
            probeIndex: position.probeIndex + 1,
            sinceMs: startMs,
          })
        : null;

    await request.ctx.throttle(this.source);

    let batch: unknown[];
    try {
      batch = await this.call(probe, position.sinceMs, request.pageSize);
    } catch (error) {
      const kind = classifyExchangeError(error);

      // Transient failures replay this cursor; only a refused probe is skipped.
      if (probe !== undefined && kind === "permanent") {
        fetchLogger.warn(
          {
            source: this.source,
            operation: this.operation,
            probe,
            kind,
            error: errorMessage(error),
          },
          "Probe failed, skipping"
        );
        return success([], nextProbe);
      }

      const failure = new FetchError(
        `${this.operation} failed: ${errorMessage(error)}`,
        kind,
        this.source,
        { cause: error }
      );
      return kind === "transient"
        ? transientFailure(failure)
        : permanentFailure(failure);
    }

    fetchLogger.debug(
      {
        source: this.source,
        operation: this.operation,
        probe,
        count: batch.length,
      },
      "Fetched page"
    );

    const records = batch.map((payload) => this.wrap(payload, probe));
    const lastTimestamp = timestampOf(batch.at(-1));

    const nextCursor =
      batch.length >= request.pageSize && lastTimestamp !== null
        ? encodePosition({
            probeIndex: position.probeIndex,
            sinceMs: lastTimestamp + 1,
          })
        : nextProbe;

    return success(records, nextCursor);
  }
}

// ============================================================================
// Exchange Client
// ============================================================================

export interface CcxtExchangeClientOptions {
  /** Currencies to probe for deposits and withdrawals */
  transferCurrencies?: string[];
  /** Market symbols to probe for trades */
  tradeSymbols?: string[];
}

export class CcxtExchangeClient {
  constructor(
    private readonly source: string,
    private readonly api: ExchangeApi,
    private readonly options: CcxtExchangeClientOptions = {}
  ) {}

  private supports(capability: string): boolean {
    const flag = this.api.has[capability];
    return flag === true || flag === "emulated";
  }

  private transfers(direction: TransferDirection): PageFetcher {
    const operation =
      direction === "deposit" ? "fetchDeposits" : "fetchWithdrawals";
    const call: HistoryCall =
      direction === "deposit"
        ? (code, since, limit) => this.api.fetchDeposits(code, since, limit)
        : (code, since, limit) => this.api.fetchWithdrawals(code, since, limit);

    return new CcxtStreamFetcher(
      this.source,
      operation,
      this.options.transferCurrencies ?? [],
      call,
      (payload, probe) => ({
        family: "exchange-transfer",
        source: this.source,
        direction,
        probedCurrency: probe,
        payload,
      })
    );
  }

  /**
   * Streams for every history the exchange supports.
   */
  streams(): SourceStream[] {
    const streams: SourceStream[] = [];

    if (this.supports("fetchMyTrades")) {
      streams.push({
        entity: "trades",
        fetcher: new CcxtStreamFetcher(
          this.source,
          "fetchMyTrades",
          this.options.tradeSymbols ?? [],
          (symbol, since, limit) =>
            this.api.fetchMyTrades(symbol, since, limit),
          (payload) => ({
            family: "exchange-trade",
            source: this.source,
            payload,
          })
        ),
      });
    }
    if (this.supports("fetchDeposits")) {
      streams.push({ entity: "deposits", fetcher: this.transfers("deposit") });
    }
    if (this.supports("fetchWithdrawals")) {
      streams.push({
        entity: "withdrawals",
        fetcher: this.transfers("withdrawal"),
      });
    }

    return streams;
  }
}
