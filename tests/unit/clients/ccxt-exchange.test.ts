import ccxt from "ccxt";
import { describe, it, expect, vi } from "vitest";

import {
  CcxtExchangeClient,
  SUPPORTED_EXCHANGES,
  classifyExchangeError,
  createExchangeApi,
  decodePosition,
  type ExchangeApi,
} from "../../../src/clients/ccxt-exchange.js";
import { RunContext } from "../../../src/services/sync/run-context.js";

import type { PageFetcher } from "../../../src/services/sync/types.js";

const SINCE = new Date("2024-03-01T00:00:00Z");

function fakeApi(overrides: Partial<ExchangeApi> = {}): ExchangeApi {
  return {
    has: { fetchMyTrades: true, fetchDeposits: true, fetchWithdrawals: true },
    fetchMyTrades: () => Promise.resolve([]),
    fetchDeposits: () => Promise.resolve([]),
    fetchWithdrawals: () => Promise.resolve([]),
    ...overrides,
  };
}

function context(): RunContext {
  return new RunContext({
    rateLimitPerMinute: 60_000,
    sleep: () => Promise.resolve(),
  });
}

function fetcherFor(client: CcxtExchangeClient, entity: string): PageFetcher {
  const stream = client.streams().find((candidate) => candidate.entity === entity);
  if (stream === undefined) {
    throw new Error(`no ${entity} stream`);
  }
  return stream.fetcher;
}

describe("CcxtExchangeClient", () => {
  it("should expose a stream per supported history", () => {
    const client = new CcxtExchangeClient(
      "kraken",
      fakeApi({
        has: {
          fetchMyTrades: true,
          fetchDeposits: "emulated",
          fetchWithdrawals: false,
        },
      })
    );

    expect(client.streams().map((stream) => stream.entity)).toEqual([
      "trades",
      "deposits",
    ]);
  });

  it("should page forward from the last timestamp", async () => {
    const fetchMyTrades = vi.fn((_symbol?: string, since?: number) =>
      Promise.resolve(
        since === SINCE.getTime()
          ? [
              { id: "1", timestamp: SINCE.getTime() + 1000 },
              { id: "2", timestamp: SINCE.getTime() + 2000 },
            ]
          : [{ id: "3", timestamp: SINCE.getTime() + 3000 }]
      )
    );
    const fetcher = fetcherFor(
      new CcxtExchangeClient("binance", fakeApi({ fetchMyTrades })),
      "trades"
    );
    const ctx = context();

    const first = await fetcher.fetchPage({ since: SINCE, cursor: null, pageSize: 2, ctx });
    expect(first).toEqual({
      kind: "success",
      records: [
        {
          family: "exchange-trade",
          source: "binance",
          payload: { id: "1", timestamp: SINCE.getTime() + 1000 },
        },
        {
          family: "exchange-trade",
          source: "binance",
          payload: { id: "2", timestamp: SINCE.getTime() + 2000 },
        },
      ],
      nextCursor: `0:${String(SINCE.getTime() + 2001)}`,
    });

    const second = await fetcher.fetchPage({
      since: SINCE,
      cursor: first.kind === "success" ? first.nextCursor : null,
      pageSize: 2,
      ctx,
    });
    expect(second.kind === "success" && second.records).toHaveLength(1);
    expect(second.kind === "success" && second.nextCursor).toBeNull();
    expect(fetchMyTrades).toHaveBeenLastCalledWith(
      undefined,
      SINCE.getTime() + 2001,
      2
    );
    expect(ctx.stats.requests).toBe(2);
  });

  it("should skip a failing probe and move to the next one", async () => {
    const fetchDeposits = vi.fn((code?: string) =>
      code === "EUR"
        ? Promise.reject(new Error("currency not supported"))
        : Promise.resolve([{ id: "D-1", timestamp: SINCE.getTime() }])
    );
    const fetcher = fetcherFor(
      new CcxtExchangeClient("coinbase", fakeApi({ fetchDeposits }), {
        transferCurrencies: ["EUR", "BTC"],
      }),
      "deposits"
    );
    const ctx = context();

    const first = await fetcher.fetchPage({ since: SINCE, cursor: null, pageSize: 50, ctx });
    expect(first).toEqual({
      kind: "success",
      records: [],
      nextCursor: `1:${String(SINCE.getTime())}`,
    });

    const second = await fetcher.fetchPage({
      since: SINCE,
      cursor: first.kind === "success" ? first.nextCursor : null,
      pageSize: 50,
      ctx,
    });
    expect(second).toEqual({
      kind: "success",
      records: [
        {
          family: "exchange-transfer",
          source: "coinbase",
          direction: "deposit",
          probedCurrency: "BTC",
          payload: { id: "D-1", timestamp: SINCE.getTime() },
        },
      ],
      nextCursor: null,
    });
  });

  it("should report a network failure on a probe as transient without skipping it", async () => {
    const fetchDeposits = vi.fn(() =>
      Promise.reject(new ccxt.NetworkError("connection reset"))
    );
    const fetcher = fetcherFor(
      new CcxtExchangeClient("coinbase", fakeApi({ fetchDeposits }), {
        transferCurrencies: ["BTC", "ETH"],
      }),
      "deposits"
    );

    const outcome = await fetcher.fetchPage({
      since: SINCE,
      cursor: null,
      pageSize: 50,
      ctx: context(),
    });

    expect(outcome.kind).toBe("transient-failure");
    expect(outcome.kind !== "success" && outcome.error.message).toBe(
      "fetchDeposits failed: connection reset"
    );
    expect(fetchDeposits).toHaveBeenCalledTimes(1);
  });

  it("should classify failures of unprobed calls", async () => {
    const network = fetcherFor(
      new CcxtExchangeClient(
        "binance",
        fakeApi({
          fetchWithdrawals: () => Promise.reject(new ccxt.NetworkError("timed out")),
        })
      ),
      "withdrawals"
    );
    const auth = fetcherFor(
      new CcxtExchangeClient(
        "binance",
        fakeApi({
          fetchWithdrawals: () =>
            Promise.reject(new ccxt.AuthenticationError("invalid key")),
        })
      ),
      "withdrawals"
    );
    const request = { since: SINCE, cursor: null, pageSize: 10, ctx: context() };

    const transient = await network.fetchPage(request);
    const permanent = await auth.fetchPage(request);

    expect(transient.kind).toBe("transient-failure");
    expect(permanent.kind).toBe("permanent-failure");
    expect(permanent.kind !== "success" && permanent.error.message).toBe(
      "fetchWithdrawals failed: invalid key"
    );
  });
});

describe("ccxt helpers", () => {
  it("should treat only network errors as transient", () => {
    expect(classifyExchangeError(new ccxt.RequestTimeout("slow"))).toBe("transient");
    expect(classifyExchangeError(new ccxt.BadRequest("nope"))).toBe("permanent");
    expect(classifyExchangeError("oops")).toBe("permanent");
  });

  it("should decode only well-formed cursors", () => {
    expect(decodePosition("2:1700000000000")).toEqual({
      probeIndex: 2,
      sinceMs: 1_700_000_000_000,
    });
    expect(decodePosition("garbage")).toBeNull();
    expect(decodePosition(null)).toBeNull();
  });

  it("should build clients only for supported exchanges", () => {
    expect(SUPPORTED_EXCHANGES).toContain("binance");
    expect(
      createExchangeApi("not-an-exchange", {
        apiKey: "test-key",
        secret: "test-secret",
      })
    ).toBeNull();
  });
});
