import { describe, it, expect, vi } from "vitest";

import { DebankClient } from "../../../../src/clients/debank.js";
import { EvmRpcClient, type EvmChainApi } from "../../../../src/clients/evm-rpc.js";
import { loadConfig } from "../../../../src/config.js";
import { buildJobs, type JobFactories } from "../../../../src/services/sync/jobs.js";

import type { ExchangeApi } from "../../../../src/clients/ccxt-exchange.js";

const CHAIN_API: EvmChainApi = {
  getBlockNumber: () => Promise.resolve(0),
  getBlockTimestamp: () => Promise.resolve(0),
  getLogs: () => Promise.resolve([]),
  getTokenMetadata: () => Promise.resolve({ symbol: "NODE", decimals: 18 }),
};

const API: ExchangeApi = {
  has: { fetchMyTrades: true, fetchDeposits: true, fetchWithdrawals: false },
  fetchMyTrades: () => Promise.resolve([]),
  fetchDeposits: () => Promise.resolve([]),
  fetchWithdrawals: () => Promise.resolve([]),
};

function factories(): JobFactories {
  return {
    createExchangeApi: vi.fn((exchangeId: string) =>
      exchangeId === "binance" ? API : null
    ),
    createDebankClient: (apiKey) =>
      new DebankClient({ apiKey, fetchImpl: vi.fn<typeof fetch>() }),
    createEvmClient: (_rpcUrl, blockRange) =>
      new EvmRpcClient(CHAIN_API, { chain: "eth", blockRange }),
  };
}

describe("buildJobs", () => {
  it("should build exchange jobs with one stream per supported history", () => {
    const config = loadConfig({
      EXCHANGES: "binance",
      BINANCE_API_KEY: "test-key",
      BINANCE_API_SECRET: "test-secret",
    });

    const { jobs, tokenProvider } = buildJobs(config, factories());

    expect(jobs.map((job) => job.source)).toEqual(["binance", "debank_eth"]);
    expect(jobs[0]?.source).toBe("binance");
    expect(jobs[0]?.domain).toBe("exchange");
    expect(jobs[0]?.unusableReason).toBeUndefined();
    expect(jobs[0]?.streams.map((stream) => stream.entity)).toEqual([
      "trades",
      "deposits",
    ]);
    expect(tokenProvider).toBeUndefined();
  });

  it("should mark exchanges without credentials or support as unusable", () => {
    const config = loadConfig({
      EXCHANGES: "kraken,mystery",
      MYSTERY_API_KEY: "test-key",
      MYSTERY_API_SECRET: "test-secret",
    });

    const { jobs } = buildJobs(config, factories());

    expect(jobs.map((job) => [job.source, job.unusableReason])).toEqual([
      ["kraken", "missing API key or secret"],
      [
        "mystery",
        "unsupported exchange (supported: binance, bitstamp, bybit, coinbase, kraken, kucoin, okx)",
      ],
      ["debank_eth", "no EVM addresses"],
    ]);
  });

  it("should build one on-chain stream per address and chain", () => {
    const config = loadConfig({
      EVM_ADDRESSES: "0xAA,0xbb",
      DEBANK_API_KEY: "test-key",
      DEBANK_CHAINS: "eth,arb",
    });

    const { jobs, tokenProvider } = buildJobs(config, factories());

    expect(
      jobs.map((job) => [
        job.source,
        job.domain,
        job.streams.map((stream) => stream.label),
      ])
    ).toEqual([
      ["debank_eth", "onchain", ["0xaa", "0xbb"]],
      ["debank_arb", "onchain", ["0xaa", "0xbb"]],
    ]);
    expect(tokenProvider).toBeInstanceOf(DebankClient);
  });

  it("should mark chains unusable without addresses or a key", () => {
    expect(
      buildJobs(loadConfig({ DEBANK_API_KEY: "test-key" }), factories()).jobs[0]
        ?.unusableReason
    ).toBe("no EVM addresses");
    expect(
      buildJobs(loadConfig({ EVM_ADDRESSES: "0xaa" }), factories()).jobs[0]
        ?.unusableReason
    ).toBe("missing DEBANK_API_KEY");
  });

  it("should add a node job when an RPC endpoint is set", async () => {
    const config = loadConfig({
      EVM_ADDRESSES: "0xAA",
      ETH_RPC_URL: "http://localhost:8545",
    });

    const { jobs, tokenProvider } = buildJobs(config, factories());

    expect(
      jobs.map((job) => [job.source, job.domain, job.unusableReason])
    ).toEqual([
      ["debank_eth", "onchain", "missing DEBANK_API_KEY"],
      ["rpc_eth", "onchain", undefined],
    ]);
    expect(jobs[1]?.streams.map((stream) => [stream.entity, stream.label])).toEqual([
      ["transfers", "0xaa"],
    ]);
    expect(tokenProvider).toBeInstanceOf(EvmRpcClient);
    expect(
      await tokenProvider?.lookup("eth", "0x00000000000000000000000000000000000000dd")
    ).toEqual({ symbol: "NODE", decimals: 18 });
  });

  it("should leave the node job out without an RPC endpoint", () => {
    const { jobs } = buildJobs(loadConfig({ EVM_ADDRESSES: "0xaa" }), factories());

    expect(jobs.map((job) => job.source)).toEqual(["debank_eth"]);
  });
});
