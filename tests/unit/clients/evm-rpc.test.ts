import { ethers } from "ethers";
import { describe, it, expect, vi, type Mock } from "vitest";

import {
  EvmRpcClient,
  TRANSFER_TOPIC,
  classifyRpcError,
  decodeBlockCursor,
  rpcSource,
  type EvmChainApi,
  type EvmLog,
  type EvmLogFilter,
} from "../../../src/clients/evm-rpc.js";
import { FetchError } from "../../../src/errors.js";
import { RunContext } from "../../../src/services/sync/run-context.js";
import { COUNTERPARTY, OWNER, USDC_ETH } from "../../fixtures/ledger.js";

const GENESIS_SECONDS = 1_710_000_000;
const HEAD = 99;
const OTHER_TOKEN = "0x00000000000000000000000000000000000000dd";

function blockTime(blockNumber: number): number {
  return GENESIS_SECONDS + 12 * blockNumber;
}

function topic(address: string): string {
  return ethers.zeroPadValue(address, 32);
}

function transferLog(
  overrides: Partial<EvmLog> & { from: string; to: string; value: bigint }
): EvmLog {
  const { from, to, value, ...log } = overrides;
  return {
    transactionHash: "0xt1",
    index: 0,
    blockNumber: 10,
    address: USDC_ETH,
    topics: [TRANSFER_TOPIC, topic(from), topic(to)],
    data: ethers.toBeHex(value, 32),
    ...log,
  };
}

const OUTGOING = transferLog({
  transactionHash: "0xt1",
  index: 3,
  from: OWNER,
  to: COUNTERPARTY,
  value: 2_500_000n,
});
const INCOMING = transferLog({
  transactionHash: "0xt2",
  index: 5,
  address: OTHER_TOKEN,
  from: COUNTERPARTY,
  to: OWNER,
  value: 10n ** 18n,
});
const NFT: EvmLog = {
  ...transferLog({ blockNumber: 20, from: COUNTERPARTY, to: OWNER, value: 0n }),
  topics: [TRANSFER_TOPIC, topic(COUNTERPARTY), topic(OWNER), topic("0x01")],
  data: "0x",
};

function matches(log: EvmLog, filter: EvmLogFilter): boolean {
  return (
    log.blockNumber >= filter.fromBlock &&
    log.blockNumber <= filter.toBlock &&
    filter.topics.every(
      (wanted, position) =>
        wanted === null || log.topics[position]?.toLowerCase() === wanted.toLowerCase()
    )
  );
}

function fakeChain(logs: EvmLog[]): EvmChainApi & {
  getLogs: Mock<EvmChainApi["getLogs"]>;
  getBlockNumber: Mock<EvmChainApi["getBlockNumber"]>;
} {
  return {
    getBlockNumber: vi.fn<EvmChainApi["getBlockNumber"]>(() => Promise.resolve(HEAD)),
    getBlockTimestamp: (blockNumber) =>
      Promise.resolve(blockNumber <= HEAD ? blockTime(blockNumber) : null),
    getLogs: vi.fn<EvmChainApi["getLogs"]>((filter) =>
      Promise.resolve(logs.filter((log) => matches(log, filter)))
    ),
    getTokenMetadata: () => Promise.resolve({ symbol: "PEPE", decimals: 18 }),
  };
}

function context(): RunContext {
  return new RunContext({
    rateLimitPerMinute: 60_000,
    sleep: () => Promise.resolve(),
  });
}

function sinceBlock(blockNumber: number): Date {
  return new Date(blockTime(blockNumber) * 1000);
}

describe("EvmRpcClient", () => {
  describe("transferLogFetcher", () => {
    it("should read logs in and out of the owner from the first block in the window", async () => {
      const chain = fakeChain([OUTGOING, INCOMING, NFT]);
      const fetcher = new EvmRpcClient(chain, { chain: "eth", blockRange: 50 })
        .transferLogFetcher(OWNER);

      const outcome = await fetcher.fetchPage({
        since: sinceBlock(5),
        cursor: null,
        pageSize: 100,
        ctx: context(),
      });

      expect(outcome.kind === "success" && outcome.nextCursor).toBeNull();
      expect(outcome.kind === "success" && outcome.records).toMatchObject([
        {
          family: "erc20-transfer",
          source: "rpc_eth",
          chain: "eth",
          owner: OWNER,
          payload: {
            transactionHash: "0xt1",
            logIndex: 3,
            blockNumber: 10,
            timestamp: blockTime(10),
            token: USDC_ETH,
            from: OWNER,
            to: COUNTERPARTY,
            value: "2500000",
          },
        },
        {
          payload: {
            transactionHash: "0xt2",
            logIndex: 5,
            token: OTHER_TOKEN,
            from: COUNTERPARTY,
            to: OWNER,
            value: "1000000000000000000",
          },
        },
      ]);
      expect(chain.getLogs.mock.calls.map(([filter]) => [filter.fromBlock, filter.toBlock])).toEqual([
        [5, 54],
        [5, 54],
        [55, 99],
        [55, 99],
      ]);
    });

    it("should stop a page once it holds enough logs and resume from the cursor", async () => {
      const chain = fakeChain([OUTGOING, INCOMING]);
      const fetcher = new EvmRpcClient(chain, { chain: "eth", blockRange: 10 })
        .transferLogFetcher(OWNER);
      const ctx = context();

      const first = await fetcher.fetchPage({
        since: sinceBlock(0),
        cursor: null,
        pageSize: 1,
        ctx,
      });
      expect(first.kind === "success" && first.records).toHaveLength(2);
      expect(first.kind === "success" && first.nextCursor).toBe("20:99");

      const second = await fetcher.fetchPage({
        since: sinceBlock(0),
        cursor: "20:99",
        pageSize: 1,
        ctx,
      });
      expect(second).toEqual({ kind: "success", records: [], nextCursor: null });
      expect(chain.getBlockNumber).toHaveBeenCalledTimes(1);
    });

    it("should keep a self-transfer once", async () => {
      const self = transferLog({ from: OWNER, to: OWNER, value: 1n });
      const fetcher = new EvmRpcClient(fakeChain([self]), { chain: "eth", blockRange: 100 })
        .transferLogFetcher(OWNER);

      const outcome = await fetcher.fetchPage({
        since: sinceBlock(0),
        cursor: null,
        pageSize: 100,
        ctx: context(),
      });

      expect(outcome.kind === "success" && outcome.records).toHaveLength(1);
    });

    it("should finish at once when the window starts after the head", async () => {
      const chain = fakeChain([OUTGOING]);
      const fetcher = new EvmRpcClient(chain, { chain: "eth", blockRange: 100 })
        .transferLogFetcher(OWNER);

      const outcome = await fetcher.fetchPage({
        since: sinceBlock(HEAD + 1),
        cursor: null,
        pageSize: 100,
        ctx: context(),
      });

      expect(outcome).toEqual({ kind: "success", records: [], nextCursor: null });
      expect(chain.getLogs).not.toHaveBeenCalled();
    });

    it("should classify node failures", async () => {
      const timeout = fakeChain([]);
      timeout.getLogs.mockRejectedValue(ethers.makeError("request timed out", "TIMEOUT"));
      const rejected = fakeChain([]);
      rejected.getLogs.mockRejectedValue(new Error("query returned more than 10000 results"));
      const request = { since: sinceBlock(0), cursor: null, pageSize: 10, ctx: context() };

      const transient = await new EvmRpcClient(timeout, { chain: "eth", blockRange: 100 })
        .transferLogFetcher(OWNER)
        .fetchPage(request);
      const permanent = await new EvmRpcClient(rejected, { chain: "eth", blockRange: 100 })
        .transferLogFetcher(OWNER)
        .fetchPage(request);

      expect(transient.kind).toBe("transient-failure");
      expect(permanent.kind !== "success" && permanent.error.message).toBe(
        "eth_getLogs failed: query returned more than 10000 results"
      );
      expect(permanent.kind).toBe("permanent-failure");
    });
  });

  describe("lookup", () => {
    it("should read token contracts on its own chain only", async () => {
      const client = new EvmRpcClient(fakeChain([]), { chain: "eth", blockRange: 100 });

      expect(await client.lookup("eth", OTHER_TOKEN)).toEqual({ symbol: "PEPE", decimals: 18 });
      expect(await client.lookup("arb", OTHER_TOKEN)).toBeNull();
      expect(await client.lookup("eth", "eth")).toBeNull();
    });
  });
});

describe("evm rpc helpers", () => {
  it("should name sources by chain", () => {
    expect(rpcSource("eth")).toBe("rpc_eth");
  });

  it("should decode only well-formed cursors", () => {
    expect(decodeBlockCursor("20:99")).toEqual({ nextBlock: 20, headBlock: 99 });
    expect(decodeBlockCursor("20")).toBeNull();
    expect(decodeBlockCursor(null)).toBeNull();
  });

  it("should retry only timeouts, network and server errors", () => {
    expect(classifyRpcError(ethers.makeError("down", "NETWORK_ERROR"))).toBe("transient");
    expect(classifyRpcError(ethers.makeError("bad", "INVALID_ARGUMENT"))).toBe("permanent");
    expect(classifyRpcError(new FetchError("missing block", "transient", "rpc_eth"))).toBe(
      "transient"
    );
  });
});
