/**
 * JSON-RPC client for ERC-20 transfer logs
 *
 * Reads `Transfer(address,address,uint256)` logs that move tokens out of or
 * into an owned address, straight from an EVM node. A page walks block ranges
 * forward from the first block at or after the sync start until it has
 * collected a page worth of logs or reaches the chain head seen on the first
 * page. The cursor is `<nextBlock>:<headBlock>`.
 */

import { ethers } from "ethers";

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
import type { RunContext } from "../services/sync/run-context.js";
import type {
  FetchPageRequest,
  PageFetcher,
} from "../services/sync/types.js";
import type { Erc20TransferPayload, RawSourceRecord } from "../types/raw.js";

export const TRANSFER_TOPIC = ethers.id("Transfer(address,address,uint256)");

const ERC20_ABI = [
  "function symbol() view returns (string)",
  "function decimals() view returns (uint8)",
];

// ============================================================================
// Types
// ============================================================================

export interface EvmLog {
  transactionHash: string;
  index: number;
  blockNumber: number;
  address: string;
  topics: readonly string[];
  data: string;
}

export interface EvmLogFilter {
  fromBlock: number;
  toBlock: number;
  topics: (string | null)[];
}

/** The node calls this client makes */
export interface EvmChainApi {
  getBlockNumber(): Promise<number>;
  getBlockTimestamp(blockNumber: number): Promise<number | null>;
  getLogs(filter: EvmLogFilter): Promise<EvmLog[]>;
  getTokenMetadata(token: string): Promise<TokenMetadata | null>;
}

export interface EvmRpcClientOptions {
  /** Chain id the node serves, e.g. `eth` */
  chain: string;
  /** Blocks per `eth_getLogs` call */
  blockRange: number;
}

interface BlockCursor {
  nextBlock: number;
  headBlock: number;
}

// ============================================================================
// Helpers
// ============================================================================

export function rpcSource(chain: string): string {
  return `rpc_${chain}`;
}

/**
 * Timeouts, connectivity and node-side errors are worth retrying; anything
 * else (bad arguments, unsupported calls) is not.
 */
export function classifyRpcError(error: unknown): FetchErrorKind {
  if (error instanceof FetchError) {
    return error.kind;
  }
  return ethers.isError(error, "TIMEOUT") ||
    ethers.isError(error, "NETWORK_ERROR") ||
    ethers.isError(error, "SERVER_ERROR")
    ? "transient"
    : "permanent";
}

export function encodeBlockCursor(cursor: BlockCursor): string {
  return `${String(cursor.nextBlock)}:${String(cursor.headBlock)}`;
}

export function decodeBlockCursor(cursor: string | null): BlockCursor | null {
  if (cursor === null) {
    return null;
  }
  const match = /^(\d+):(\d+)$/.exec(cursor);
  if (match === null) {
    return null;
  }
  return { nextBlock: Number(match[1]), headBlock: Number(match[2]) };
}

/** Address held in an indexed topic */
function topicAddress(topic: string): string {
  return ethers.getAddress(ethers.dataSlice(topic, 12)).toLowerCase();
}

/**
 * Node access through an ethers provider.
 */
export function createEvmChainApi(rpcUrl: string): EvmChainApi {
  const provider = new ethers.JsonRpcProvider(rpcUrl);

  return {
    getBlockNumber: () => provider.getBlockNumber(),
    async getBlockTimestamp(blockNumber) {
      const block = await provider.getBlock(blockNumber);
      return block === null ? null : block.timestamp;
    },
    getLogs: (filter) => provider.getLogs(filter),
    async getTokenMetadata(token) {
      const contract = new ethers.Contract(token, ERC20_ABI, provider);
      const symbol: unknown = await contract.getFunction("symbol").staticCall();
      const decimals: unknown = await contract
        .getFunction("decimals")
        .staticCall();
      if (typeof symbol !== "string" || symbol === "") {
        return null;
      }
      if (typeof decimals === "bigint" || typeof decimals === "number") {
        return { symbol, decimals: Number(decimals) };
      }
      return null;
    },
  };
}

// ============================================================================
// EVM RPC Client
// ============================================================================

export class EvmRpcClient implements TokenMetadataProvider {
  private readonly source: string;
  private readonly blockTimes = new Map<number, number>();

  constructor(
    private readonly api: EvmChainApi,
    private readonly options: EvmRpcClientOptions
  ) {
    this.source = rpcSource(options.chain);
  }

  /**
   * Token metadata read from the token contract. Other chains give null.
   */
  async lookup(chain: string, tokenId: string): Promise<TokenMetadata | null> {
    if (chain !== this.options.chain || !ethers.isAddress(tokenId)) {
      return null;
    }
    return await this.api.getTokenMetadata(tokenId);
  }

  private async blockTimestamp(
    blockNumber: number,
    ctx: RunContext
  ): Promise<number> {
    const cached = this.blockTimes.get(blockNumber);
    if (cached !== undefined) {
      return cached;
    }

    await ctx.throttle(this.source);
    const timestamp = await this.api.getBlockTimestamp(blockNumber);
    if (timestamp === null) {
      throw new FetchError(
        `Block ${String(blockNumber)} not available`,
        "transient",
        this.source
      );
    }
    this.blockTimes.set(blockNumber, timestamp);
    return timestamp;
  }

  /**
   * First block at or after the given time; `head + 1` when every block is
   * older.
   */
  async firstBlockAtOrAfter(
    since: Date,
    head: number,
    ctx: RunContext
  ): Promise<number> {
    const target = Math.floor(since.getTime() / 1000);
    let low = 0;
    let high = head + 1;

    while (low < high) {
      const middle = Math.floor((low + high) / 2);
      if ((await this.blockTimestamp(middle, ctx)) < target) {
        low = middle + 1;
      } else {
        high = middle;
      }
    }
    return low;
  }

  private async transferLogs(
    owner: string,
    fromBlock: number,
    toBlock: number,
    ctx: RunContext
  ): Promise<EvmLog[]> {
    const ownerTopic = ethers.zeroPadValue(owner, 32);
    const byKey = new Map<string, EvmLog>();

    for (const topics of [
      [TRANSFER_TOPIC, ownerTopic, null],
      [TRANSFER_TOPIC, null, ownerTopic],
    ]) {
      await ctx.throttle(this.source);
      const logs = await this.api.getLogs({ fromBlock, toBlock, topics });
      for (const log of logs) {
        // ERC-721 transfers index the token id as a fourth topic
        if (log.topics.length !== 3) {
          continue;
        }
        byKey.set(`${log.transactionHash}:${String(log.index)}`, log);
      }
    }

    return [...byKey.values()].sort(
      (a, b) => a.blockNumber - b.blockNumber || a.index - b.index
    );
  }

  private async toPayload(
    log: EvmLog,
    ctx: RunContext
  ): Promise<Erc20TransferPayload> {
    const [, fromTopic = "", toTopic = ""] = log.topics;
    return {
      transactionHash: log.transactionHash,
      logIndex: log.index,
      blockNumber: log.blockNumber,
      timestamp: await this.blockTimestamp(log.blockNumber, ctx),
      token: log.address.toLowerCase(),
      from: topicAddress(fromTopic),
      to: topicAddress(toTopic),
      value: (log.data === "0x" ? 0n : BigInt(log.data)).toString(),
      topics: [...log.topics],
      data: log.data,
    };
  }

  /**
   * Paged transfer logs of one address.
   */
  transferLogFetcher(address: string): PageFetcher {
    const owner = address.toLowerCase();
    const { chain, blockRange } = this.options;

    return {
      fetchPage: async (
        request: FetchPageRequest
      ): Promise<FetchOutcome<RawSourceRecord>> => {
        const ctx = request.ctx;
        const records: RawSourceRecord[] = [];
        let position = decodeBlockCursor(request.cursor);

        try {
          if (position === null) {
            await ctx.throttle(this.source);
            const headBlock = await this.api.getBlockNumber();
            position = {
              nextBlock: await this.firstBlockAtOrAfter(
                request.since,
                headBlock,
                ctx
              ),
              headBlock,
            };
          }

          while (
            position.nextBlock <= position.headBlock &&
            records.length < request.pageSize &&
            !ctx.cancelled
          ) {
            const toBlock = Math.min(
              position.nextBlock + blockRange - 1,
              position.headBlock
            );
            const logs = await this.transferLogs(
              owner,
              position.nextBlock,
              toBlock,
              ctx
            );
            for (const log of logs) {
              records.push({
                family: "erc20-transfer",
                source: this.source,
                chain,
                owner,
                payload: await this.toPayload(log, ctx),
              });
            }
            position = { ...position, nextBlock: toBlock + 1 };
          }
        } catch (error) {
          const kind = classifyRpcError(error);
          const failure = new FetchError(
            `eth_getLogs failed: ${errorMessage(error)}`,
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
            owner,
            count: records.length,
            nextBlock: position.nextBlock,
            headBlock: position.headBlock,
          },
          "Fetched transfer logs"
        );

        return success(
          records,
          position.nextBlock > position.headBlock
            ? null
            : encodeBlockCursor(position)
        );
      },
    };
  }
}
