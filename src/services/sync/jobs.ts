/**
 * Source jobs from configuration
 *
 * Every configured exchange and every DeBank chain becomes one job, plus an
 * Ethereum node job when an RPC endpoint is set. A job whose configuration is
 * incomplete is still returned, marked unusable, so the run can report it as
 * skipped.
 */

import {
  combineProviders,
  type TokenMetadataProvider,
} from "./canonical/token-metadata.js";
import {
  CcxtExchangeClient,
  SUPPORTED_EXCHANGES,
  createExchangeApi,
  type ExchangeApi,
  type ExchangeCredentials,
} from "../../clients/ccxt-exchange.js";
import { DebankClient, debankSource } from "../../clients/debank.js";
import {
  EvmRpcClient,
  createEvmChainApi,
  rpcSource,
} from "../../clients/evm-rpc.js";

import type { SourceJob } from "./types.js";
import type { AppConfig, ExchangeConfig } from "../../config.js";

// ============================================================================
// Types
// ============================================================================

export interface BuiltJobs {
  jobs: SourceJob[];
  /** Token lookups for the run context; absent without DeBank or a node */
  tokenProvider?: TokenMetadataProvider;
}

export interface JobFactories {
  createExchangeApi: (
    exchangeId: string,
    credentials: ExchangeCredentials
  ) => ExchangeApi | null;
  createDebankClient: (apiKey: string) => DebankClient;
  createEvmClient: (rpcUrl: string, blockRange: number) => EvmRpcClient;
}

/** Chain served by `ETH_RPC_URL` */
const RPC_CHAIN = "eth";

const DEFAULT_FACTORIES: JobFactories = {
  createExchangeApi,
  createDebankClient: (apiKey) => new DebankClient({ apiKey }),
  createEvmClient: (rpcUrl, blockRange) =>
    new EvmRpcClient(createEvmChainApi(rpcUrl), {
      chain: RPC_CHAIN,
      blockRange,
    }),
};

// ============================================================================
// Builders
// ============================================================================

function exchangeJob(
  exchange: ExchangeConfig,
  factories: JobFactories
): SourceJob {
  const base = { source: exchange.id, domain: "exchange" as const };

  if (exchange.apiKey === undefined || exchange.secret === undefined) {
    return {
      ...base,
      streams: [],
      unusableReason: "missing API key or secret",
    };
  }

  const api = factories.createExchangeApi(exchange.id, {
    apiKey: exchange.apiKey,
    secret: exchange.secret,
    password: exchange.password,
  });
  if (api === null) {
    return {
      ...base,
      streams: [],
      unusableReason: `unsupported exchange (supported: ${SUPPORTED_EXCHANGES.join(", ")})`,
    };
  }

  const client = new CcxtExchangeClient(exchange.id, api, {
    transferCurrencies: exchange.transferCurrencies,
    tradeSymbols: exchange.tradeSymbols,
  });
  return { ...base, streams: client.streams() };
}

function onchainJob(
  chain: string,
  config: AppConfig,
  client: DebankClient | null
): SourceJob {
  const base = { source: debankSource(chain), domain: "onchain" as const };

  if (config.evmAddresses.length === 0) {
    return { ...base, streams: [], unusableReason: "no EVM addresses" };
  }
  if (client === null) {
    return { ...base, streams: [], unusableReason: "missing DEBANK_API_KEY" };
  }

  return {
    ...base,
    streams: config.evmAddresses.map((address) => ({
      entity: "transfers" as const,
      label: address,
      fetcher: client.historyFetcher(chain, address),
    })),
  };
}

function rpcJob(config: AppConfig, client: EvmRpcClient): SourceJob {
  const base = { source: rpcSource(RPC_CHAIN), domain: "onchain" as const };

  if (config.evmAddresses.length === 0) {
    return { ...base, streams: [], unusableReason: "no EVM addresses" };
  }

  return {
    ...base,
    streams: config.evmAddresses.map((address) => ({
      entity: "transfers" as const,
      label: address,
      fetcher: client.transferLogFetcher(address),
    })),
  };
}

/**
 * Build one job per configured exchange, per DeBank chain and for the
 * Ethereum node.
 */
export function buildJobs(
  config: AppConfig,
  factories: JobFactories = DEFAULT_FACTORIES
): BuiltJobs {
  const debank =
    config.debankApiKey === undefined
      ? null
      : factories.createDebankClient(config.debankApiKey);

  const rpc =
    config.ethRpcUrl === undefined
      ? null
      : factories.createEvmClient(config.ethRpcUrl, config.rpcBlockRange);

  const jobs = [
    ...config.exchanges.map((exchange) => exchangeJob(exchange, factories)),
    ...config.debankChains.map((chain) => onchainJob(chain, config, debank)),
    ...(rpc === null ? [] : [rpcJob(config, rpc)]),
  ];

  const providers: TokenMetadataProvider[] = [];
  if (debank !== null) {
    providers.push(debank);
  }
  if (rpc !== null) {
    providers.push(rpc);
  }

  const tokenProvider = combineProviders(providers);
  return tokenProvider === undefined ? { jobs } : { jobs, tokenProvider };
}
