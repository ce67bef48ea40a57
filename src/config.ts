/**
 * Application configuration
 *
 * Environment variables (optionally from `.env`) are validated against a
 * TypeBox schema and mapped into a typed `AppConfig`. Validation failures are
 * fatal at startup; per-source gaps such as missing credentials are not, they
 * only mark that source unusable.
 */

import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";
import { toUtcInstant } from "./services/sync/canonical/timestamps.js";

// ============================================================================
// Types
// ============================================================================

export interface ExchangeConfig {
  /** ccxt exchange id, e.g. `binance` */
  id: string;
  apiKey?: string;
  secret?: string;
  password?: string;
  /** Currencies to probe one by one for deposits and withdrawals */
  transferCurrencies: string[];
  /** Market symbols to probe one by one for trades */
  tradeSymbols: string[];
}

export interface SyncSettings {
  overlapMinutes: number;
  pageSize: number;
  maxPages: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  rateLimitPerMinute: number;
  upsertChunkSize: number;
}

export interface AppConfig {
  startTs: Date;
  dbPath: string;
  databaseUrl?: string;
  dataDir: string;
  exchanges: ExchangeConfig[];
  evmAddresses: string[];
  debankApiKey?: string;
  debankChains: string[];
  /** JSON-RPC endpoint for reading ERC-20 transfer logs on Ethereum */
  ethRpcUrl?: string;
  rpcBlockRange: number;
  filterScam: boolean;
  sync: SyncSettings;
  server: { port: number; host: string };
}

// ============================================================================
// Schema
// ============================================================================

const EnvSchema = Type.Object({
  START_TS: Type.String({ default: "2021-01-01T00:00:00Z" }),
  DB_PATH: Type.String({ minLength: 1, default: "./data/ledger.db" }),
  DATABASE_URL: Type.Optional(Type.String()),
  DATA_DIR: Type.String({ minLength: 1, default: "./data/curated" }),
  EXCHANGES: Type.String({ default: "" }),
  EVM_ADDRESSES: Type.String({ default: "" }),
  DEBANK_API_KEY: Type.Optional(Type.String()),
  DEBANK_CHAINS: Type.String({ default: "eth" }),
  ETH_RPC_URL: Type.Optional(Type.String()),
  RPC_BLOCK_RANGE: Type.Integer({ minimum: 1, default: 2000 }),
  FILTER_SCAM: Type.Boolean({ default: true }),
  SYNC_OVERLAP_MINUTES: Type.Integer({ minimum: 0, default: 60 }),
  PAGE_SIZE: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }),
  MAX_PAGES: Type.Integer({ minimum: 1, default: 50 }),
  RETRY_MAX_ATTEMPTS: Type.Integer({ minimum: 1, maximum: 10, default: 3 }),
  RETRY_BASE_DELAY_MS: Type.Integer({ minimum: 0, default: 1000 }),
  RETRY_MAX_DELAY_MS: Type.Integer({ minimum: 0, default: 30_000 }),
  RATE_LIMIT_PER_MINUTE: Type.Integer({ minimum: 1, default: 60 }),
  UPSERT_CHUNK_SIZE: Type.Integer({ minimum: 1, default: 200 }),
  PORT: Type.Integer({ minimum: 1, maximum: 65_535, default: 3000 }),
  HOST: Type.String({ default: "0.0.0.0" }),
});

type Env = Static<typeof EnvSchema>;

/** Providers that reject deposit/withdrawal queries without a currency */
const DEFAULT_TRANSFER_CURRENCIES: Record<string, string[]> = {
  coinbase: ["EUR", "USD", "USDC", "EURC", "BTC", "ETH", "LINK"],
};

// ============================================================================
// Helpers
// ============================================================================

export function splitList(value: string | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed === "" ? undefined : trimmed;
}

/**
 * Pick the variables the schema knows, treating blank values as unset.
 */
function pickEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = optional(env[key]);
    if (value !== undefined) {
      picked[key] = value;
    }
  }
  return picked;
}

function parseEnv(env: NodeJS.ProcessEnv): Env {
  const candidate = Value.Convert(
    EnvSchema,
    Value.Default(EnvSchema, pickEnv(env))
  );

  if (!Value.Check(EnvSchema, candidate)) {
    const problems = [...Value.Errors(EnvSchema, candidate)].map(
      (error) => `${error.path.replace(/^\//, "")}: ${error.message}`
    );
    throw new ConfigError("Invalid configuration", { problems });
  }

  return candidate;
}

export function exchangeEnvPrefix(exchangeId: string): string {
  return exchangeId.toUpperCase().replace(/[^A-Z0-9]/g, "_");
}

function loadExchange(id: string, env: NodeJS.ProcessEnv): ExchangeConfig {
  const prefix = exchangeEnvPrefix(id);
  const currencies = splitList(env[`${prefix}_TRANSFER_CURRENCIES`]).map(
    (currency) => currency.toUpperCase()
  );

  const symbols = splitList(env[`${prefix}_TRADE_SYMBOLS`]).map((symbol) =>
    symbol.toUpperCase()
  );

  return {
    id,
    apiKey: optional(env[`${prefix}_API_KEY`]),
    secret: optional(env[`${prefix}_API_SECRET`]),
    password: optional(env[`${prefix}_PASSWORD`]),
    transferCurrencies:
      currencies.length > 0
        ? unique(currencies)
        : (DEFAULT_TRANSFER_CURRENCIES[id] ?? []),
    tradeSymbols: unique(symbols),
  };
}

// ============================================================================
// Loader
// ============================================================================

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseEnv(env);

  const startTs = toUtcInstant(parsed.START_TS);
  if (startTs === null) {
    throw new ConfigError("Invalid configuration", {
      problems: [`START_TS: cannot parse '${parsed.START_TS}'`],
    });
  }

  const exchangeIds = unique(
    splitList(parsed.EXCHANGES).map((id) => id.toLowerCase())
  );

  return {
    startTs,
    dbPath: parsed.DB_PATH,
    databaseUrl: parsed.DATABASE_URL,
    dataDir: parsed.DATA_DIR,
    exchanges: exchangeIds.map((id) => loadExchange(id, env)),
    evmAddresses: unique(
      splitList(parsed.EVM_ADDRESSES).map((address) => address.toLowerCase())
    ),
    debankApiKey: parsed.DEBANK_API_KEY,
    debankChains: unique(
      splitList(parsed.DEBANK_CHAINS).map((chain) => chain.toLowerCase())
    ),
    ethRpcUrl: parsed.ETH_RPC_URL,
    rpcBlockRange: parsed.RPC_BLOCK_RANGE,
    filterScam: parsed.FILTER_SCAM,
    sync: {
      overlapMinutes: parsed.SYNC_OVERLAP_MINUTES,
      pageSize: parsed.PAGE_SIZE,
      maxPages: parsed.MAX_PAGES,
      retryMaxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      retryBaseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: parsed.RETRY_MAX_DELAY_MS,
      rateLimitPerMinute: parsed.RATE_LIMIT_PER_MINUTE,
      upsertChunkSize: parsed.UPSERT_CHUNK_SIZE,
    },
    server: { port: parsed.PORT, host: parsed.HOST },
  };
}
