/**
 * Run Context - state scoped to one ingestion run
 *
 * Owns everything that would otherwise live in module-level variables:
 * the token metadata cache, the rate-limit clock per source, the
 * cancellation signal and request counters.
 */

import {
  TokenMetadataResolver,
  type TokenMetadataProvider,
} from "./canonical/token-metadata.js";
import { fetchLogger } from "../../logger.js";

import type { NormalizeContext } from "./canonical/shared.js";

// ============================================================================
// Types
// ============================================================================

export type Sleep = (ms: number) => Promise<void>;

export interface RunContextOptions {
  rateLimitPerMinute?: number;
  tokenProvider?: TokenMetadataProvider;
  signal?: AbortSignal;
  /** Injected for tests */
  sleep?: Sleep;
  now?: () => number;
}

export interface RunStats {
  requests: number;
  throttledMs: number;
}

// ============================================================================
// Helpers
// ============================================================================

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

// ============================================================================
// RunContext
// ============================================================================

export class RunContext implements NormalizeContext {
  readonly tokens: TokenMetadataResolver;
  readonly signal: AbortSignal;
  readonly startedAt: Date;
  readonly sleep: Sleep;
  readonly stats: RunStats = { requests: 0, throttledMs: 0 };

  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly lastRequestAt = new Map<string, number>();

  constructor(options: RunContextOptions = {}) {
    const perMinute = options.rateLimitPerMinute ?? 60;
    this.minIntervalMs = perMinute > 0 ? Math.ceil(60_000 / perMinute) : 0;
    this.tokens = new TokenMetadataResolver(options.tokenProvider);
    this.signal = options.signal ?? new AbortController().signal;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.startedAt = new Date(this.now());
  }

  get cancelled(): boolean {
    return this.signal.aborted;
  }

  currentTime(): Date {
    return new Date(this.now());
  }

  /**
   * Wait until the source's next request slot, then claim it.
   */
  async throttle(source: string): Promise<void> {
    const last = this.lastRequestAt.get(source);
    if (last !== undefined) {
      const elapsed = this.now() - last;
      if (elapsed < this.minIntervalMs) {
        const waitTime = this.minIntervalMs - elapsed;
        fetchLogger.debug(
          { source, waitTime },
          "Rate limiting: waiting before request"
        );
        this.stats.throttledMs += waitTime;
        await this.sleep(waitTime);
      }
    }

    this.lastRequestAt.set(source, this.now());
    this.stats.requests++;
  }
}
