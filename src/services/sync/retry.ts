/**
 * Retry policy for page fetches
 *
 * Fetchers report their result as a typed outcome instead of throwing.
 * Transient failures are retried with exponential backoff up to
 * `maxAttempts`; permanent failures are returned immediately.
 */

import { FetchError, errorMessage } from "../../errors.js";
import { fetchLogger } from "../../logger.js";

import type { Sleep } from "./run-context.js";

// ============================================================================
// Types
// ============================================================================

export type FetchOutcome<T> =
  | { kind: "success"; records: T[]; nextCursor: string | null }
  | { kind: "transient-failure"; error: Error }
  | { kind: "permanent-failure"; error: Error };

export type FetchFailure<T> = Exclude<FetchOutcome<T>, { kind: "success" }>;

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions {
  source: string;
  sleep: Sleep;
  signal?: AbortSignal;
}

export interface RetryResult<T> {
  outcome: FetchOutcome<T>;
  attempts: number;
}

// ============================================================================
// Outcome constructors
// ============================================================================

export function success<T>(
  records: T[],
  nextCursor: string | null = null
): FetchOutcome<T> {
  return { kind: "success", records, nextCursor };
}

export function transientFailure<T>(error: Error): FetchOutcome<T> {
  return { kind: "transient-failure", error };
}

export function permanentFailure<T>(error: Error): FetchOutcome<T> {
  return { kind: "permanent-failure", error };
}

/**
 * Turn an exception that escaped a fetcher into an outcome. Only a
 * `FetchError` marked transient is retried.
 */
export function outcomeFromError<T>(error: unknown): FetchFailure<T> {
  const wrapped =
    error instanceof Error ? error : new Error(errorMessage(error));
  if (error instanceof FetchError && error.kind === "transient") {
    return { kind: "transient-failure", error: wrapped };
  }
  return { kind: "permanent-failure", error: wrapped };
}

// ============================================================================
// Backoff
// ============================================================================

/**
 * Delay before the given retry (1-based): base * 2^(attempt - 1), capped.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<FetchOutcome<T>>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let attempt = 0;

  for (;;) {
    attempt++;

    let outcome: FetchOutcome<T>;
    try {
      outcome = await operation(attempt);
    } catch (error) {
      outcome = outcomeFromError<T>(error);
    }

    if (outcome.kind !== "transient-failure") {
      return { outcome, attempts: attempt };
    }

    if (attempt >= maxAttempts || options.signal?.aborted === true) {
      fetchLogger.warn(
        {
          source: options.source,
          attempt,
          error: outcome.error.message,
        },
        "Giving up after transient failures"
      );
      return { outcome, attempts: attempt };
    }

    const delay = backoffDelay(policy, attempt);
    fetchLogger.warn(
      {
        source: options.source,
        attempt,
        nextAttemptInMs: delay,
        error: outcome.error.message,
      },
      "Transient fetch failure, retrying"
    );
    await options.sleep(delay);
  }
}
