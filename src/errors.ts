/**
 * Error taxonomy for the ingestion engine.
 *
 * Fetch and normalization problems are usually carried as typed results
 * rather than thrown; these classes exist for the cases that do cross a
 * throw boundary (config loading, store calls, client adapters).
 */

export type FetchErrorKind = "transient" | "permanent";

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;

  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class FetchError extends Error {
  code = "FETCH_ERROR" as const;

  constructor(
    message: string,
    readonly kind: FetchErrorKind,
    readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FetchError";
  }
}

export class PersistenceError extends Error {
  code = "PERSISTENCE_ERROR" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export class NormalizationError extends Error {
  code = "NORMALIZATION_ERROR" as const;

  constructor(
    message: string,
    readonly source: string,
    readonly externalId: string | null
  ) {
    super(message);
    this.name = "NormalizationError";
  }
}

/**
 * Best-effort message extraction for logging and watermark rows.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
