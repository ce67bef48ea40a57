/**
 * Ingestion Orchestrator - Runs source jobs one after another
 *
 * Flow per source:
 * 1. Skip it when its configuration is unusable
 * 2. Resolve the fetch window from the watermark (or the start timestamp)
 * 3. Page through every stream, each page through the retry policy
 * 4. Per page: scam filter, normalize, canonical check, partition merge, upsert
 * 5. Record the outcome on the watermark
 *
 * A failing source never stops the next one. Cancellation stops the run
 * between pages; only the in-flight page is lost.
 */

import {
  isFlaggedScam,
  normalizeBatch,
  tokenReferences,
} from "./canonical/index.js";
import { PartitionManager } from "./partitions.js";
import { withRetry, type RetryPolicy } from "./retry.js";
import { RunContext, type Sleep } from "./run-context.js";
import { rebuildUnifiedView, type RebuildSummary } from "./unified.js";
import { findRecordProblem, upsertTransactions } from "./upsert.js";
import { SyncWatermarkService } from "./watermarks.js";
import { PersistenceError, errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type { TokenMetadataProvider } from "./canonical/token-metadata.js";
import type { SourceJob, SourceStream } from "./types.js";
import type { SyncSettings } from "../../config.js";
import type { Database } from "../../db/types.js";
import type {
  CanonicalTransaction,
  Domain,
} from "../../types/canonical.js";
import type { RawSourceRecord } from "../../types/raw.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export type SourceRunStatus = "success" | "failed" | "skipped";

export interface SourceRunResult {
  source: string;
  domain: Domain;
  status: SourceRunStatus;
  /** Lower bound the source was fetched from; null when it never started */
  since: Date | null;
  /** The watermark could not be read and the start timestamp was used */
  degraded: boolean;
  pages: number;
  fetched: number;
  scamFiltered: number;
  normalized: number;
  dropped: number;
  invalid: number;
  inserted: number;
  updated: number;
  partitionsWritten: number;
  error?: string;
}

export interface SyncRunSummary {
  startedAt: Date;
  finishedAt: Date;
  cancelled: boolean;
  results: SourceRunResult[];
  unified?: RebuildSummary;
  unifyError?: string;
}

export interface SyncRunOptions {
  /** Ignore watermarks and fetch from the start timestamp */
  full?: boolean;
  /** Rebuild the unified table after the sources ran */
  unify?: boolean;
  /** Only run these sources */
  sources?: string[];
  signal?: AbortSignal;
}

export interface OrchestratorSettings {
  startTs: Date;
  dataDir: string;
  filterScam: boolean;
  sync: SyncSettings;
}

export interface OrchestratorDeps {
  tokenProvider?: TokenMetadataProvider;
  watermarks?: SyncWatermarkService;
  partitions?: PartitionManager;
  /** Injected for tests */
  sleep?: Sleep;
  now?: () => number;
}

export interface SyncProgress {
  source: string;
  entity: string;
  page: number;
  fetched: number;
}

type ProgressCallback = (progress: SyncProgress) => void;

/** Raised inside a source run to end it early */
class SourceAbort extends Error {
  constructor(
    message: string,
    readonly cancelled: boolean
  ) {
    super(message);
    this.name = "SourceAbort";
  }
}

export const CANCELLED_REASON = "cancelled";

// ============================================================================
// Helpers
// ============================================================================

function emptyResult(job: SourceJob): SourceRunResult {
  return {
    source: job.source,
    domain: job.domain,
    status: "skipped",
    since: null,
    degraded: false,
    pages: 0,
    fetched: 0,
    scamFiltered: 0,
    normalized: 0,
    dropped: 0,
    invalid: 0,
    inserted: 0,
    updated: 0,
    partitionsWritten: 0,
  };
}

function selectJobs(jobs: SourceJob[], sources?: string[]): SourceJob[] {
  if (sources === undefined || sources.length === 0) {
    return jobs;
  }
  const wanted = new Set(sources);
  for (const source of wanted) {
    if (!jobs.some((job) => job.source === source)) {
      syncLogger.warn({ source }, "Requested source is not configured");
    }
  }
  return jobs.filter((job) => wanted.has(job.source));
}

// ============================================================================
// Ingestion Orchestrator
// ============================================================================

export class IngestionOrchestrator {
  private readonly watermarks: SyncWatermarkService;
  private readonly partitions: PartitionManager;
  private readonly retryPolicy: RetryPolicy;
  private onProgress?: ProgressCallback;

  constructor(
    private db: Kysely<Database>,
    private settings: OrchestratorSettings,
    private deps: OrchestratorDeps = {}
  ) {
    this.watermarks =
      deps.watermarks ??
      new SyncWatermarkService(db, {
        startTs: settings.startTs,
        overlapMinutes: settings.sync.overlapMinutes,
      });
    this.partitions = deps.partitions ?? new PartitionManager(settings.dataDir);
    this.retryPolicy = {
      maxAttempts: settings.sync.retryMaxAttempts,
      baseDelayMs: settings.sync.retryBaseDelayMs,
      maxDelayMs: settings.sync.retryMaxDelayMs,
    };
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Run the given jobs sequentially.
   */
  async run(
    jobs: SourceJob[],
    options: SyncRunOptions = {}
  ): Promise<SyncRunSummary> {
    const ctx = new RunContext({
      rateLimitPerMinute: this.settings.sync.rateLimitPerMinute,
      tokenProvider: this.deps.tokenProvider,
      signal: options.signal,
      sleep: this.deps.sleep,
      now: this.deps.now,
    });

    const selected = selectJobs(jobs, options.sources);
    const results: SourceRunResult[] = [];

    syncLogger.info(
      { sources: selected.map((job) => job.source), full: options.full ?? false },
      "Starting sync run"
    );

    for (const job of selected) {
      if (ctx.cancelled) {
        results.push({ ...emptyResult(job), error: "run cancelled" });
        continue;
      }
      results.push(await this.runSource(job, ctx, options.full ?? false));
    }

    const summary: SyncRunSummary = {
      startedAt: ctx.startedAt,
      finishedAt: ctx.currentTime(),
      cancelled: ctx.cancelled,
      results,
    };

    if (options.unify === true && !ctx.cancelled) {
      try {
        summary.unified = await rebuildUnifiedView(this.db);
      } catch (error) {
        summary.unifyError = errorMessage(error);
        syncLogger.error(
          { error: summary.unifyError },
          "Unified view rebuild failed"
        );
      }
      summary.finishedAt = ctx.currentTime();
    }

    syncLogger.info(
      {
        succeeded: results.filter((r) => r.status === "success").length,
        failed: results.filter((r) => r.status === "failed").length,
        skipped: results.filter((r) => r.status === "skipped").length,
        cancelled: summary.cancelled,
        requests: ctx.stats.requests,
        tokenLookups: ctx.tokens.lookupCount,
      },
      "Sync run finished"
    );

    return summary;
  }

  // ==========================================================================
  // Per source
  // ==========================================================================

  private async runSource(
    job: SourceJob,
    ctx: RunContext,
    full: boolean
  ): Promise<SourceRunResult> {
    const result = emptyResult(job);

    if (job.unusableReason !== undefined) {
      syncLogger.warn(
        { source: job.source, reason: job.unusableReason },
        "Skipping source with unusable configuration"
      );
      return { ...result, error: job.unusableReason };
    }

    const fetchedAt = ctx.currentTime();
    const resolved = full
      ? { since: this.settings.startTs, degraded: false }
      : await this.watermarks.resolveSince(job.source);
    result.since = resolved.since;
    result.degraded = resolved.degraded;

    const log = syncLogger.child({ source: job.source });
    log.info(
      { since: resolved.since.toISOString(), degraded: resolved.degraded },
      "Syncing source"
    );

    try {
      for (const stream of job.streams) {
        await this.runStream(job, stream, ctx, result);
      }
      result.status = "success";
    } catch (error) {
      result.status = "failed";
      result.error =
        error instanceof SourceAbort && error.cancelled
          ? CANCELLED_REASON
          : errorMessage(error);
      log.error({ error: result.error }, "Source sync failed");
    }

    await this.watermarks.safeRecordRun(job.source, {
      domain: job.domain,
      count: result.inserted + result.updated,
      status: result.status === "success" ? "success" : "failed",
      error: result.error,
      fetchedAt,
    });

    if (result.status === "success") {
      log.info(
        {
          pages: result.pages,
          fetched: result.fetched,
          inserted: result.inserted,
          updated: result.updated,
          dropped: result.dropped,
          scamFiltered: result.scamFiltered,
        },
        "Source synced"
      );
    }

    return result;
  }

  private async runStream(
    job: SourceJob,
    stream: SourceStream,
    ctx: RunContext,
    result: SourceRunResult
  ): Promise<void> {
    const since = result.since ?? this.settings.startTs;
    const { pageSize, maxPages } = this.settings.sync;
    let cursor: string | null = null;

    for (let page = 1; ; page++) {
      if (ctx.cancelled) {
        throw new SourceAbort(CANCELLED_REASON, true);
      }
      if (page > maxPages) {
        throw new SourceAbort(
          `page limit of ${String(maxPages)} reached for ${stream.entity}`,
          false
        );
      }

      const { outcome } = await withRetry(
        () => stream.fetcher.fetchPage({ since, cursor, pageSize, ctx }),
        this.retryPolicy,
        { source: job.source, sleep: ctx.sleep, signal: ctx.signal }
      );

      if (ctx.cancelled) {
        throw new SourceAbort(CANCELLED_REASON, true);
      }
      if (outcome.kind !== "success") {
        throw outcome.error;
      }

      result.pages++;
      result.fetched += outcome.records.length;
      this.onProgress?.({
        source: job.source,
        entity: stream.entity,
        page,
        fetched: result.fetched,
      });

      await this.processPage(job, stream, outcome.records, ctx, result);

      if (outcome.nextCursor === null) {
        return;
      }
      cursor = outcome.nextCursor;
    }
  }

  // ==========================================================================
  // Per page
  // ==========================================================================

  private async processPage(
    job: SourceJob,
    stream: SourceStream,
    raws: RawSourceRecord[],
    ctx: RunContext,
    result: SourceRunResult
  ): Promise<void> {
    let candidates = raws;
    if (this.settings.filterScam) {
      candidates = raws.filter((raw) => !isFlaggedScam(raw));
      const filtered = raws.length - candidates.length;
      if (filtered > 0) {
        result.scamFiltered += filtered;
        syncLogger.info(
          { source: job.source, count: filtered },
          "Filtered scam records"
        );
      }
    }

    await this.prefetchTokens(candidates, ctx);

    const { records, dropped } = normalizeBatch(candidates, ctx);
    result.normalized += records.length;
    result.dropped += dropped.length;

    const valid: CanonicalTransaction[] = [];
    for (const record of records) {
      const problem = findRecordProblem(record);
      if (problem === null) {
        valid.push(record);
        continue;
      }
      result.invalid++;
      syncLogger.warn(
        {
          source: record.source,
          externalId: record.external_id,
          reason: problem,
        },
        "Skipping invalid record"
      );
    }

    if (valid.length === 0) {
      return;
    }

    try {
      const writes = await this.partitions.mergePartitions({
        domain: job.domain,
        source: job.source,
        entity: stream.entity,
        records: valid,
      });
      result.partitionsWritten += writes.length;
    } catch (error) {
      throw new PersistenceError(
        `Partition merge failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const upserted = await upsertTransactions(this.db, job.domain, valid, {
      chunkSize: this.settings.sync.upsertChunkSize,
      now: () => ctx.currentTime(),
    });
    result.inserted += upserted.inserted;
    result.updated += upserted.updated;
  }

  private async prefetchTokens(
    raws: readonly RawSourceRecord[],
    ctx: RunContext
  ): Promise<void> {
    const byChain = new Map<string, string[]>();
    for (const raw of raws) {
      const referenced = tokenReferences(raw);
      if (referenced === null) {
        continue;
      }
      const ids = byChain.get(referenced.chain) ?? [];
      ids.push(...referenced.tokenIds);
      byChain.set(referenced.chain, ids);
    }

    for (const [chain, ids] of byChain) {
      await ctx.tokens.prefetch(chain, ids);
    }
  }
}
