/**
 * Watermark Service - Track sync progress per source
 *
 * Enables incremental sync by remembering when each source last fetched
 * successfully. The next run starts one overlap window before that point so
 * late-arriving records are picked up again; the upsert step absorbs the
 * re-fetched duplicates.
 */

import { formatUtc, toUtcInstant } from "./canonical/timestamps.js";
import { errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type { Database, RunStatus, SyncWatermark } from "../../db/types.js";
import type { Domain } from "../../types/canonical.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface WatermarkSettings {
  startTs: Date;
  overlapMinutes: number;
}

export interface RunRecord {
  domain: Domain;
  count: number;
  status: RunStatus;
  error?: string;
  /** When the run began fetching; becomes `last_sync_at` on success */
  fetchedAt?: Date;
}

export interface ResolvedSince {
  since: Date;
  /** True when the tracker could not be read and the start timestamp was used */
  degraded: boolean;
}

export interface WatermarkFilters {
  status?: RunStatus;
}

// ============================================================================
// Watermark Service
// ============================================================================

export class SyncWatermarkService {
  private readonly overlapMs: number;

  constructor(
    private db: Kysely<Database>,
    private settings: WatermarkSettings,
    private now: () => Date = () => new Date()
  ) {
    this.overlapMs = Math.max(0, settings.overlapMinutes) * 60_000;
  }

  /**
   * Get the timestamp to fetch from.
   *
   * The start timestamp on a first run (or when no run has succeeded yet),
   * otherwise the last successful sync minus the overlap window, never
   * earlier than the start timestamp.
   */
  async getWatermark(source: string): Promise<Date> {
    const row = await this.db
      .selectFrom("sync_watermarks")
      .select("last_sync_at")
      .where("source", "=", source)
      .executeTakeFirst();

    const lastSync = toUtcInstant(row?.last_sync_at);
    if (lastSync === null) {
      return this.settings.startTs;
    }

    const since = lastSync.getTime() - this.overlapMs;
    return new Date(Math.max(since, this.settings.startTs.getTime()));
  }

  /**
   * Like `getWatermark`, but an unreadable tracker degrades to a full-range
   * fetch instead of failing the run.
   */
  async resolveSince(source: string): Promise<ResolvedSince> {
    try {
      return { since: await this.getWatermark(source), degraded: false };
    } catch (error) {
      syncLogger.warn(
        { source, error: errorMessage(error) },
        "Watermark unavailable, fetching from start timestamp"
      );
      return { since: this.settings.startTs, degraded: true };
    }
  }

  /**
   * Persist the outcome of a run. Only a successful run moves `last_sync_at`.
   */
  async recordRun(source: string, run: RunRecord): Promise<void> {
    const updatedAt = formatUtc(this.now());
    const succeeded = run.status === "success";
    const lastSyncAt = succeeded
      ? formatUtc(run.fetchedAt ?? this.now())
      : null;

    const common = {
      domain: run.domain,
      last_run_record_count: run.count,
      last_run_status: run.status,
      last_error: run.error ?? null,
      updated_at: updatedAt,
    };

    await this.db
      .insertInto("sync_watermarks")
      .values({ source, ...common, last_sync_at: lastSyncAt })
      .onConflict((oc) =>
        oc
          .column("source")
          .doUpdateSet(
            succeeded ? { ...common, last_sync_at: lastSyncAt } : common
          )
      )
      .execute();
  }

  /**
   * `recordRun` that logs instead of throwing, for use after the data is
   * already merged.
   */
  async safeRecordRun(source: string, run: RunRecord): Promise<boolean> {
    try {
      await this.recordRun(source, run);
      return true;
    } catch (error) {
      syncLogger.error(
        { source, status: run.status, error: errorMessage(error) },
        "Failed to record sync watermark"
      );
      return false;
    }
  }

  async getWatermarkRow(source: string): Promise<SyncWatermark | null> {
    const row = await this.db
      .selectFrom("sync_watermarks")
      .selectAll()
      .where("source", "=", source)
      .executeTakeFirst();
    return row ?? null;
  }

  /**
   * All watermark rows, for status displays.
   */
  async listWatermarks(filters: WatermarkFilters = {}): Promise<SyncWatermark[]> {
    let query = this.db.selectFrom("sync_watermarks").selectAll();
    if (filters.status !== undefined) {
      query = query.where("last_run_status", "=", filters.status);
    }
    return await query.orderBy("source").execute();
  }
}
