/**
 * Sync Routes - /api/v1/sync
 *
 * Read-only view of the sync watermarks. Syncs themselves run from the CLI.
 */

import { Type, type Static } from "@sinclair/typebox";

import { NotFoundError } from "../plugins/error-handler.js";
import {
  DomainSchema,
  NullableString,
  RunStatusSchema,
  createListResponseSchema,
  createResponseSchema,
} from "../schemas/common.js";

import type { RouteDeps } from "./index.js";
import type { SyncWatermark } from "../../db/types.js";
import type { WatermarkDto } from "../../types/api.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const WatermarkSchema = Type.Object({
  source: Type.String(),
  domain: DomainSchema,
  lastSyncAt: NullableString,
  lastRunRecordCount: Type.Number(),
  lastRunStatus: RunStatusSchema,
  lastError: NullableString,
  updatedAt: Type.String(),
});

const WatermarkQuerySchema = Type.Object({
  status: Type.Optional(RunStatusSchema),
});

type WatermarkQuery = Static<typeof WatermarkQuerySchema>;

const SourceParamSchema = Type.Object({
  source: Type.String({ description: "Source id, e.g. binance or debank_eth" }),
});

type SourceParam = Static<typeof SourceParamSchema>;

// ============================================================================
// Helpers
// ============================================================================

export function toWatermarkDto(row: SyncWatermark): WatermarkDto {
  return {
    source: row.source,
    domain: row.domain,
    lastSyncAt: row.last_sync_at,
    lastRunRecordCount: row.last_run_record_count,
    lastRunStatus: row.last_run_status,
    lastError: row.last_error,
    updatedAt: row.updated_at,
  };
}

// ============================================================================
// Routes
// ============================================================================

export function registerSyncRoutes(
  app: FastifyInstance,
  { watermarks }: RouteDeps
): void {
  /**
   * GET /api/v1/sync/watermarks
   * Watermark of every source
   */
  app.get<{ Querystring: WatermarkQuery }>(
    "/sync/watermarks",
    {
      schema: {
        summary: "List sync watermarks",
        description:
          "One row per source with the last successful sync time and the outcome of the last run. " +
          "Use `?status=failed` to find stale sources.",
        tags: ["Sync"],
        querystring: WatermarkQuerySchema,
        response: {
          200: createListResponseSchema(WatermarkSchema),
        },
      },
    },
    async (request) => {
      const rows = await watermarks.listWatermarks({
        status: request.query.status,
      });
      return { data: rows.map(toWatermarkDto) };
    }
  );

  /**
   * GET /api/v1/sync/watermarks/:source
   */
  app.get<{ Params: SourceParam }>(
    "/sync/watermarks/:source",
    {
      schema: {
        summary: "Get one sync watermark",
        tags: ["Sync"],
        params: SourceParamSchema,
        response: {
          200: createResponseSchema(WatermarkSchema),
        },
      },
    },
    async (request) => {
      const row = await watermarks.getWatermarkRow(request.params.source);
      if (row === null) {
        throw new NotFoundError(
          `No sync recorded for source ${request.params.source}`
        );
      }
      return { data: toWatermarkDto(row) };
    }
  );
}
