/**
 * Quality Routes - /api/v1/quality
 */

import { Type } from "@sinclair/typebox";

import { checkDataQuality } from "../../services/sync/unified.js";
import { createListResponseSchema } from "../schemas/common.js";

import type { RouteDeps } from "./index.js";
import type { FastifyInstance } from "fastify";

const TableQualitySchema = Type.Object({
  table: Type.String(),
  totalRows: Type.Number(),
  distinctKeys: Type.Number(),
  duplicateKeys: Type.Number(),
  missingTimestamps: Type.Number(),
  nonPositiveAmounts: Type.Number(),
});

export function registerQualityRoutes(
  app: FastifyInstance,
  { db }: RouteDeps
): void {
  /**
   * GET /api/v1/quality
   * Data-quality counts for every ledger table
   */
  app.get(
    "/quality",
    {
      schema: {
        summary: "Data quality",
        description:
          "Total rows, distinct natural keys, duplicate keys, missing timestamps and " +
          "non-positive amounts per table. `unknown` on-chain records carry a zero amount.",
        tags: ["Quality"],
        response: {
          200: createListResponseSchema(TableQualitySchema),
        },
      },
    },
    async () => ({ data: await checkDataQuality(db) })
  );
}
