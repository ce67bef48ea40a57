/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerQualityRoutes } from "./quality.js";
import { registerSyncRoutes } from "./sync.js";
import { registerTransactionRoutes } from "./transactions.js";
import { checkConnection } from "../../db/connection.js";
import { DatabaseError } from "../plugins/error-handler.js";

import type { Database } from "../../db/types.js";
import type { SyncWatermarkService } from "../../services/sync/watermarks.js";
import type { FastifyInstance } from "fastify";
import type { Kysely } from "kysely";

export interface RouteDeps {
  db: Kysely<Database>;
  watermarks: SyncWatermarkService;
}

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
  },
  {
    examples: [{ status: "ok" }],
  }
);

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: RouteDeps
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns ok when the ledger store answers",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => {
      if (!(await checkConnection(deps.db))) {
        throw new DatabaseError("Ledger store is unavailable");
      }
      return { status: "ok" as const };
    }
  );

  // API v1 routes
  await app.register(
    (api, _opts, done) => {
      registerSyncRoutes(api, deps);
      registerTransactionRoutes(api, deps);
      registerQualityRoutes(api, deps);
      done();
    },
    { prefix: "/api/v1" }
  );
}
