import cors from "@fastify/cors";
import Fastify, { type FastifyInstance } from "fastify";

import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes } from "./routes/index.js";
import { SyncWatermarkService } from "../services/sync/watermarks.js";

import type { Database } from "../db/types.js";
import type { FastifyServerOptions } from "fastify";
import type { Kysely } from "kysely";

export interface ServerOptions {
  db: Kysely<Database>;
  startTs: Date;
  overlapMinutes: number;
  logger?: FastifyServerOptions["logger"];
}

/**
 * Build the reporting API without starting it.
 */
export async function buildServer(
  options: ServerOptions
): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? false });

  // Register plugins
  await app.register(cors, {
    origin: true,
  });

  // Register OpenAPI (must be before routes)
  await app.register(openapi);

  // Register error handler
  await app.register(errorHandler);

  // Register API routes
  await registerApiRoutes(app, {
    db: options.db,
    watermarks: new SyncWatermarkService(options.db, {
      startTs: options.startTs,
      overlapMinutes: options.overlapMinutes,
    }),
  });

  // OpenAPI document endpoint
  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  return app;
}
