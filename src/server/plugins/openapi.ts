/**
 * OpenAPI Plugin - Generates the OpenAPI 3.0 document
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Ledger Sync API",
        description:
          "Read-only reporting over the normalized transaction ledger: exchange trades and transfers " +
          "together with on-chain activity, deduplicated by natural key and partitioned by month.",
        version: "0.1.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        { name: "Health", description: "Liveness and store connectivity" },
        {
          name: "Sync",
          description: "Per-source sync watermarks and the outcome of the last run",
        },
        {
          name: "Transactions",
          description: "Unified transactions with filters, pagination and grouped summaries",
        },
        {
          name: "Quality",
          description: "Row, key and value sanity counts per ledger table",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
