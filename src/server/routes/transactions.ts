/**
 * Transaction Routes - /api/v1/transactions
 *
 * Reads from `transactions_unified`, so results reflect the last rebuild.
 */

import { Type, type Static } from "@sinclair/typebox";

import { splitList } from "../../config.js";
import {
  SUMMARY_DIMENSIONS,
  isSummaryDimension,
  queryUnified,
  summarizeUnified,
  type SummaryDimension,
  type UnifiedFilters,
} from "../../services/sync/unified.js";
import { TRANSACTION_ACTIONS } from "../../types/canonical.js";
import { parseLimit, validateCursor } from "../../utils/pagination.js";
import { ValidationError } from "../plugins/error-handler.js";
import {
  DomainSchema,
  NullableNumber,
  NullableString,
  PaginationQuerySchema,
  createListResponseSchema,
} from "../schemas/common.js";

import type { RouteDeps } from "./index.js";
import type { TransactionRow } from "../../db/types.js";
import type { TransactionDto } from "../../types/api.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const FilterQuerySchema = Type.Object({
  domain: Type.Optional(DomainSchema),
  source: Type.Optional(Type.String()),
  chain: Type.Optional(Type.String()),
  year: Type.Optional(Type.Integer({ minimum: 1970, maximum: 9999 })),
  month: Type.Optional(Type.Integer({ minimum: 1, maximum: 12 })),
});

const ListTransactionsQuerySchema = Type.Intersect([
  PaginationQuerySchema,
  FilterQuerySchema,
]);

type ListTransactionsQuery = Static<typeof ListTransactionsQuerySchema>;

const SummaryQuerySchema = Type.Intersect([
  FilterQuerySchema,
  Type.Object({
    groupBy: Type.Optional(
      Type.String({
        description: `Comma-separated dimensions: ${SUMMARY_DIMENSIONS.join(", ")}`,
        default: "domain,source",
      })
    ),
  }),
]);

type SummaryQuery = Static<typeof SummaryQuerySchema>;

const TransactionSchema = Type.Object({
  id: Type.Number(),
  domain: DomainSchema,
  source: Type.String(),
  occurredAt: Type.String(),
  externalId: Type.String(),
  logIndex: Type.Number(),
  baseAsset: Type.String(),
  quoteAsset: Type.String(),
  action: Type.Union(TRANSACTION_ACTIONS.map((action) => Type.Literal(action))),
  amount: Type.Number(),
  price: NullableNumber,
  feeAsset: NullableString,
  feeAmount: NullableNumber,
  counterpartyFrom: NullableString,
  counterpartyTo: NullableString,
  chain: NullableString,
  year: Type.Number(),
  month: Type.Number(),
});

const SummaryRowSchema = Type.Object({
  group: Type.Record(
    Type.String(),
    Type.Union([Type.String(), Type.Number(), Type.Null()])
  ),
  count: Type.Number(),
  totalAmount: Type.Number(),
});

// ============================================================================
// Helpers
// ============================================================================

function toTransactionDto(row: TransactionRow): TransactionDto {
  return {
    id: row.id,
    domain: row.domain,
    source: row.source,
    occurredAt: row.occurred_at,
    externalId: row.external_id,
    logIndex: row.log_index,
    baseAsset: row.base_asset,
    quoteAsset: row.quote_asset,
    action: row.action,
    amount: row.amount,
    price: row.price,
    feeAsset: row.fee_asset,
    feeAmount: row.fee_amount,
    counterpartyFrom: row.counterparty_from,
    counterpartyTo: row.counterparty_to,
    chain: row.chain,
    year: row.year,
    month: row.month,
  };
}

function filtersOf(query: Static<typeof FilterQuerySchema>): UnifiedFilters {
  return {
    domain: query.domain,
    source: query.source,
    chain: query.chain,
    year: query.year,
    month: query.month,
  };
}

function appliedFilters(filters: UnifiedFilters): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(filters).filter(([, value]) => value !== undefined)
  );
}

export function parseGroupBy(value: string | undefined): SummaryDimension[] {
  const requested = splitList(value ?? "domain,source");
  const unknown = requested.filter((item) => !isSummaryDimension(item));
  if (unknown.length > 0) {
    throw new ValidationError("Unknown groupBy dimension", {
      unknown,
      allowed: SUMMARY_DIMENSIONS,
    });
  }
  return requested.filter(isSummaryDimension);
}

// ============================================================================
// Routes
// ============================================================================

export function registerTransactionRoutes(
  app: FastifyInstance,
  { db }: RouteDeps
): void {
  /**
   * GET /api/v1/transactions
   * Unified transactions ordered by time
   */
  app.get<{ Querystring: ListTransactionsQuery }>(
    "/transactions",
    {
      schema: {
        summary: "List transactions",
        description:
          "Unified transactions ordered by `occurredAt`, with cursor pagination. Examples:\n" +
          "- `/transactions?domain=onchain&chain=eth`\n" +
          "- `/transactions?year=2024&month=3&limit=100`",
        tags: ["Transactions"],
        querystring: ListTransactionsQuerySchema,
        response: {
          200: createListResponseSchema(TransactionSchema),
        },
      },
    },
    async (request) => {
      const startTime = Date.now();
      const { limit: rawLimit, cursor, ...filterQuery } = request.query;

      if (
        cursor !== undefined &&
        cursor !== "" &&
        validateCursor(cursor) === null
      ) {
        throw new ValidationError("Invalid cursor");
      }

      const filters = filtersOf(filterQuery);
      const page = await queryUnified(db, filters, {
        cursor,
        limit: parseLimit(rawLimit, 50, 500),
      });

      return {
        data: page.items.map(toTransactionDto),
        meta: {
          pagination: page.pagination,
          query: {
            executionTimeMs: Date.now() - startTime,
            appliedFilters: appliedFilters(filters),
          },
        },
      };
    }
  );

  /**
   * GET /api/v1/transactions/summary
   * Grouped counts and amounts
   */
  app.get<{ Querystring: SummaryQuery }>(
    "/transactions/summary",
    {
      schema: {
        summary: "Summarize transactions",
        description:
          "Count and total amount grouped by any of domain, source, chain, year and month. " +
          "Example: `/transactions/summary?groupBy=year,month&domain=exchange`",
        tags: ["Transactions"],
        querystring: SummaryQuerySchema,
        response: {
          200: createListResponseSchema(SummaryRowSchema),
        },
      },
    },
    async (request) => {
      const startTime = Date.now();
      const { groupBy, ...filterQuery } = request.query;
      const dimensions = parseGroupBy(groupBy);
      const filters = filtersOf(filterQuery);

      const rows = await summarizeUnified(db, dimensions, filters);

      return {
        data: rows,
        meta: {
          query: {
            executionTimeMs: Date.now() - startTime,
            appliedFilters: { ...appliedFilters(filters), groupBy: dimensions },
          },
        },
      };
    }
  );
}
