/**
 * Common TypeBox schemas for API validation
 */

import { Type, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Pagination Schemas
// ============================================================================

export const PaginationQuerySchema = Type.Object({
  limit: Type.Optional(Type.Number({ minimum: 1, maximum: 500, default: 50 })),
  cursor: Type.Optional(Type.String()),
});

export const PaginationMetaSchema = Type.Object({
  cursor: Type.Union([Type.String(), Type.Null()]),
  hasMore: Type.Boolean(),
  limit: Type.Number(),
  total: Type.Optional(Type.Number()),
});

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export const QueryMetaSchema = Type.Object({
  executionTimeMs: Type.Number(),
  appliedFilters: Type.Record(Type.String(), Type.Unknown()),
});

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
    meta: Type.Optional(
      Type.Object({
        pagination: Type.Optional(PaginationMetaSchema),
        query: Type.Optional(QueryMetaSchema),
      })
    ),
  });
}

export function createListResponseSchema<T extends TSchema>(itemSchema: T) {
  return Type.Object({
    data: Type.Array(itemSchema),
    meta: Type.Optional(
      Type.Object({
        pagination: Type.Optional(PaginationMetaSchema),
        query: Type.Optional(QueryMetaSchema),
      })
    ),
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

export const DomainSchema = Type.Union([
  Type.Literal("exchange"),
  Type.Literal("onchain"),
]);

export const RunStatusSchema = Type.Union([
  Type.Literal("success"),
  Type.Literal("failed"),
]);

export const NullableString = Type.Union([Type.String(), Type.Null()]);
export const NullableNumber = Type.Union([Type.Number(), Type.Null()]);
