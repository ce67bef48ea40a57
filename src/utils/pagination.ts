/**
 * Cursor-based pagination utilities
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const CursorPayloadSchema = Type.Object({
  sortValue: Type.Union([Type.String(), Type.Number()]),
  id: Type.Integer(),
  direction: Type.Union([Type.Literal("forward"), Type.Literal("backward")]),
});

export type CursorPayload = Static<typeof CursorPayloadSchema>;

export interface PaginationMeta {
  cursor: string | null;
  hasMore: boolean;
  limit: number;
  total?: number;
}

export interface PaginationOptions {
  cursor?: string;
  limit: number;
}

export interface PaginatedResult<T> {
  items: T[];
  pagination: PaginationMeta;
}

/**
 * Encode cursor payload to base64url string
 */
export function encodeCursor(payload: CursorPayload): string {
  return Buffer.from(JSON.stringify(payload)).toString("base64url");
}

/**
 * Decode base64url cursor string to payload
 */
export function decodeCursor(cursor: string): CursorPayload | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return null;
  }
  return Value.Check(CursorPayloadSchema, parsed) ? parsed : null;
}

/**
 * Create pagination meta from results
 */
export function createPaginationMeta<T extends { id: number }>(
  items: T[],
  limit: number,
  sortValueOf: (item: T) => string | number,
  hasMore: boolean,
  total?: number
): PaginationMeta {
  let cursor: string | null = null;

  const lastItem = items.at(-1);
  if (hasMore && lastItem !== undefined) {
    cursor = encodeCursor({
      sortValue: sortValueOf(lastItem),
      id: lastItem.id,
      direction: "forward",
    });
  }

  return {
    cursor,
    hasMore,
    limit,
    total,
  };
}

/**
 * Parse limit from query parameter with bounds
 */
export function parseLimit(
  value: string | number | undefined,
  defaultLimit = 50,
  maxLimit = 100
): number {
  if (value === undefined) {
    return defaultLimit;
  }

  const parsed = typeof value === "string" ? parseInt(value, 10) : value;

  if (isNaN(parsed) || parsed < 1) {
    return defaultLimit;
  }

  return Math.min(parsed, maxLimit);
}

/**
 * Validate cursor and extract payload
 */
export function validateCursor(
  cursor: string | undefined
): CursorPayload | null {
  if (cursor === undefined || cursor === "") {
    return null;
  }
  return decodeCursor(cursor);
}
