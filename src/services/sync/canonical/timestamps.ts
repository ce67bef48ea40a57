/**
 * Timestamp normalization
 *
 * Sources report time as integer seconds, integer milliseconds or ISO
 * strings. Everything ends up as a UTC instant truncated to whole seconds.
 */

/** Numeric timestamps above this are milliseconds, below are seconds */
export const MILLISECONDS_THRESHOLD = 1e10;

const NUMERIC_PATTERN = /^-?\d+(\.\d+)?$/;
const ZONE_SUFFIX_PATTERN = /(Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function numericToMillis(value: number): number | null {
  if (!Number.isFinite(value)) {
    return null;
  }
  return Math.abs(value) > MILLISECONDS_THRESHOLD ? value : value * 1000;
}

function stringToMillis(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed === "") {
    return null;
  }

  if (NUMERIC_PATTERN.test(trimmed)) {
    return numericToMillis(Number(trimmed));
  }

  let iso = trimmed.replace(" ", "T");
  // ISO strings without an offset are UTC, not local time
  if (!DATE_ONLY_PATTERN.test(iso) && !ZONE_SUFFIX_PATTERN.test(iso)) {
    iso = `${iso}Z`;
  }

  const parsed = Date.parse(iso);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Convert a source timestamp to a UTC `Date` with second granularity.
 *
 * Returns null when the value cannot be interpreted.
 */
export function toUtcInstant(value: unknown): Date | null {
  let millis: number | null;

  if (value instanceof Date) {
    millis = value.getTime();
  } else if (typeof value === "number") {
    millis = numericToMillis(value);
  } else if (typeof value === "string") {
    millis = stringToMillis(value);
  } else {
    return null;
  }

  if (millis === null || Number.isNaN(millis)) {
    return null;
  }

  const date = new Date(Math.floor(millis / 1000) * 1000);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Render an instant as `YYYY-MM-DDTHH:MM:SSZ`.
 */
export function formatUtc(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Normalize a source timestamp straight to its stored string form.
 */
export function normalizeTimestamp(value: unknown): string | null {
  const instant = toUtcInstant(value);
  return instant === null ? null : formatUtc(instant);
}

/**
 * Derive the (year, month) partition keys of a normalized timestamp.
 */
export function partitionKeyOf(occurredAt: string): {
  year: number;
  month: number;
} {
  const instant = new Date(occurredAt);
  return {
    year: instant.getUTCFullYear(),
    month: instant.getUTCMonth() + 1,
  };
}
