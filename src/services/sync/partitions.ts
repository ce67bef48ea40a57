/**
 * Partition Manager - month-bucketed CSV files per source and entity
 *
 * Layout: `<dataDir>/<domain>/<source>/<entity>_<YYYY>-<MM>.csv`.
 *
 * A merge reads the existing partition, unions it with the new records by
 * natural key (new records win) and rewrites the file through a temp file and
 * rename. Writes to the same path are serialized in-process. Partitions are a
 * cache of the store and can always be rebuilt from it.
 */

import {
  mkdir,
  readFile,
  readdir,
  rename,
  rm,
  writeFile,
} from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import { dedupeByNaturalKey } from "./upsert.js";
import { STAGED_TABLES } from "../../db/types.js";
import { syncLogger } from "../../logger.js";
import {
  isDomain,
  isTransactionAction,
  type CanonicalTransaction,
  type Domain,
  type EntityKind,
  type IngestBatch,
} from "../../types/canonical.js";

import type { Database, TransactionRow } from "../../db/types.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface PartitionWriteResult {
  path: string;
  year: number;
  month: number;
  /** Records already in the file before the merge */
  existing: number;
  /** Records in the file after the merge */
  total: number;
  /** Unreadable rows of the old file, lost by the rewrite */
  malformed: number;
}

interface ParsedPartition {
  records: CanonicalTransaction[];
  malformed: number;
}

export interface RebuildResult {
  files: number;
  records: number;
}

// ============================================================================
// Constants
// ============================================================================

export const PARTITION_COLUMNS = [
  "domain",
  "source",
  "occurred_at",
  "external_id",
  "log_index",
  "base_asset",
  "quote_asset",
  "action",
  "amount",
  "price",
  "fee_asset",
  "fee_amount",
  "counterparty_from",
  "counterparty_to",
  "chain",
  "raw_payload",
  "year",
  "month",
] as const satisfies readonly (keyof CanonicalTransaction)[];

const PARTITION_FILE_PATTERN = /^[a-z]+_\d{4}-\d{2}\.csv$/;

// ============================================================================
// Helpers
// ============================================================================

export function partitionFileName(
  entity: EntityKind,
  year: number,
  month: number
): string {
  return `${entity}_${String(year)}-${String(month).padStart(2, "0")}.csv`;
}

/**
 * Entity kind a stored record belongs to, for rebuilding partitions.
 */
export function entityOf(record: CanonicalTransaction): EntityKind {
  if (record.domain === "onchain") {
    return "transfers";
  }
  switch (record.action) {
    case "deposit":
      return "deposits";
    case "withdrawal":
      return "withdrawals";
    default:
      return "trades";
  }
}

function comparePartitionOrder(
  a: CanonicalTransaction,
  b: CanonicalTransaction
): number {
  return (
    a.occurred_at.localeCompare(b.occurred_at) ||
    a.source.localeCompare(b.source) ||
    a.external_id.localeCompare(b.external_id) ||
    a.log_index - b.log_index
  );
}

export function sortForPartition(
  records: readonly CanonicalTransaction[]
): CanonicalTransaction[] {
  return [...records].sort(comparePartitionOrder);
}

function groupByPeriod(
  records: readonly CanonicalTransaction[]
): Map<string, CanonicalTransaction[]> {
  const groups = new Map<string, CanonicalTransaction[]>();
  for (const record of records) {
    const key = `${String(record.year)}-${String(record.month)}`;
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [record]);
    } else {
      group.push(record);
    }
  }
  return groups;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function toCell(value: string | number | null): string {
  return value === null ? "" : String(value);
}

function orNull(value: string | undefined): string | null {
  return value === undefined || value === "" ? null : value;
}

function numberOrNull(value: string | undefined): number | null {
  const text = orNull(value);
  if (text === null) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.values(value).every((cell) => typeof cell === "string")
  );
}

/**
 * Parse one CSV row back into a canonical record; null when malformed.
 */
export function rowToRecord(
  row: Record<string, string>
): CanonicalTransaction | null {
  const domain = row.domain ?? "";
  const action = row.action ?? "";
  const amount = numberOrNull(row.amount);
  const logIndex = numberOrNull(row.log_index);
  const year = numberOrNull(row.year);
  const month = numberOrNull(row.month);

  if (
    !isDomain(domain) ||
    !isTransactionAction(action) ||
    amount === null ||
    logIndex === null ||
    year === null ||
    month === null
  ) {
    return null;
  }

  return {
    domain,
    source: row.source ?? "",
    occurred_at: row.occurred_at ?? "",
    external_id: row.external_id ?? "",
    log_index: logIndex,
    base_asset: row.base_asset ?? "",
    quote_asset: row.quote_asset ?? "",
    action,
    amount,
    price: numberOrNull(row.price),
    fee_asset: orNull(row.fee_asset),
    fee_amount: numberOrNull(row.fee_amount),
    counterparty_from: orNull(row.counterparty_from),
    counterparty_to: orNull(row.counterparty_to),
    chain: orNull(row.chain),
    raw_payload: row.raw_payload ?? "",
    year,
    month,
  };
}

export function rowFromStore(row: TransactionRow): CanonicalTransaction {
  const { id: _id, ingested_at: _ingestedAt, ...record } = row;
  return record;
}

// ============================================================================
// Partition Manager
// ============================================================================

export class PartitionManager {
  private readonly locks = new Map<string, Promise<void>>();

  constructor(readonly dataDir: string) {}

  partitionPath(
    domain: Domain,
    source: string,
    entity: EntityKind,
    year: number,
    month: number
  ): string {
    return join(
      this.dataDir,
      domain,
      source,
      partitionFileName(entity, year, month)
    );
  }

  /**
   * Merge a batch into its monthly partitions. Returns one result per
   * partition touched.
   */
  async mergePartitions(batch: IngestBatch): Promise<PartitionWriteResult[]> {
    const results: PartitionWriteResult[] = [];

    for (const records of groupByPeriod(batch.records).values()) {
      const [first] = records;
      if (first === undefined) {
        continue;
      }
      const { year, month } = first;
      const path = this.partitionPath(
        batch.domain,
        batch.source,
        batch.entity,
        year,
        month
      );

      const result = await this.withLock(path, async () => {
        const existing = await this.parsePartition(path);
        const merged = sortForPartition(
          dedupeByNaturalKey([...existing.records, ...records])
        );
        await this.writePartition(path, merged);
        return {
          path,
          year,
          month,
          existing: existing.records.length,
          total: merged.length,
          malformed: existing.malformed,
        };
      });

      if (result.malformed > 0) {
        syncLogger.warn(
          { path, malformed: result.malformed },
          `Merge dropped malformed partition rows; run \`partitions rebuild --domain ${batch.domain}\` to restore them from the store`
        );
      }

      syncLogger.debug(
        { ...result, source: batch.source, added: records.length },
        "Merged partition"
      );
      results.push(result);
    }

    return results;
  }

  /**
   * Read a partition file; a missing file reads as empty.
   */
  async readPartition(path: string): Promise<CanonicalTransaction[]> {
    return (await this.parsePartition(path)).records;
  }

  private async parsePartition(path: string): Promise<ParsedPartition> {
    let content: string;
    try {
      content = await readFile(path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return { records: [], malformed: 0 };
      }
      throw error;
    }

    const rows: unknown = parse(content, {
      columns: true,
      skip_empty_lines: true,
    });
    if (!Array.isArray(rows)) {
      return { records: [], malformed: 0 };
    }

    const records: CanonicalTransaction[] = [];
    let malformed = 0;
    for (const [index, row] of rows.entries()) {
      const record = isStringRecord(row) ? rowToRecord(row) : null;
      if (record === null) {
        malformed++;
        syncLogger.warn(
          { path, row: index + 1 },
          "Skipping malformed partition row"
        );
        continue;
      }
      records.push(record);
    }
    return { records, malformed };
  }

  /**
   * Partition files under the data directory, optionally for one domain.
   */
  async listPartitions(domain?: Domain): Promise<string[]> {
    const root =
      domain === undefined ? this.dataDir : join(this.dataDir, domain);
    let entries: string[];
    try {
      entries = await readdir(root, { recursive: true });
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    return entries
      .filter((entry) => PARTITION_FILE_PATTERN.test(basename(entry)))
      .map((entry) => join(root, entry))
      .sort();
  }

  /**
   * Replace a domain's partitions with a fresh copy of the given records.
   */
  async replaceDomain(
    domain: Domain,
    records: readonly CanonicalTransaction[]
  ): Promise<RebuildResult> {
    await rm(join(this.dataDir, domain), { recursive: true, force: true });

    const groups = new Map<
      string,
      { path: string; records: CanonicalTransaction[] }
    >();
    for (const record of records) {
      const path = this.partitionPath(
        domain,
        record.source,
        entityOf(record),
        record.year,
        record.month
      );
      const group = groups.get(path);
      if (group === undefined) {
        groups.set(path, { path, records: [record] });
      } else {
        group.records.push(record);
      }
    }

    for (const group of groups.values()) {
      await this.withLock(group.path, () =>
        this.writePartition(
          group.path,
          sortForPartition(dedupeByNaturalKey(group.records))
        )
      );
    }

    return { files: groups.size, records: records.length };
  }

  private async writePartition(
    path: string,
    records: readonly CanonicalTransaction[]
  ): Promise<void> {
    const content = stringify(
      records.map((record) =>
        PARTITION_COLUMNS.map((column) => toCell(record[column]))
      ),
      { header: true, columns: [...PARTITION_COLUMNS] }
    );

    await mkdir(dirname(path), { recursive: true });
    const tempPath = `${path}.${String(process.pid)}.tmp`;
    await writeFile(tempPath, content, "utf8");
    await rename(tempPath, path);
  }

  private async withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, settled);

    try {
      return await run;
    } finally {
      if (this.locks.get(key) === settled) {
        this.locks.delete(key);
      }
    }
  }
}

// ============================================================================
// Rebuild
// ============================================================================

/**
 * Re-derive every partition of a domain from the canonical store.
 */
export async function rebuildPartitionsFromStore(
  db: Kysely<Database>,
  manager: PartitionManager,
  domain: Domain
): Promise<RebuildResult> {
  const rows = await db
    .selectFrom(STAGED_TABLES[domain])
    .selectAll()
    .orderBy("occurred_at")
    .orderBy("id")
    .execute();

  const result = await manager.replaceDomain(domain, rows.map(rowFromStore));
  syncLogger.info({ domain, ...result }, "Rebuilt partitions from store");
  return result;
}
