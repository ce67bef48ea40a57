/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { ConfigError, errorMessage } from "../../errors.js";

import type { LedgerTable } from "../../db/migrate.js";
import type { SyncWatermark } from "../../db/types.js";
import type { SyncRunSummary } from "../../services/sync/orchestrator.js";
import type {
  SummaryDimension,
  SummaryRow,
  TableQuality,
} from "../../services/sync/unified.js";

function statusColor(status: string): string {
  switch (status) {
    case "success":
      return chalk.green(status);
    case "failed":
      return chalk.red(status);
    default:
      return chalk.yellow(status);
  }
}

function formatAmount(value: number): string {
  return value.toLocaleString("en-US", { maximumFractionDigits: 8 });
}

/**
 * Display per-source results of a sync run
 */
export function displaySyncSummary(summary: SyncRunSummary): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Source"),
      chalk.cyan("Status"),
      chalk.cyan("Pages"),
      chalk.cyan("Fetched"),
      chalk.cyan("Inserted"),
      chalk.cyan("Updated"),
      chalk.cyan("Dropped"),
      chalk.cyan("Scam"),
      chalk.cyan("Error"),
    ],
    colWidths: [18, 10, 7, 9, 10, 9, 9, 6, 40],
    wordWrap: true,
  });

  for (const result of summary.results) {
    table.push([
      result.source,
      statusColor(result.status),
      String(result.pages),
      String(result.fetched),
      String(result.inserted),
      String(result.updated),
      String(result.dropped + result.invalid),
      String(result.scamFiltered),
      result.error ?? "",
    ]);
  }

  console.log(table.toString());

  const seconds =
    (summary.finishedAt.getTime() - summary.startedAt.getTime()) / 1000;
  console.log(chalk.gray(`\nFinished in ${seconds.toFixed(1)}s`));

  if (summary.cancelled) {
    printWarning("Run was cancelled; remaining sources were skipped");
  }
  if (summary.unified !== undefined) {
    console.log(
      `Unified view: ${String(summary.unified.total)} rows ` +
        chalk.gray(
          `(${String(summary.unified.exchange)} exchange, ${String(summary.unified.onchain)} on-chain)`
        )
    );
  }
  if (summary.unifyError !== undefined) {
    printError(`Unified view rebuild failed: ${summary.unifyError}`);
  }
}

/**
 * Display sync watermarks
 */
export function displayWatermarks(rows: SyncWatermark[]): void {
  if (rows.length === 0) {
    console.log(chalk.yellow("No sources have been synced yet"));
    return;
  }

  const table = new CliTable3({
    head: [
      chalk.cyan("Source"),
      chalk.cyan("Domain"),
      chalk.cyan("Status"),
      chalk.cyan("Last Sync"),
      chalk.cyan("Records"),
      chalk.cyan("Error"),
    ],
    colWidths: [18, 10, 10, 22, 9, 45],
    wordWrap: true,
  });

  for (const row of rows) {
    table.push([
      row.source,
      row.domain,
      statusColor(row.last_run_status),
      row.last_sync_at ?? chalk.gray("never"),
      String(row.last_run_record_count),
      row.last_error ?? "",
    ]);
  }

  console.log(table.toString());
}

/**
 * Display grouped counts and amounts
 */
export function displaySummaryRows(
  rows: SummaryRow[],
  dimensions: readonly SummaryDimension[]
): void {
  if (rows.length === 0) {
    console.log(chalk.yellow("No data returned"));
    return;
  }

  const table = new CliTable3({
    head: [...dimensions, "count", "total amount"].map((name) =>
      chalk.cyan(name)
    ),
  });

  for (const row of rows) {
    table.push([
      ...dimensions.map((dimension) => String(row.group[dimension] ?? "")),
      String(row.count),
      formatAmount(row.totalAmount),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display data-quality counts per table
 */
export function displayQuality(results: TableQuality[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Table"),
      chalk.cyan("Rows"),
      chalk.cyan("Distinct keys"),
      chalk.cyan("Duplicates"),
      chalk.cyan("Missing time"),
      chalk.cyan("Amount <= 0"),
    ],
  });

  for (const result of results) {
    table.push([
      result.table,
      String(result.totalRows),
      String(result.distinctKeys),
      result.duplicateKeys > 0
        ? chalk.red(String(result.duplicateKeys))
        : String(result.duplicateKeys),
      String(result.missingTimestamps),
      String(result.nonPositiveAmounts),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display row counts per ledger table
 */
export function displayTableCounts(
  counts: Record<LedgerTable, number | null>
): void {
  for (const [table, count] of Object.entries(counts)) {
    console.log(
      `  ${table}: ${count === null ? chalk.gray("missing") : `${String(count)} rows`}`
    );
  }
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print a caught error, with configuration problems listed one per line
 */
export function printFailure(error: unknown): void {
  printError(errorMessage(error));
  if (error instanceof ConfigError) {
    const problems = error.details?.problems;
    if (Array.isArray(problems)) {
      for (const problem of problems) {
        console.error(chalk.red(`  - ${String(problem)}`));
      }
    }
  }
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
