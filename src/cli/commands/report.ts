import { InvalidArgumentError } from "commander";

import { splitList } from "../../config.js";
import {
  SUMMARY_DIMENSIONS,
  checkDataQuality,
  isSummaryDimension,
  summarizeUnified,
  type SummaryDimension,
  type UnifiedFilters,
} from "../../services/sync/unified.js";
import { DOMAINS, isDomain, type Domain } from "../../types/canonical.js";
import {
  displayQuality,
  displaySummaryRows,
  printFailure,
} from "../utils/display.js";
import { withRuntime } from "../utils/runtime.js";

import type { Command } from "commander";

interface ReportOptions {
  groupBy: SummaryDimension[];
  domain?: Domain;
  source?: string;
  chain?: string;
  year?: number;
  month?: number;
  quality?: boolean;
}

function parseGroupBy(value: string): SummaryDimension[] {
  const dimensions: SummaryDimension[] = [];
  for (const item of splitList(value)) {
    if (!isSummaryDimension(item)) {
      throw new InvalidArgumentError(
        `Unknown dimension '${item}'. Expected any of: ${SUMMARY_DIMENSIONS.join(", ")}`
      );
    }
    dimensions.push(item);
  }
  return dimensions;
}

function parseDomain(value: string): Domain {
  if (!isDomain(value)) {
    throw new InvalidArgumentError(`Expected one of: ${DOMAINS.join(", ")}`);
  }
  return value;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Expected an integer");
  }
  return parsed;
}

// ============================================================================
// Report Command
// ============================================================================

export function registerReportCommand(program: Command): void {
  program
    .command("report")
    .description("Summarize the unified view")
    .option(
      "-g, --group-by <dimensions>",
      `comma-separated dimensions (${SUMMARY_DIMENSIONS.join(", ")})`,
      parseGroupBy,
      ["domain", "source"]
    )
    .option("--domain <domain>", "exchange or onchain", parseDomain)
    .option("--source <source>", "filter by source")
    .option("--chain <chain>", "filter by chain")
    .option("--year <year>", "filter by year", parseInteger)
    .option("--month <month>", "filter by month", parseInteger)
    .option("--quality", "also show data-quality counts per table")
    .action(async (options: ReportOptions) => {
      try {
        await withRuntime(async ({ database }) => {
          const filters: UnifiedFilters = {
            domain: options.domain,
            source: options.source,
            chain: options.chain,
            year: options.year,
            month: options.month,
          };
          const rows = await summarizeUnified(
            database.db,
            options.groupBy,
            filters
          );
          displaySummaryRows(rows, options.groupBy);

          if (options.quality === true) {
            console.log();
            displayQuality(await checkDataQuality(database.db));
          }
        });
      } catch (error) {
        printFailure(error);
        process.exitCode = 1;
      }
    });
}
