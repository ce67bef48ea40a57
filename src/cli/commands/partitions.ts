import { InvalidArgumentError } from "commander";
import ora from "ora";

import {
  PartitionManager,
  rebuildPartitionsFromStore,
} from "../../services/sync/partitions.js";
import { DOMAINS, isDomain, type Domain } from "../../types/canonical.js";
import { printFailure } from "../utils/display.js";
import { withRuntime } from "../utils/runtime.js";

import type { Command } from "commander";

function parseDomain(value: string): Domain {
  if (!isDomain(value)) {
    throw new InvalidArgumentError(`Expected one of: ${DOMAINS.join(", ")}`);
  }
  return value;
}

// ============================================================================
// Partition Commands
// ============================================================================

export function registerPartitionsCommand(program: Command): void {
  const partitions = program
    .command("partitions")
    .description("Monthly CSV partition management");

  // partitions rebuild
  partitions
    .command("rebuild")
    .description("Re-derive every partition file of a domain from the store")
    .requiredOption("-d, --domain <domain>", "exchange or onchain", parseDomain)
    .action(async (options: { domain: Domain }) => {
      const spinner = ora(`Rebuilding ${options.domain} partitions...`).start();

      try {
        await withRuntime(async ({ config, database }) => {
          const manager = new PartitionManager(config.dataDir);
          const result = await rebuildPartitionsFromStore(
            database.db,
            manager,
            options.domain
          );
          spinner.succeed(
            `Wrote ${String(result.files)} partition file(s) with ${String(result.records)} record(s)`
          );
        });
      } catch (error) {
        spinner.fail("Partition rebuild failed");
        printFailure(error);
        process.exitCode = 1;
      }
    });
}
