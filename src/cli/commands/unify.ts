import ora from "ora";

import { rebuildUnifiedView } from "../../services/sync/unified.js";
import { printFailure } from "../utils/display.js";
import { withRuntime } from "../utils/runtime.js";

import type { Command } from "commander";

// ============================================================================
// Unify Command
// ============================================================================

export function registerUnifyCommand(program: Command): void {
  program
    .command("unify")
    .description("Rebuild transactions_unified from the staged tables")
    .action(async () => {
      const spinner = ora("Rebuilding unified view...").start();

      try {
        await withRuntime(async ({ database }) => {
          const summary = await rebuildUnifiedView(database.db);
          spinner.succeed(
            `Unified view rebuilt: ${String(summary.total)} rows (${String(summary.exchange)} exchange, ${String(summary.onchain)} on-chain)`
          );
        });
      } catch (error) {
        spinner.fail("Rebuild failed");
        printFailure(error);
        process.exitCode = 1;
      }
    });
}
