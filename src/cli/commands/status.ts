import { SyncWatermarkService } from "../../services/sync/watermarks.js";
import { displayWatermarks, printFailure } from "../utils/display.js";
import { withRuntime } from "../utils/runtime.js";

import type { Command } from "commander";

// ============================================================================
// Status Command
// ============================================================================

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show the sync watermark of every source")
    .option("--failed", "Show only sources whose last run failed")
    .action(async (options: { failed?: boolean }) => {
      try {
        await withRuntime(async ({ config, database }) => {
          const watermarks = new SyncWatermarkService(database.db, {
            startTs: config.startTs,
            overlapMinutes: config.sync.overlapMinutes,
          });
          const rows = await watermarks.listWatermarks(
            options.failed === true ? { status: "failed" } : {}
          );
          displayWatermarks(rows);
        });
      } catch (error) {
        printFailure(error);
        process.exitCode = 1;
      }
    });
}
