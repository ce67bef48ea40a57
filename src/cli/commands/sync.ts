import ora from "ora";

import { buildJobs } from "../../services/sync/jobs.js";
import { IngestionOrchestrator } from "../../services/sync/orchestrator.js";
import { displaySyncSummary, printFailure } from "../utils/display.js";
import { withRuntime } from "../utils/runtime.js";

import type { Command } from "commander";

interface SyncCommandOptions {
  source?: string[];
  full?: boolean;
  unify: boolean;
}

// ============================================================================
// Sync Command
// ============================================================================

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Fetch new activity from every configured source")
    .option("-s, --source <id...>", "Only sync these sources")
    .option("--full", "Ignore watermarks and fetch from START_TS")
    .option("--no-unify", "Skip rebuilding the unified view afterwards")
    .addHelpText(
      "after",
      `
Sources are exchange ids (e.g. binance), debank_<chain> (e.g. debank_eth) and
rpc_eth when ETH_RPC_URL is set.
Each source resumes from its last successful sync minus the overlap window.
Press Ctrl+C to stop after the current page; merged data is kept.
`
    )
    .action(async (options: SyncCommandOptions) => {
      const spinner = ora("Preparing sync...").start();
      const controller = new AbortController();
      const onInterrupt = (): void => {
        spinner.text = "Cancelling after the current page...";
        controller.abort();
      };
      process.once("SIGINT", onInterrupt);

      try {
        await withRuntime(async ({ config, database }) => {
          const { jobs, tokenProvider } = buildJobs(config);
          if (jobs.length === 0) {
            spinner.warn("No sources configured (set EXCHANGES or DEBANK_CHAINS)");
            return;
          }

          const orchestrator = new IngestionOrchestrator(
            database.db,
            config,
            { tokenProvider }
          );
          orchestrator.setProgressCallback((progress) => {
            spinner.text = `Syncing ${progress.source} ${progress.entity}: page ${String(progress.page)}, ${String(progress.fetched)} fetched`;
          });

          const summary = await orchestrator.run(jobs, {
            full: options.full,
            unify: options.unify,
            sources: options.source,
            signal: controller.signal,
          });

          const failed = summary.results.filter(
            (result) => result.status === "failed"
          ).length;
          if (summary.cancelled) {
            spinner.warn("Sync cancelled");
          } else if (failed > 0) {
            spinner.fail(`Sync finished with ${String(failed)} failed source(s)`);
          } else {
            spinner.succeed("Sync completed");
          }

          displaySyncSummary(summary);
          if (failed > 0 || summary.unifyError !== undefined) {
            process.exitCode = 1;
          }
        });
      } catch (error) {
        spinner.fail("Sync failed");
        printFailure(error);
        process.exitCode = 1;
      } finally {
        process.removeListener("SIGINT", onInterrupt);
      }
    });
}
