#!/usr/bin/env node

/**
 * Ledger Sync CLI
 *
 * Incremental sync of exchange and on-chain activity into one ledger.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerPartitionsCommand } from "./commands/partitions.js";
import { registerReportCommand } from "./commands/report.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerUnifyCommand } from "./commands/unify.js";

const program = new Command();

program
  .name("ledger-sync")
  .description("Normalize exchange and on-chain activity into one ledger")
  .version("0.1.0");

// Register all commands
registerDbCommand(program);
registerSyncCommand(program);
registerStatusCommand(program);
registerUnifyCommand(program);
registerPartitionsCommand(program);
registerReportCommand(program);

// Show help by default
program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
