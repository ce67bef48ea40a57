import ora from "ora";

import { checkConnection } from "../../db/connection.js";
import { getTableCounts, runMigration } from "../../db/migrate.js";
import { displayTableCounts, printFailure } from "../utils/display.js";
import { withRuntime } from "../utils/runtime.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the ledger tables and indexes")
    .option("--fresh", "Drop all tables first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      const spinner = ora("Running migration...").start();

      try {
        await withRuntime(async ({ database }) => {
          if (options.fresh === true) {
            spinner.text = "Dropping existing tables...";
          }

          await runMigration(database.db, database.dialect, {
            fresh: options.fresh,
          });
          spinner.succeed(`Migration completed (${database.target})`);

          console.log("\nTables:");
          displayTableCounts(await getTableCounts(database.db));
        });
      } catch (error) {
        spinner.fail("Migration failed");
        printFailure(error);
        process.exitCode = 1;
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show table statistics")
    .action(async () => {
      const spinner = ora("Checking database connection...").start();

      try {
        await withRuntime(async ({ database }) => {
          const connected = await checkConnection(database.db);
          if (!connected) {
            spinner.fail(`Database connection failed (${database.target})`);
            process.exitCode = 1;
            return;
          }

          spinner.succeed(`Database connected (${database.dialect})`);
          console.log(`\nDatabase: ${database.target}`);
          console.log("\nTable statistics:");
          displayTableCounts(await getTableCounts(database.db));
        });
      } catch (error) {
        spinner.fail("Status check failed");
        printFailure(error);
        process.exitCode = 1;
      }
    });
}
