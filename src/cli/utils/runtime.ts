import { loadConfig, type AppConfig } from "../../config.js";
import {
  closeDatabase,
  createDatabase,
  type DatabaseHandle,
} from "../../db/connection.js";

export interface CliRuntime {
  config: AppConfig;
  database: DatabaseHandle;
}

/**
 * Load configuration, open the database, run the task and always close the
 * connection afterwards.
 */
export async function withRuntime<T>(
  task: (runtime: CliRuntime) => Promise<T>
): Promise<T> {
  const config = loadConfig();
  const database = createDatabase({
    dbPath: config.dbPath,
    databaseUrl: config.databaseUrl,
  });

  try {
    return await task({ config, database });
  } finally {
    await closeDatabase(database.db);
  }
}
