import { buildServer } from "./app.js";
import { loadConfig } from "../config.js";
import { closeDatabase, createDatabase } from "../db/connection.js";
import { fastifyLoggerConfig, serverLogger } from "../logger.js";

const config = loadConfig();
const { db, target } = createDatabase({
  dbPath: config.dbPath,
  databaseUrl: config.databaseUrl,
});

const app = await buildServer({
  db,
  startTs: config.startTs,
  overlapMinutes: config.sync.overlapMinutes,
  logger: fastifyLoggerConfig,
});

app.addHook("onClose", async () => {
  await closeDatabase(db);
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    serverLogger.info({ signal }, "Shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        serverLogger.error({ error }, "Shutdown failed");
        process.exit(1);
      }
    );
  });
}

// Start server
try {
  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info(
    { host: config.server.host, port: config.server.port, db: target },
    "Server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
