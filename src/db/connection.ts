import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, sql } from "kysely";
import pg from "pg";

import { dbLogger } from "../logger.js";

import type { Database, SqlDialect } from "./types.js";

const { Pool } = pg;

// ============================================================================
// Types
// ============================================================================

export interface DatabaseOptions {
  /** SQLite file, or `:memory:` */
  dbPath: string;
  /** PostgreSQL connection string; takes precedence over `dbPath` */
  databaseUrl?: string;
}

export interface DatabaseHandle {
  db: Kysely<Database>;
  dialect: SqlDialect;
  /** Connection target for display, with any password masked */
  target: string;
}

// ============================================================================
// Factory
// ============================================================================

function createPostgres(databaseUrl: string): Kysely<Database> {
  const poolConfig: pg.PoolConfig = {
    connectionString: databaseUrl,
    max: 10, // Maximum pool connections
    idleTimeoutMillis: 30_000, // Close idle connections after 30s
    connectionTimeoutMillis: 5000, // Connection timeout
  };

  return new Kysely<Database>({
    dialect: new PostgresDialect({ pool: new Pool(poolConfig) }),
  });
}

function createSqlite(dbPath: string): Kysely<Database> {
  if (dbPath !== ":memory:") {
    // Ensure data directory exists
    const dataDir = dirname(dbPath);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const database = new SQLite(dbPath);
  database.pragma("journal_mode = WAL");

  return new Kysely<Database>({
    dialect: new SqliteDialect({ database }),
  });
}

/**
 * Open the ledger store: PostgreSQL when a URL is configured, SQLite otherwise.
 */
export function createDatabase(options: DatabaseOptions): DatabaseHandle {
  const databaseUrl = options.databaseUrl;

  if (databaseUrl !== undefined && databaseUrl !== "") {
    dbLogger.debug({ target: maskDatabaseUrl(databaseUrl) }, "Using PostgreSQL");
    return {
      db: createPostgres(databaseUrl),
      dialect: "postgres",
      target: maskDatabaseUrl(databaseUrl),
    };
  }

  dbLogger.debug({ dbPath: options.dbPath }, "Using SQLite");
  return {
    db: createSqlite(options.dbPath),
    dialect: "sqlite",
    target: options.dbPath,
  };
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(db: Kysely<Database>): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the database connection
 */
export async function closeDatabase(db: Kysely<Database>): Promise<void> {
  try {
    await db.destroy();
    dbLogger.debug("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Mask the password of a connection URL for display
 */
export function maskDatabaseUrl(databaseUrl: string): string {
  try {
    const url = new URL(databaseUrl);
    if (url.password !== "") {
      url.password = "****";
    }
    return url.toString();
  } catch {
    return "<invalid database url>";
  }
}
