import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { env } from "../core/config";
import { logger } from "../core/logger";
import { runMigrations } from "./migrate";

export type AppDatabase = BetterSQLite3Database;

let sqlite: Database.Database | null = null;
let db: AppDatabase | null = null;

function connect(path: string): Database.Database {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const connection = new Database(path);
  if (path !== ":memory:") {
    connection.pragma("journal_mode = WAL");
  }
  connection.pragma("foreign_keys = ON");
  runMigrations(connection);
  return connection;
}

export function getDb(): AppDatabase {
  if (!db) {
    sqlite = connect(env.DATABASE_PATH);
    db = drizzle(sqlite);
    logger.info({ path: env.DATABASE_PATH }, "Database connected");
  }
  return db;
}

/** Opens a standalone, migrated database, independent of the shared connection. */
export function openDatabase(path: string): AppDatabase {
  return drizzle(connect(path));
}

export function closeDb() {
  if (sqlite) {
    sqlite.close();
    sqlite = null;
    db = null;
    logger.info("Database connection closed");
  }
}
