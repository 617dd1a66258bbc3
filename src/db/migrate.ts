import type Database from "better-sqlite3";
import { readFileSync, readdirSync, existsSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { logger } from "../core/logger";
import { errorMessage } from "../core/errors";

const migrationsDir = join(dirname(fileURLToPath(import.meta.url)), "migrations");

const TOLERATED_ERRORS = ["already exists", "duplicate column"];

export function runMigrations(db: Database.Database): string[] {
  logger.info("Running database migrations...");

  if (!existsSync(migrationsDir)) {
    logger.info("No migrations directory found");
    return [];
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS __drizzle_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hash TEXT NOT NULL UNIQUE,
      created_at INTEGER NOT NULL
    )
  `);

  const appliedRows = db.prepare("SELECT hash FROM __drizzle_migrations").all();
  const appliedMigrations = new Set<string>();
  for (const row of appliedRows) {
    if (typeof row === "object" && row !== null && "hash" in row && typeof row.hash === "string") {
      appliedMigrations.add(row.hash);
    }
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  const applied: string[] = [];

  for (const file of files) {
    if (appliedMigrations.has(file)) {
      logger.debug({ file }, "Migration already applied, skipping");
      continue;
    }

    const content = readFileSync(join(migrationsDir, file), "utf-8");
    logger.info({ file }, "Applying migration...");

    const statements = content
      .split("--> statement-breakpoint")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    const apply = db.transaction(() => {
      for (const statement of statements) {
        try {
          logger.debug({ statement: statement.substring(0, 200) }, "Executing statement");
          db.exec(statement);
        } catch (error) {
          const message = errorMessage(error);
          if (TOLERATED_ERRORS.some((fragment) => message.includes(fragment))) {
            logger.debug({ statement: statement.substring(0, 100) }, "Object already exists, continuing");
          } else {
            logger.error({ error: message, statement: statement.substring(0, 200) }, "Statement failed");
            throw error;
          }
        }
      }
      db.prepare("INSERT INTO __drizzle_migrations (hash, created_at) VALUES (?, ?)").run(file, Date.now());
    });

    apply();
    applied.push(file);
    logger.info({ file }, "Migration applied successfully");
  }

  logger.info("All migrations completed");
  return applied;
}
