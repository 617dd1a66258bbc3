import type { Command } from "commander";
import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { env } from "../../core/config";
import { logger } from "../../core/logger";
import { errorMessage } from "../../core/errors";
import { runMigrations } from "../../db/migrate";

export const commands = (program: Command) => {
  const dbCmd = program.command("db");

  dbCmd
    .command("migrate")
    .description("Run database migrations")
    .action(() => {
      if (env.DATABASE_PATH !== ":memory:") {
        mkdirSync(dirname(env.DATABASE_PATH), { recursive: true });
      }
      const db = new Database(env.DATABASE_PATH);
      try {
        const applied = runMigrations(db);
        logger.info({ applied: applied.length, path: env.DATABASE_PATH }, "Database schema is up to date");
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Database migration failed");
        process.exitCode = 1;
      } finally {
        db.close();
      }
    });
};
