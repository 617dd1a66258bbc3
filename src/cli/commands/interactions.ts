import type { Command } from "commander";
import { interactionsRepo } from "../../db/repositories/interactions.repo";
import { logger } from "../../core/logger";

export const commands = (program: Command) => {
  const interactionsCmd = program.command("interactions");

  interactionsCmd
    .command("list")
    .requiredOption("--account <id>", "Account ID")
    .option("--limit <n>", "Number of interactions to show", "50")
    .action(async (options: { account: string; limit: string }) => {
      const accountId = parseInt(options.account, 10);
      const limit = parseInt(options.limit, 10) || 50;
      const rows = await interactionsRepo.listByAccount(accountId, limit);

      logger.info({ accountId, count: rows.length }, "Recent interactions");
      for (const row of rows) {
        console.log(
          `  ${new Date(row.updatedAt * 1000).toISOString()} ${row.kind.padEnd(8)} @${row.targetIdentifier} ${row.success ? "ok" : "failed"}`
        );
      }
    });
};
