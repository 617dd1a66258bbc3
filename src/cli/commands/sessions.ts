import type { Command } from "commander";
import { sessionsRepo } from "../../db/repositories/sessions.repo";
import { interactionsRepo } from "../../db/repositories/interactions.repo";
import { logger } from "../../core/logger";

export const commands = (program: Command) => {
  const sessionsCmd = program.command("sessions");

  sessionsCmd
    .command("list")
    .option("--account <id>", "Only sessions of this account")
    .option("--limit <n>", "Number of sessions to show", "20")
    .action(async (options: { account?: string; limit: string }) => {
      const limit = parseInt(options.limit, 10) || 20;
      const accountId = options.account ? parseInt(options.account, 10) : undefined;
      const sessions = await sessionsRepo.listRecent(limit, accountId);

      logger.info({ count: sessions.length }, "Recent workflow sessions");
      for (const session of sessions) {
        console.log(
          `  [${session.id}] ${session.workflowType} ${session.target ?? "-"} - ${session.status}` +
            ` (${session.completionReason ?? "running"}) - ${new Date(session.startedAt * 1000).toISOString()}`
        );
      }
    });

  sessionsCmd
    .command("show")
    .requiredOption("--id <id>", "Session ID")
    .action(async (options: { id: string }) => {
      const id = parseInt(options.id, 10);
      const session = await sessionsRepo.findById(id);
      if (!session) {
        logger.error({ id }, "Session not found");
        process.exitCode = 1;
        return;
      }

      const interactions = await interactionsRepo.listBySession(id);
      console.log(JSON.stringify({ ...session, stats: session.statsJson ? JSON.parse(session.statsJson) : null }, null, 2));
      for (const interaction of interactions) {
        console.log(`  ${interaction.kind} @${interaction.targetIdentifier} ${interaction.success ? "ok" : "failed"}`);
      }
    });
};
