import type { Command } from "commander";
import { accountsRepo } from "../../db/repositories/accounts.repo";
import { logger } from "../../core/logger";
import { toIdentifier } from "../../core/normalize";

export const commands = (program: Command) => {
  const accountsCmd = program.command("accounts");

  accountsCmd
    .command("add")
    .requiredOption("--username <username>", "Operator account username (with or without @)")
    .option("--name <name>", "Display name")
    .option("--device <serial>", "Default device serial for this account")
    .action(async (options: { username: string; name?: string; device?: string }) => {
      const username = toIdentifier(options.username);
      if (!username) {
        logger.error({ username: options.username }, "Invalid username");
        process.exitCode = 1;
        return;
      }

      const existing = await accountsRepo.findByUsername(username);
      if (existing) {
        logger.warn({ accountId: existing.id, username }, "Account already exists");
        return;
      }

      const account = await accountsRepo.create({
        username,
        displayName: options.name || username,
        deviceSerial: options.device ?? null,
      });
    });

  accountsCmd.command("list").action(async () => {
    const list = await accountsRepo.list();

    logger.info({ count: list.length }, "Accounts");
    for (const account of list) {
      console.log(`  [${account.id}] @${account.username} (${account.displayName})${account.deviceSerial ? ` device=${account.deviceSerial}` : ""}`);
    }
  });
};
