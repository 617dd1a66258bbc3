import type { Command } from "commander";

export const commands = (program: Command) => {
  program
    .command("serve")
    .description("Start the read-only reporting API")
    .action(async () => {
      const { startServer } = await import("../../server/index");
      startServer();
    });
};
