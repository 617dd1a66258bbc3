#!/usr/bin/env tsx
import { Command } from "commander";
import { commands as accountsCommands } from "./commands/accounts";
import { commands as dbCommands } from "./commands/db";
import { commands as runCommands } from "./commands/run";
import { commands as sessionsCommands } from "./commands/sessions";
import { commands as interactionsCommands } from "./commands/interactions";
import { commands as serveCommands } from "./commands/serve";

const program = new Command();

program.name("engage").description("Device automation for short-video engagement workflows").version("0.1.0");

accountsCommands(program);
dbCommands(program);
runCommands(program);
sessionsCommands(program);
interactionsCommands(program);
serveCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
