import { Command } from "commander";
import type { Config } from "./config.js";
import { createCreateDomainCommand } from "./commands/create-domain.cmd.js";
import { createPlanCommand } from "./commands/plan.cmd.js";
import { createProvisionJmsCommand } from "./commands/provision-jms.cmd.js";
import { createWaitReadyCommand } from "./commands/wait-ready.cmd.js";

export const VERSION = "0.1.0";

export function createCLI(config: Config): Command {
  const program = new Command();

  program
    .name("wls-provision")
    .description("Create a WebLogic domain and provision its JMS resources")
    .version(VERSION);

  program.addCommand(createCreateDomainCommand(config));
  program.addCommand(createProvisionJmsCommand(config));
  program.addCommand(createWaitReadyCommand(config));
  program.addCommand(createPlanCommand(config));

  return program;
}
