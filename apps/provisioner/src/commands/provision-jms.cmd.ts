/**
 * provision-jms: create the JMS server, module, factory and queues on the
 * running admin server.
 */

import { Command } from "commander";
import type { Config } from "../config.js";
import { buildMessagingPlan, describeStep, messagingPlanInput } from "../domain/messaging/plan.js";
import { provisionMessaging } from "../services/jms-provisioner.js";

interface ProvisionJmsCommandOptions {
  dryRun?: boolean;
  wait: boolean;
}

export function createProvisionJmsCommand(config: Config): Command {
  return new Command("provision-jms")
    .description("Provision JMS resources on the running admin server (REST management)")
    .option("--dry-run", "Print the call sequence without contacting the server")
    .option("--no-wait", "Do not wait for the admin server to report RUNNING")
    .action(async (options: ProvisionJmsCommandOptions) => {
      if (options.dryRun) {
        buildMessagingPlan(messagingPlanInput(config)).forEach((step, index) => {
          console.log(`${index + 1}. ${describeStep(step)}`);
        });
        return;
      }

      const { report, duration } = await provisionMessaging(config, { wait: options.wait });

      for (const { step, outcome } of report) {
        console.log(`[${outcome}] ${describeStep(step)}`);
      }
      console.log(`JMS resources provisioned in ${duration}`);
    });
}
