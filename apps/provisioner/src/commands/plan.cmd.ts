/**
 * plan: show what create-domain or provision-jms would do.
 */

import { Argument, Command } from "commander";
import type { Config } from "../config.js";
import { buildMessagingPlan, describeStep, messagingPlanInput } from "../domain/messaging/plan.js";
import { buildDomainPlan, domainPlanInput } from "../domain/weblogic-domain/plan.js";
import { renderWlstScript } from "../wlst/render.js";

interface PlanCommandOptions {
  json?: boolean;
}

export function createPlanCommand(config: Config): Command {
  return new Command("plan")
    .description("Print the domain or JMS call sequence")
    .addArgument(new Argument("<target>", "which plan to print").choices(["domain", "jms"]))
    .option("--json", "Print the steps as JSON")
    .action((target: string, options: PlanCommandOptions) => {
      if (target === "domain") {
        const plan = buildDomainPlan(domainPlanInput(config));
        console.log(options.json ? JSON.stringify(plan, null, 2) : renderWlstScript(plan));
        return;
      }

      const plan = buildMessagingPlan(messagingPlanInput(config));
      if (options.json) {
        console.log(JSON.stringify(plan, null, 2));
        return;
      }
      plan.forEach((step, index) => console.log(`${index + 1}. ${describeStep(step)}`));
    });
}
