/**
 * create-domain: build the WebLogic domain from its template via offline WLST.
 */

import { Command } from "commander";
import type { Config } from "../config.js";
import { createDomain } from "../services/domain-creator.js";

interface CreateDomainCommandOptions {
  dryRun?: boolean;
  force?: boolean;
  failIfExists?: boolean;
}

export function createCreateDomainCommand(config: Config): Command {
  return new Command("create-domain")
    .description("Create the domain from the product template (offline WLST)")
    .option("--dry-run", "Print the WLST script instead of running it")
    .option("--force", "Recreate the domain even if config/config.xml exists")
    .option("--fail-if-exists", "Exit with an error when the domain already exists")
    .action(async (options: CreateDomainCommandOptions) => {
      const result = await createDomain(config, {
        dryRun: options.dryRun,
        force: options.force,
        failIfExists: options.failIfExists,
      });

      if (result.status === "dry-run") {
        console.log(result.script);
        return;
      }

      console.log(`Domain ${result.status}: ${result.domainHome}`);
    });
}
