import { access } from "node:fs/promises";
import { join } from "node:path";
import { wlstPath, type Config } from "../config.js";
import { resolveCredentials } from "../credentials.js";
import { buildDomainPlan, CREDENTIAL_ENV, domainHome, domainPlanInput } from "../domain/weblogic-domain/plan.js";
import { DomainExistsError } from "../errors.js";
import { createTimer, log } from "../logger.js";
import { renderWlstScript } from "../wlst/render.js";
import { runWlst, type WlstRunner } from "../wlst/runner.js";

export interface CreateDomainOptions {
  /** Render the script without running WLST */
  dryRun?: boolean;
  /** Recreate a domain whose config.xml already exists */
  force?: boolean;
  /** Fail instead of skipping when the domain already exists */
  failIfExists?: boolean;
  runner?: WlstRunner;
}

export type CreateDomainStatus = "created" | "skipped" | "dry-run";

export interface CreateDomainResult {
  status: CreateDomainStatus;
  domainHome: string;
  script: string;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function domainExists(home: string): Promise<boolean> {
  return fileExists(join(home, "config", "config.xml"));
}

export async function createDomain(
  config: Config,
  options: CreateDomainOptions = {}
): Promise<CreateDomainResult> {
  const input = domainPlanInput(config);
  const home = domainHome(input);
  const script = renderWlstScript(buildDomainPlan(input));

  if (options.dryRun) {
    return { status: "dry-run", domainHome: home, script };
  }

  if (!options.force && (await domainExists(home))) {
    if (options.failIfExists) {
      throw new DomainExistsError(home);
    }
    log.domain.info({ domainHome: home }, "domain already exists, skipping creation");
    return { status: "skipped", domainHome: home, script };
  }

  const credentials = await resolveCredentials(config);
  const timer = createTimer();

  log.domain.info({
    domain: input.domainName,
    adminServer: input.adminName,
    listenPort: input.adminListenPort,
    administrationPort: input.administrationPortEnabled ? input.administrationPort : null,
    mode: input.productionMode,
    domainHome: home,
  }, "creating domain");

  const run = options.runner ?? runWlst;
  await run(script, {
    wlstPath: wlstPath(config),
    env: {
      [CREDENTIAL_ENV.username]: credentials.username,
      [CREDENTIAL_ENV.password]: credentials.password,
    },
  });

  log.domain.info({ domainHome: home, duration: timer() }, "domain created");
  return { status: "created", domainHome: home, script };
}
