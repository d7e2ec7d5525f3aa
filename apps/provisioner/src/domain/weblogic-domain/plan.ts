import { posix } from "node:path";
import type { Config } from "../../config.js";
import type { DomainPlanInput, DomainStep, SecretRef } from "./types.js";

/** Environment variables the WLST process reads the admin credentials from */
export const CREDENTIAL_ENV = {
  username: "WLS_ADMIN_USERNAME",
  password: "WLS_ADMIN_PASSWORD",
} as const;

const USERNAME: SecretRef = { secret: CREDENTIAL_ENV.username };
const PASSWORD: SecretRef = { secret: CREDENTIAL_ENV.password };

// The template ships its admin server and admin user under these names
const TEMPLATE_ADMIN_SERVER = "AdminServer";
const TEMPLATE_ADMIN_USER = "weblogic";

export function domainPlanInput(config: Config): DomainPlanInput {
  return {
    domainName: config.DOMAIN_NAME,
    adminName: config.ADMIN_NAME,
    adminListenPort: config.ADMIN_LISTEN_PORT,
    productionMode: config.PRODUCTION_MODE,
    administrationPortEnabled: config.ADMINISTRATION_PORT_ENABLED,
    administrationPort: config.ADMINISTRATION_PORT,
    domainRoot: config.DOMAIN_ROOT,
    template: config.DOMAIN_TEMPLATE,
    nodeManagerListenPort: config.NODE_MANAGER_LISTEN_PORT,
  };
}

export function domainHome(input: Pick<DomainPlanInput, "domainRoot" | "domainName">): string {
  return posix.join(input.domainRoot, input.domainName);
}

/**
 * Build the domain-creation call sequence.
 *
 * With the administration port disabled, both the port assignment and the
 * admin server's SSL channel are left out.
 */
export function buildDomainPlan(input: DomainPlanInput): DomainStep[] {
  const { domainName, adminName, administrationPortEnabled } = input;

  const steps: DomainStep[] = [
    { op: "selectTemplate", template: input.template },
    { op: "loadTemplates" },
    { op: "set", attribute: "Name", value: domainName },
    { op: "setOption", option: "DomainName", value: domainName },
  ];

  if (administrationPortEnabled) {
    steps.push(
      { op: "set", attribute: "AdministrationPort", value: input.administrationPort },
      { op: "set", attribute: "AdministrationPortEnabled", value: "true" }
    );
  }

  steps.push(
    { op: "cd", path: `/Servers/${TEMPLATE_ADMIN_SERVER}` },
    { op: "set", attribute: "Name", value: adminName },
    { op: "set", attribute: "ListenAddress", value: "" },
    { op: "set", attribute: "ListenPort", value: input.adminListenPort }
  );

  if (administrationPortEnabled) {
    steps.push(
      { op: "create", name: adminName, type: "SSL" },
      { op: "cd", path: `SSL/${adminName}` },
      { op: "set", attribute: "Enabled", value: "True" }
    );
  }

  steps.push(
    { op: "cd", path: `/Security/${domainName}/User/${TEMPLATE_ADMIN_USER}` },
    { op: "set", attribute: "Name", value: USERNAME },
    { op: "set", attribute: "Password", value: PASSWORD },

    { op: "setOption", option: "OverwriteDomain", value: "true" },
    { op: "setOption", option: "ServerStartMode", value: input.productionMode },

    { op: "cd", path: "/NMProperties" },
    { op: "set", attribute: "ListenAddress", value: "" },
    { op: "set", attribute: "ListenPort", value: input.nodeManagerListenPort },
    { op: "set", attribute: "CrashRecoveryEnabled", value: "true" },
    { op: "set", attribute: "NativeVersionEnabled", value: "true" },
    { op: "set", attribute: "StartScriptEnabled", value: "false" },
    { op: "set", attribute: "SecureListener", value: "false" },
    { op: "set", attribute: "LogLevel", value: "FINEST" },

    { op: "cd", path: `/SecurityConfiguration/${domainName}` },
    { op: "set", attribute: "NodeManagerUsername", value: USERNAME },
    { op: "set", attribute: "NodeManagerPasswordEncrypted", value: PASSWORD },

    { op: "writeDomain", path: domainHome(input) },
    { op: "closeTemplate" },
    { op: "exit" }
  );

  return steps;
}
