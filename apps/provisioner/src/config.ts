import { z } from "zod";

// Helper for parsing string booleans from environment variables
// z.coerce.boolean() treats any non-empty string as true, including "false".
// Anything other than true/false (any case, surrounding spaces) is rejected.
const stringBoolean = z
  .union([z.boolean(), z.string().trim().toLowerCase().pipe(z.enum(["true", "false"]))])
  .transform((val) => (typeof val === "boolean" ? val : val === "true"));

// Unset and empty variables both mean "not provided"
const optionalString = z.preprocess((val) => (val === "" ? undefined : val), z.string().min(1).optional());

const port = z.coerce.number().int().min(1).max(65535);

const commaList = z
  .string()
  .transform((val) =>
    val
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

export const envSchema = z
  .object({
    // Environment
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),

    // =========================================================================
    // Domain creation (offline WLST)
    // =========================================================================
    DOMAIN_NAME: z.string().min(1).default("base_domain"),
    ADMIN_NAME: z.string().min(1).default("AdminServer"),
    ADMIN_LISTEN_PORT: port.default(7001),
    PRODUCTION_MODE: z.enum(["dev", "prod"]).default("prod"),
    ADMINISTRATION_PORT_ENABLED: stringBoolean.default(true),
    ADMINISTRATION_PORT: port.default(9002),

    ORACLE_HOME: z.string().min(1).default("/u01/oracle"),
    DOMAIN_ROOT: z.string().min(1).default("/u01/oracle/user_projects/domains"),
    DOMAIN_TEMPLATE: z.string().min(1).default("Basic WebLogic Server Domain"),
    WLST_PATH: optionalString, // Falls back to $ORACLE_HOME/oracle_common/common/bin/wlst.sh
    DOMAIN_SECURITY_PROPERTIES: z
      .string()
      .min(1)
      .default("/u01/oracle/properties/domain_security.properties"),
    NODE_MANAGER_LISTEN_PORT: port.default(5556),

    // =========================================================================
    // Admin server connection (RESTful management)
    // =========================================================================
    ADMIN_URL: z.string().url().default("http://localhost:7001"),
    ADMIN_USERNAME: optionalString, // Read from DOMAIN_SECURITY_PROPERTIES when unset
    ADMIN_PASSWORD: optionalString,
    ADMIN_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    ADMIN_READY_TIMEOUT_MS: z.coerce.number().int().positive().default(5 * 60 * 1000), // 5 minutes
    ADMIN_READY_POLL_MS: z.coerce.number().int().positive().default(2000),

    // =========================================================================
    // JMS resources
    // =========================================================================
    JMS_SERVER_NAME: z.string().min(1).default("TestJMSServer"),
    JMS_MODULE_NAME: z.string().min(1).default("TestJMSModule"),
    JMS_SUBDEPLOYMENT_NAME: z.string().min(1).default("TestJMSSubdeployment"),
    JMS_CONNECTION_FACTORY_NAME: z.string().min(1).default("TestConnectionFactory"),
    JMS_QUEUE_NAME: z.string().min(1).default("TestQueue"),
    JMS_DISTRIBUTED_QUEUE_NAME: z.string().min(1).default("udd_queue"),
    JMS_DISTRIBUTED_QUEUE_MEMBERS: commaList.default("ms1@udd_queue,ms2@udd_queue"),
    JMS_JNDI_PREFIX: z.string().default("jms/"),
    JMS_LOAD_BALANCING_POLICY: z.enum(["Round-Robin", "Random"]).default("Round-Robin"),
  })
  .superRefine((env, ctx) => {
    if (env.ADMINISTRATION_PORT_ENABLED && env.ADMINISTRATION_PORT === env.ADMIN_LISTEN_PORT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ADMINISTRATION_PORT"],
        message: "must differ from ADMIN_LISTEN_PORT while the administration port is enabled",
      });
    }
  });

export type Config = z.infer<typeof envSchema>;

export function parseConfig(env: Record<string, string | undefined>): Config {
  return envSchema.parse(env);
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    console.error("Missing or invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

/** WLST launcher, derived from ORACLE_HOME unless WLST_PATH overrides it */
export function wlstPath(config: Pick<Config, "WLST_PATH" | "ORACLE_HOME">): string {
  return config.WLST_PATH ?? `${config.ORACLE_HOME}/oracle_common/common/bin/wlst.sh`;
}

export const config = loadConfig();
