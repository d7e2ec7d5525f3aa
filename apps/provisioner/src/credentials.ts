import { readFile } from "node:fs/promises";
import type { Config } from "./config.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";

export interface AdminCredentials {
  username: string;
  password: string;
}

/**
 * Parse a `key=value` properties file. `#` and `!` start comment lines;
 * `:` is accepted as a separator too.
 */
export function parseProperties(content: string): Record<string, string> {
  const properties: Record<string, string> = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#") || line.startsWith("!")) {
      continue;
    }

    const separator = line.search(/[=:]/);
    if (separator === -1) {
      properties[line] = "";
      continue;
    }

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    if (key) {
      properties[key] = value;
    }
  }

  return properties;
}

async function readSecurityProperties(path: string): Promise<Record<string, string> | null> {
  try {
    return parseProperties(await readFile(path, "utf-8"));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw new ConfigError(`Cannot read security properties ${path}`, { path }, { cause: error });
  }
}

/**
 * ADMIN_USERNAME / ADMIN_PASSWORD win field by field; whatever is still
 * missing comes from DOMAIN_SECURITY_PROPERTIES.
 */
export async function resolveCredentials(
  config: Pick<Config, "ADMIN_USERNAME" | "ADMIN_PASSWORD" | "DOMAIN_SECURITY_PROPERTIES">
): Promise<AdminCredentials> {
  let username = config.ADMIN_USERNAME;
  let password = config.ADMIN_PASSWORD;

  if (username !== undefined && password !== undefined) {
    return { username, password };
  }

  const path = config.DOMAIN_SECURITY_PROPERTIES;
  const properties = await readSecurityProperties(path);

  if (properties) {
    username = username ?? (properties.username || undefined);
    password = password ?? (properties.password || undefined);
    log.system.debug({ path }, "credentials read from security properties");
  }

  const missing = [
    ...(username === undefined ? ["username"] : []),
    ...(password === undefined ? ["password"] : []),
  ];

  if (username === undefined || password === undefined) {
    throw new ConfigError(
      `Admin ${missing.join(" and ")} not set: export ADMIN_USERNAME/ADMIN_PASSWORD or provide ${path}`,
      { missing, path, propertiesFound: properties !== null }
    );
  }

  return { username, password };
}
