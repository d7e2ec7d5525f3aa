#!/usr/bin/env node
/**
 * wls-provision entry point.
 *
 * Runs one command per invocation inside a trace context. Any failure is
 * logged once here and turns into exit code 1.
 */

import { createCLI } from "./cli.js";
import { config } from "./config.js";
import { ProvisioningError } from "./errors.js";
import { logFailure, withTraceAsync } from "./logger.js";

async function main(): Promise<void> {
  await withTraceAsync(async () => {
    await createCLI(config).parseAsync(process.argv);
  });
}

main().catch((error: unknown) => {
  const context = error instanceof ProvisioningError ? { code: error.code, details: error.details } : {};
  logFailure("system", "wls-provision failed", error, context);
  process.exitCode = 1;
});
