import { Command } from "commander";
import type { Config } from "../config.js";
import { resolveCredentials } from "../credentials.js";
import { AdminRestClient } from "../http/admin-client.js";
import { waitForAdminServer } from "../services/admin-readiness.js";

export function createWaitReadyCommand(config: Config): Command {
  return new Command("wait-ready")
    .description("Block until the admin server reports RUNNING")
    .action(async () => {
      const client = new AdminRestClient({
        baseUrl: config.ADMIN_URL,
        credentials: await resolveCredentials(config),
        timeoutMs: config.ADMIN_REQUEST_TIMEOUT_MS,
      });

      const result = await waitForAdminServer(client, {
        timeoutMs: config.ADMIN_READY_TIMEOUT_MS,
        pollIntervalMs: config.ADMIN_READY_POLL_MS,
      });

      console.log(`Admin server ${result.state} after ${result.attempts} attempt(s)`);
    });
}
