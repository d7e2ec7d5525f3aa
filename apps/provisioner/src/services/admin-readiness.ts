/**
 * Admin server readiness
 *
 * The messaging recipe runs right after the server is launched, so it first
 * polls serverRuntime until the admin server reports RUNNING. Polling is
 * read-only; 401/403 abort immediately since waiting cannot fix credentials.
 */

import { z } from "zod";
import { calculateBackoff, delayUntilDeadline } from "../domain/utils/backoff.js";
import { AdminRequestError, AdminServerUnavailableError } from "../errors.js";
import { parseResponse, type AdminRestClient } from "../http/admin-client.js";
import { log } from "../logger.js";

const MAX_POLL_DELAY_MS = 30000;

const serverRuntimeSchema = z.object({
  name: z.string().optional(),
  state: z.string(),
});

export interface ReadinessOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface ReadinessResult {
  state: string;
  attempts: number;
  waitedMs: number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function waitForAdminServer(
  client: AdminRestClient,
  options: ReadinessOptions
): Promise<ReadinessResult> {
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const startedAt = now();

  let lastState: string | undefined;
  let lastError: string | undefined;

  for (let attempt = 1; ; attempt++) {
    try {
      const body = await client.get("/serverRuntime", { fields: "name,state", links: "none" });
      lastState = parseResponse(serverRuntimeSchema, body, { method: "GET", path: "/serverRuntime" }).state;

      if (lastState === "RUNNING") {
        const waitedMs = now() - startedAt;
        log.admin.info({ attempts: attempt, waitedMs }, "admin server running");
        return { state: lastState, attempts: attempt, waitedMs };
      }

      log.admin.debug({ attempt, state: lastState }, "admin server not running yet");
    } catch (error) {
      if (!(error instanceof AdminRequestError) || error.status === 401 || error.status === 403) {
        throw error;
      }
      lastError = error.message;
      log.admin.debug({ attempt, error: error.message }, "admin server not reachable yet");
    }

    const remainingMs = options.timeoutMs - (now() - startedAt);
    if (remainingMs <= 0) {
      throw new AdminServerUnavailableError(client.baseUrl, now() - startedAt, {
        attempts: attempt,
        lastState,
        lastError,
      });
    }

    const delay = calculateBackoff(attempt - 1, {
      baseDelayMs: options.pollIntervalMs,
      maxDelayMs: MAX_POLL_DELAY_MS,
    });
    await sleep(delayUntilDeadline(delay, remainingMs));
  }
}
