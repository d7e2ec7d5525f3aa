/**
 * Control routes for tests and local runs
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { getConfig, resetConfig, updateConfig } from "../config.js";
import type { EditTree, RecordedCall } from "../store.js";

const configSchema = z.object({
  serverState: z.enum(["SHUTDOWN", "STARTING", "STANDBY", "RESUMING", "RUNNING"]).optional(),
  failures: z
    .array(
      z.object({
        method: z.enum(["GET", "POST"]),
        path: z.string().startsWith("/"),
        status: z.number().int().min(400).max(599),
        detail: z.string().optional(),
      })
    )
    .optional(),
});

export async function registerControlRoutes(
  app: FastifyInstance,
  tree: EditTree,
  calls: RecordedCall[]
): Promise<void> {
  /**
   * GET /calls - Management calls received so far, in order
   */
  app.get("/calls", async (request, reply) => {
    return reply.send({ count: calls.length, calls });
  });

  /**
   * GET /config - Current behavior
   */
  app.get("/config", async (request, reply) => {
    const { serverState, failures } = getConfig();
    return reply.send({ serverState, failures });
  });

  /**
   * POST /config - Change server state or inject failures
   */
  app.post("/config", async (request, reply) => {
    const result = configSchema.safeParse(request.body);
    if (!result.success) {
      return reply.status(400).send({
        error: "Invalid configuration",
        details: result.error.format(),
      });
    }

    const { serverState, failures } = updateConfig({
      ...(result.data.serverState !== undefined && { serverState: result.data.serverState }),
      ...(result.data.failures !== undefined && { failures: result.data.failures }),
    });
    request.log.info({ serverState, failures: failures.length }, "config updated");
    return reply.send({ serverState, failures });
  });

  /**
   * POST /reset - Empty tree, call log and config
   */
  app.post("/reset", async (request, reply) => {
    tree.reset();
    calls.length = 0;
    const { username, password } = getConfig();
    updateConfig({ ...resetConfig(), username, password });
    return reply.send({ success: true });
  });

  /**
   * GET /health - Health check
   */
  app.get("/health", async (request, reply) => {
    return reply.send({ status: "ok", ...tree.stats() });
  });
}
