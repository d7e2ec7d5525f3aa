/**
 * Mock RESTful management endpoints
 * Mimics the /management/weblogic/latest edit tree and change manager
 */

import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { getConfig } from "../config.js";
import type { EditTree } from "../store.js";

export const MANAGEMENT_PATH = "/management/weblogic/latest";

const beanSchema = z.object({ name: z.string().min(1) }).passthrough();

function sendError(reply: FastifyReply, status: number, detail: string) {
  // WebLogic error envelope
  return reply.status(status).send({ type: "http://oracle/TBD/WlsRestMessageSchema", title: "FAILURE", status, detail });
}

// The router hands over the wildcard already decoded
function splitPath(wildcard: string): string[] {
  return wildcard.split("/").filter((segment) => segment.length > 0);
}

export async function registerManagementRoutes(app: FastifyInstance, tree: EditTree): Promise<void> {
  /**
   * Basic auth on everything, X-Requested-By on writes, injected failures last
   */
  app.addHook("preHandler", async (request, reply) => {
    if (!request.url.startsWith(MANAGEMENT_PATH)) {
      return;
    }

    const { username, password, failures } = getConfig();
    const expected = `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
    if (request.headers.authorization !== expected) {
      return reply.status(401).send({ status: 401, detail: "Unauthorized" });
    }

    if (request.method !== "GET" && !request.headers["x-requested-by"]) {
      return sendError(reply, 400, "Missing X-Requested-By header");
    }

    const path = request.url.split("?")[0].slice(MANAGEMENT_PATH.length);
    const failure = failures.find((f) => f.method === request.method && decodeURIComponent(path) === f.path);
    if (failure) {
      return sendError(reply, failure.status, failure.detail ?? "Injected failure");
    }
  });

  /**
   * GET /serverRuntime - Admin server state
   */
  app.get(`${MANAGEMENT_PATH}/serverRuntime`, async (request, reply) => {
    return reply.send({ name: tree.adminServerName, state: getConfig().serverState });
  });

  /**
   * GET /edit - Domain bean
   */
  app.get(`${MANAGEMENT_PATH}/edit`, async (request, reply) => {
    return reply.send({ name: tree.domainName, adminServerName: tree.adminServerName });
  });

  /**
   * POST /edit/changeManager/:action - startEdit, activate, cancelEdit
   */
  app.post<{ Params: { action: string } }>(`${MANAGEMENT_PATH}/edit/changeManager/:action`, async (request, reply) => {
    switch (request.params.action) {
      case "startEdit":
        tree.startEdit();
        return reply.send({});
      case "activate": {
        const result = tree.activate();
        if (!result.ok) {
          return sendError(reply, result.status, result.detail);
        }
        return reply.send({ state: "STATE_COMMITTED", changes: result.value.changes });
      }
      case "cancelEdit":
        tree.cancelEdit();
        return reply.send({});
      default:
        return sendError(reply, 404, `Unknown change manager action: ${request.params.action}`);
    }
  });

  /**
   * GET /edit/* - List a collection
   */
  app.get<{ Params: { "*": string } }>(`${MANAGEMENT_PATH}/edit/*`, async (request, reply) => {
    const result = tree.list(splitPath(request.params["*"]));
    if (!result.ok) {
      return sendError(reply, result.status, result.detail);
    }
    return reply.send({ items: result.value });
  });

  /**
   * POST /edit/* - Create a bean in a collection
   */
  app.post<{ Params: { "*": string } }>(`${MANAGEMENT_PATH}/edit/*`, async (request, reply) => {
    const body = beanSchema.safeParse(request.body);
    if (!body.success) {
      return sendError(reply, 400, "Bean body must include a name");
    }

    const { name, ...attributes } = body.data;
    const result = tree.create(splitPath(request.params["*"]), name, attributes);
    if (!result.ok) {
      return sendError(reply, result.status, result.detail);
    }
    return reply.status(201).send({});
  });
}
