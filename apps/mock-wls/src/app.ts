/**
 * Mock WebLogic Admin Server
 *
 * Mimics the RESTful management edit tree closely enough to provision JMS
 * resources against. For local development and tests only.
 *
 * Endpoints:
 *   GET  /management/weblogic/latest/serverRuntime               - Server state
 *   GET  /management/weblogic/latest/edit                        - Domain bean
 *   POST /management/weblogic/latest/edit/changeManager/:action  - startEdit, activate, cancelEdit
 *   GET  /management/weblogic/latest/edit/*                      - List a collection
 *   POST /management/weblogic/latest/edit/*                      - Create a bean
 *   GET  /calls   - Recorded management calls
 *   GET  /config  - Current config
 *   POST /config  - Set server state, inject failures
 *   POST /reset   - Reset tree, calls and config
 *   GET  /health  - Health check
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { resetConfig, updateConfig, type ServerState } from "./config.js";
import { registerControlRoutes } from "./routes/control.js";
import { MANAGEMENT_PATH, registerManagementRoutes } from "./routes/management.js";
import { EditTree, type RecordedCall } from "./store.js";

export { EditTree, type RecordedCall } from "./store.js";
export { getConfig, updateConfig, type InjectedFailure, type ServerState } from "./config.js";
export { injectFetch } from "./inject-fetch.js";
export { MANAGEMENT_PATH } from "./routes/management.js";

export interface MockServerOptions {
  domainName?: string;
  adminServerName?: string;
  username?: string;
  password?: string;
  serverState?: ServerState;
  logger?: FastifyServerOptions["logger"];
}

export interface MockServer {
  app: FastifyInstance;
  tree: EditTree;
  calls: RecordedCall[];
}

export async function buildServer(options: MockServerOptions = {}): Promise<MockServer> {
  const app = Fastify({ logger: options.logger ?? false });
  const tree = new EditTree(options.domainName ?? "base_domain", options.adminServerName ?? "AdminServer");
  const calls: RecordedCall[] = [];

  resetConfig();
  updateConfig({
    ...(options.username !== undefined && { username: options.username }),
    ...(options.password !== undefined && { password: options.password }),
    ...(options.serverState !== undefined && { serverState: options.serverState }),
  });

  // Record management calls in arrival order, before auth so rejected calls show up too
  app.addHook("preValidation", async (request) => {
    if (request.url.startsWith(MANAGEMENT_PATH)) {
      calls.push({
        method: request.method,
        path: decodeURIComponent(request.url.split("?")[0].slice(MANAGEMENT_PATH.length)),
        ...(request.body !== undefined && { body: request.body }),
      });
    }
  });

  await registerManagementRoutes(app, tree);
  await registerControlRoutes(app, tree, calls);

  return { app, tree, calls };
}
