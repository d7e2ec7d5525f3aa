import { buildServer } from "./app.js";
import type { ServerState } from "./config.js";

const PORT = parseInt(process.env.PORT || "7001");
const USERNAME = process.env.MOCK_WLS_USERNAME || "weblogic";
const PASSWORD = process.env.MOCK_WLS_PASSWORD || "test-password";
const DOMAIN_NAME = process.env.DOMAIN_NAME || "base_domain";
const ADMIN_NAME = process.env.ADMIN_NAME || "AdminServer";
const STATES: ServerState[] = ["SHUTDOWN", "STARTING", "STANDBY", "RESUMING", "RUNNING"];
const INITIAL_STATE = STATES.find((s) => s === process.env.MOCK_WLS_STATE) ?? "RUNNING";

async function main() {
  const isDev = process.env.NODE_ENV !== "production";

  const { app } = await buildServer({
    domainName: DOMAIN_NAME,
    adminServerName: ADMIN_NAME,
    username: USERNAME,
    password: PASSWORD,
    serverState: INITIAL_STATE,
    logger: isDev
      ? {
          level: "info",
          transport: {
            target: "pino-pretty",
            options: { colorize: true },
          },
        }
      : { level: "info" },
  });

  const shutdown = async () => {
    console.log("\n[SHUTDOWN] Stopping...");
    await app.close();
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await app.listen({ port: PORT, host: "0.0.0.0" });

  console.log(`
========================================
  Mock WebLogic Admin Server
========================================
  http://localhost:${PORT}

  Domain:       ${DOMAIN_NAME}
  Admin server: ${ADMIN_NAME} (${INITIAL_STATE})
  Credentials:  ${USERNAME} / ********

  Endpoints:
    GET  /management/weblogic/latest/serverRuntime
    *    /management/weblogic/latest/edit/...
    GET  /calls   - Recorded calls
    POST /config  - Server state, failures
    POST /reset   - Reset all
========================================
`);
}

main().catch((err) => {
  console.error("Failed to start mock-wls server:", err);
  process.exit(1);
});
