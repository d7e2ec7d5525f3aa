import pino from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";
import { config } from "./config.js";

const isDev = config.NODE_ENV === "development";

// =============================================================================
// Trace Context
// =============================================================================
// Every CLI invocation runs inside one trace, so the domain, WLST and JMS lines
// of a single container start-up can be grepped together.
//
//   await withTraceAsync(() => provisionMessaging(config, options));
// =============================================================================

interface TraceContext {
  traceId: string;
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Short trace ID (12 chars, base64url)
 */
export function generateTraceId(): string {
  return randomBytes(9).toString("base64url").slice(0, 12);
}

export async function withTraceAsync<T>(
  fn: () => Promise<T>,
  traceId?: string
): Promise<T> {
  const ctx: TraceContext = { traceId: traceId ?? generateTraceId() };
  return traceStorage.run(ctx, fn);
}

// =============================================================================
// Structured Logger
// =============================================================================
//
//   log.jms.info({ server: "TestJMSServer" }, "created")
//   log.admin.error({ method, path, status }, "request failed")
//
// =============================================================================

const baseConfig: pino.LoggerOptions = {
  level: config.LOG_LEVEL ?? (config.NODE_ENV === "production" ? "info" : "debug"),

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  // Credentials travel through request options and child env; keep them out of logs
  redact: ["password", "*.password", "credentials", "headers.authorization"],

  mixin() {
    const traceId = traceStorage.getStore()?.traceId;
    return traceId ? { traceId } : {};
  },
};

export const logger = isDev
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig);

export const log = {
  // Domain creation lifecycle
  domain: logger.child({ component: "domain" }),

  // WLST child process output
  wlst: logger.child({ component: "wlst" }),

  // JMS resource provisioning
  jms: logger.child({ component: "jms" }),

  // REST management calls
  admin: logger.child({ component: "admin" }),

  // CLI and process-level events
  system: logger.child({ component: "system" }),
};

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: keyof typeof log,
  event: string,
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error({
    ...context,
    error: err.message,
    errorName: err.name,
    ...(isDev && { stack: err.stack }),
  }, event);
}

/**
 * Create a timer for measuring operation duration
 */
export function createTimer(): () => string {
  const start = process.hrtime.bigint();
  return () => {
    const end = process.hrtime.bigint();
    const ms = Number(end - start) / 1_000_000;
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  };
}

export default log;
