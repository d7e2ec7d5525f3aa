import { z } from "zod";
import type { AdminCredentials } from "../credentials.js";
import { AdminRequestError } from "../errors.js";
import { createTimer, log } from "../logger.js";

// =============================================================================
// WebLogic RESTful Management Client
// =============================================================================
// Thin fetch wrapper around /management/weblogic/latest:
// - Basic auth and the X-Requested-By header the server demands on writes
// - Request timeout with AbortController
// - Every non-2xx, timeout or network error becomes an AdminRequestError
//
// No retry: a failed call aborts the provisioning run.
// =============================================================================

export const MANAGEMENT_PATH = "/management/weblogic/latest";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface AdminClientOptions {
  /** Admin server origin, e.g. http://localhost:7001 */
  baseUrl: string;
  credentials: AdminCredentials;
  /** Per-request timeout (ms) */
  timeoutMs?: number;
  /** Value of X-Requested-By */
  requestedBy?: string;
  fetch?: FetchFn;
}

const DEFAULT_TIMEOUT_MS = 30000;

// WebLogic error bodies: { type, title, status, detail } or { messages: [...] }
const errorBodySchema = z.object({
  detail: z.string().optional(),
  messages: z.array(z.object({ message: z.string() })).optional(),
});

function describeErrorBody(body: unknown): string | undefined {
  if (typeof body === "string") {
    return body.trim() || undefined;
  }
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) {
    return undefined;
  }
  return parsed.data.detail ?? parsed.data.messages?.map((m) => m.message).join("; ");
}

/**
 * Validate a 2xx body. A body of the wrong shape fails the call like any
 * other bad response.
 */
export function parseResponse<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  request: { method: HttpMethod; path: string }
): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (parsed.success) {
    return parsed.data;
  }

  const detail = parsed.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "body"}: ${issue.message}`)
    .join("; ");
  throw new AdminRequestError(
    `${request.method} ${request.path} returned an unexpected body: ${detail}`,
    { ...request, detail },
    { cause: parsed.error }
  );
}

export class AdminRestClient {
  readonly baseUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly requestedBy: string;
  private readonly fetchFn: FetchFn;

  constructor(options: AdminClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    const { username, password } = options.credentials;
    this.authorization = `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.requestedBy = options.requestedBy ?? "wls-provision";
    this.fetchFn = options.fetch ?? fetch;
  }

  async get(path: string, query: Record<string, string> = {}): Promise<unknown> {
    return this.request("GET", path, undefined, query);
  }

  async post(path: string, body: Record<string, unknown> = {}): Promise<unknown> {
    return this.request("POST", path, body);
  }

  /**
   * Execute one management call. `path` is relative to the management root
   * (e.g. `/edit/JMSServers`).
   */
  async request(
    method: HttpMethod,
    path: string,
    body?: Record<string, unknown>,
    query: Record<string, string> = {}
  ): Promise<unknown> {
    const timer = createTimer();
    const search = new URLSearchParams(query).toString();
    const url = `${this.baseUrl}${MANAGEMENT_PATH}${path}${search ? `?${search}` : ""}`;

    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: this.authorization,
      "X-Requested-By": this.requestedBy,
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      const isTimeout = error instanceof Error && error.name === "AbortError";
      const message = isTimeout
        ? `${method} ${path} timed out after ${this.timeoutMs}ms`
        : `${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`;
      throw new AdminRequestError(message, { method, path }, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    const payload = await this.readBody(response);
    const duration = timer();

    if (!response.ok) {
      const detail = describeErrorBody(payload);
      log.admin.error({ method, path, status: response.status, detail, duration }, "request failed");
      throw new AdminRequestError(
        `${method} ${path} returned HTTP ${response.status}${detail ? `: ${detail}` : ""}`,
        { method, path, status: response.status, detail }
      );
    }

    log.admin.debug({ method, path, status: response.status, duration }, "request");
    return payload;
  }

  private async readBody(response: Response): Promise<unknown> {
    const text = await response.text();
    if (text === "") {
      return undefined;
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (!contentType.includes("application/json")) {
      return text;
    }

    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
}
