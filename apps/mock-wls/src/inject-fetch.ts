import type { FastifyInstance } from "fastify";

/**
 * fetch-compatible function that routes requests into `app.inject`, so a
 * client under test talks to the mock without opening a socket. Only the
 * path and query of the URL are used.
 */
export function injectFetch(app: FastifyInstance) {
  return async (url: string, init: RequestInit = {}): Promise<Response> => {
    const { pathname, search } = new URL(url);

    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });

    const method = init.method ?? "GET";
    if (method !== "GET" && method !== "POST" && method !== "DELETE") {
      throw new TypeError(`injectFetch does not support ${method}`);
    }

    const res = await app.inject({
      method,
      url: `${pathname}${search}`,
      headers,
      payload: typeof init.body === "string" ? init.body : undefined,
    });

    const contentType = res.headers["content-type"];
    return new Response(res.body === "" ? null : res.body, {
      status: res.statusCode,
      headers: typeof contentType === "string" ? { "content-type": contentType } : {},
    });
  };
}
