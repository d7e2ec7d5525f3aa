import { describe, it, expect, vi } from "vitest";
import { AdminRestClient, type FetchFn } from "../../../http/admin-client.js";
import { editPath, RestEditSession } from "../../../http/edit-session.js";
import { AdminRequestError } from "../../../errors.js";

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { headers: { "content-type": "application/json" } });
}

function sessionWith(fetch: FetchFn): RestEditSession {
  return new RestEditSession(
    new AdminRestClient({
      baseUrl: "http://wls.test:7001",
      credentials: { username: "weblogic", password: "test-password" },
      fetch,
    })
  );
}

describe("editPath", () => {
  it("should encode each segment", () => {
    expect(editPath(["JMSSystemResources", "udd%queue", "subDeployments"])).toBe(
      "/edit/JMSSystemResources/udd%25queue/subDeployments"
    );
  });
});

describe("RestEditSession", () => {
  it("should list bean names", async () => {
    const fetch = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ items: [{ name: "A" }, { name: "B" }] }));

    await expect(sessionWith(fetch).list(["JMSServers"])).resolves.toEqual(["A", "B"]);
  });

  it("should read the admin server name from the domain bean", async () => {
    const fetch = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ name: "base_domain", adminServerName: "admin-0" }));

    await expect(sessionWith(fetch).adminServerName()).resolves.toBe("admin-0");
  });

  it("should reject a collection body without items", async () => {
    const fetch = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ name: "JMSServers" }));

    const error = await sessionWith(fetch).list(["JMSServers"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AdminRequestError);
    expect(error).toMatchObject({
      message: "GET /edit/JMSServers returned an unexpected body: items: Required",
      details: { method: "GET", path: "/edit/JMSServers" },
    });
  });

  it("should reject a domain bean without adminServerName", async () => {
    const fetch = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ name: "base_domain" }));

    await expect(sessionWith(fetch).adminServerName()).rejects.toMatchObject({
      code: "ADMIN_REQUEST_FAILED",
      message: "GET /edit returned an unexpected body: adminServerName: Required",
    });
  });

  it("should refuse calls after disconnect", async () => {
    const fetch = vi.fn<FetchFn>();
    const session = sessionWith(fetch);

    await session.disconnect();

    await expect(session.startEdit()).rejects.toMatchObject({ code: "SESSION_CLOSED" });
    expect(fetch).not.toHaveBeenCalled();
  });
});
