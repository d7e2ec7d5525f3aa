import { describe, it, expect, vi } from "vitest";
import { AdminServerUnavailableError } from "../../../errors.js";
import { AdminRestClient, type FetchFn } from "../../../http/admin-client.js";
import { waitForAdminServer } from "../../../services/admin-readiness.js";

function stateResponse(state: string): Response {
  return new Response(JSON.stringify({ name: "AdminServer", state }), {
    headers: { "content-type": "application/json" },
  });
}

/**
 * Clock that only moves when the poller sleeps.
 */
function fakeClock() {
  let time = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => time,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      time += ms;
    },
  };
}

function clientWith(fetch: FetchFn): AdminRestClient {
  return new AdminRestClient({
    baseUrl: "http://wls.test:7001",
    credentials: { username: "weblogic", password: "test-password" },
    fetch,
  });
}

describe("waitForAdminServer", () => {
  it("should return immediately when the server is running", async () => {
    const clock = fakeClock();
    const fetch = vi.fn<FetchFn>().mockResolvedValue(stateResponse("RUNNING"));

    const result = await waitForAdminServer(clientWith(fetch), { timeoutMs: 60000, pollIntervalMs: 1000, ...clock });

    expect(result).toEqual({ state: "RUNNING", attempts: 1, waitedMs: 0 });
    expect(clock.sleeps).toEqual([]);
    expect(fetch.mock.calls[0][0]).toBe(
      "http://wls.test:7001/management/weblogic/latest/serverRuntime?fields=name%2Cstate&links=none"
    );
  });

  it("should poll with backoff until RUNNING", async () => {
    const clock = fakeClock();
    const fetch = vi
      .fn<FetchFn>()
      .mockRejectedValueOnce(new Error("connect ECONNREFUSED"))
      .mockResolvedValueOnce(stateResponse("STARTING"))
      .mockResolvedValueOnce(stateResponse("RESUMING"))
      .mockResolvedValueOnce(stateResponse("RUNNING"));

    const result = await waitForAdminServer(clientWith(fetch), { timeoutMs: 60000, pollIntervalMs: 1000, ...clock });

    expect(result).toEqual({ state: "RUNNING", attempts: 4, waitedMs: 7000 });
    expect(clock.sleeps).toEqual([1000, 2000, 4000]);
  });

  it("should keep polling through server errors", async () => {
    const clock = fakeClock();
    const fetch = vi
      .fn<FetchFn>()
      .mockResolvedValueOnce(new Response("Service Unavailable", { status: 503 }))
      .mockResolvedValueOnce(stateResponse("RUNNING"));

    const result = await waitForAdminServer(clientWith(fetch), { timeoutMs: 60000, pollIntervalMs: 500, ...clock });

    expect(result.attempts).toBe(2);
  });

  it("should keep polling through bodies without a state", async () => {
    const clock = fakeClock();
    const fetch = vi
      .fn<FetchFn>()
      .mockResolvedValueOnce(
        new Response(JSON.stringify({ name: "AdminServer" }), { headers: { "content-type": "application/json" } })
      )
      .mockResolvedValueOnce(stateResponse("RUNNING"));

    const result = await waitForAdminServer(clientWith(fetch), { timeoutMs: 60000, pollIntervalMs: 1000, ...clock });

    expect(result).toEqual({ state: "RUNNING", attempts: 2, waitedMs: 1000 });
    expect(clock.sleeps).toEqual([1000]);
  });

  it("should report the last unexpected body at the deadline", async () => {
    const clock = fakeClock();
    const fetch = vi
      .fn<FetchFn>()
      .mockImplementation(async () =>
        new Response(JSON.stringify({ name: "AdminServer" }), { headers: { "content-type": "application/json" } })
      );

    await expect(
      waitForAdminServer(clientWith(fetch), { timeoutMs: 1000, pollIntervalMs: 1000, ...clock })
    ).rejects.toMatchObject({
      code: "ADMIN_SERVER_UNAVAILABLE",
      details: { attempts: 2, lastError: "GET /serverRuntime returned an unexpected body: state: Required" },
    });
  });

  it("should give up at the deadline", async () => {
    const clock = fakeClock();
    const fetch = vi.fn<FetchFn>().mockImplementation(async () => stateResponse("STARTING"));

    const error = await waitForAdminServer(clientWith(fetch), { timeoutMs: 5000, pollIntervalMs: 1000, ...clock }).catch(
      (e: unknown) => e
    );

    // 1000 + 2000, then the 4000ms delay is clamped to the remaining 2000ms
    expect(clock.sleeps).toEqual([1000, 2000, 2000]);
    expect(error).toBeInstanceOf(AdminServerUnavailableError);
    expect(error).toMatchObject({
      code: "ADMIN_SERVER_UNAVAILABLE",
      message: "Admin server at http://wls.test:7001 not RUNNING after 5000ms",
      details: { url: "http://wls.test:7001", waitedMs: 5000, attempts: 4, lastState: "STARTING" },
    });
  });

  it("should abort immediately on rejected credentials", async () => {
    const clock = fakeClock();
    const fetch = vi.fn<FetchFn>().mockResolvedValue(new Response(null, { status: 401 }));

    await expect(
      waitForAdminServer(clientWith(fetch), { timeoutMs: 60000, pollIntervalMs: 1000, ...clock })
    ).rejects.toMatchObject({ code: "ADMIN_REQUEST_FAILED", status: 401 });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });
});
