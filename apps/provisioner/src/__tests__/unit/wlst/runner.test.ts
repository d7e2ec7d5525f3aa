import { describe, it, expect, vi, beforeEach } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { PassThrough } from "node:stream";

vi.mock("node:child_process", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:child_process")>();
  return { ...actual, spawn: vi.fn() };
});

import { ChildProcess, spawn, type SpawnOptions } from "node:child_process";
import { WlstExecutionError } from "../../../errors.js";
import { runWlst } from "../../../wlst/runner.js";

interface FakeRun {
  stdout?: string[];
  stderr?: string[];
  code?: number | null;
  signal?: NodeJS.Signals | null;
  spawnError?: Error;
}

interface SpawnCall {
  command: string;
  args: readonly string[];
  options: SpawnOptions;
  script: string;
}

/**
 * Make spawn return a child that writes the given lines then closes.
 */
function fakeWlst(run: FakeRun): SpawnCall[] {
  const calls: SpawnCall[] = [];

  vi.mocked(spawn).mockImplementation((command, args, options) => {
    calls.push({ command, args, options, script: readFileSync(args[0], "utf8") });

    const child = new ChildProcess();
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    child.stdout = stdout;
    child.stderr = stderr;

    setImmediate(() => {
      if (run.spawnError) {
        child.emit("error", run.spawnError);
        return;
      }
      stderr.once("end", () => {
        setImmediate(() => child.emit("close", run.code === undefined ? 0 : run.code, run.signal ?? null));
      });
      stdout.end((run.stdout ?? []).map((line) => `${line}\n`).join(""));
      stderr.end((run.stderr ?? []).map((line) => `${line}\n`).join(""));
    });

    return child;
  });

  return calls;
}

describe("runWlst", () => {
  beforeEach(() => {
    vi.mocked(spawn).mockReset();
  });

  it("should run the script file through the launcher", async () => {
    const calls = fakeWlst({ stdout: ["Initializing WebLogic Scripting Tool (WLST) ..."] });

    const result = await runWlst("import os\nexit()\n", { wlstPath: "/opt/oracle/wlst.sh" });

    expect(result.exitCode).toBe(0);
    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe("/opt/oracle/wlst.sh");
    expect(calls[0].args).toHaveLength(1);
    expect(calls[0].args[0]).toMatch(/create-domain\.py$/);
    expect(calls[0].script).toBe("import os\nexit()\n");
  });

  it("should pass credentials through the child environment", async () => {
    const calls = fakeWlst({});

    await runWlst("exit()\n", {
      wlstPath: "/opt/oracle/wlst.sh",
      env: { WLS_ADMIN_USERNAME: "weblogic", WLS_ADMIN_PASSWORD: "test-secret" },
    });

    expect(calls[0].options.env).toMatchObject({
      WLS_ADMIN_USERNAME: "weblogic",
      WLS_ADMIN_PASSWORD: "test-secret",
    });
    expect(calls[0].options.env?.PATH).toBe(process.env.PATH);
  });

  it("should remove the script directory after the run", async () => {
    const calls = fakeWlst({ code: 1 });

    await expect(runWlst("exit()\n", { wlstPath: "/opt/oracle/wlst.sh" })).rejects.toBeInstanceOf(
      WlstExecutionError
    );
    expect(existsSync(dirname(calls[0].args[0]))).toBe(false);
  });

  it("should reject with the exit code and stderr tail", async () => {
    fakeWlst({ code: 3, stderr: ["Error: writeDomain() failed.", "Problem invoking WLST"] });

    const result = runWlst("exit()\n", { wlstPath: "/opt/oracle/wlst.sh" });

    await expect(result).rejects.toMatchObject({
      message: "WLST exited with code 3",
      code: "WLST_FAILED",
      exitCode: 3,
      details: { exitCode: 3, stderr: ["Error: writeDomain() failed.", "Problem invoking WLST"] },
    });
  });

  it("should keep only the last 20 stderr lines", async () => {
    const lines = Array.from({ length: 25 }, (_, i) => `line ${i + 1}`);
    fakeWlst({ code: 1, stderr: lines });

    const error = await runWlst("exit()\n", { wlstPath: "/opt/oracle/wlst.sh" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WlstExecutionError);
    expect(error).toMatchObject({ details: { stderr: lines.slice(5) } });
  });

  it("should report a signal instead of an exit code", async () => {
    fakeWlst({ code: null, signal: "SIGKILL" });

    await expect(runWlst("exit()\n", { wlstPath: "/opt/oracle/wlst.sh" })).rejects.toMatchObject({
      message: "WLST killed by SIGKILL",
      exitCode: null,
    });
  });

  it("should reject when the launcher cannot start", async () => {
    fakeWlst({ spawnError: new Error("spawn /missing/wlst.sh ENOENT") });

    await expect(runWlst("exit()\n", { wlstPath: "/missing/wlst.sh" })).rejects.toMatchObject({
      message: "Cannot start WLST at /missing/wlst.sh: spawn /missing/wlst.sh ENOENT",
      exitCode: null,
    });
  });
});
