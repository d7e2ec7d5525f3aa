import { spawn } from "node:child_process";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createInterface } from "node:readline";
import { WlstExecutionError } from "../errors.js";
import { createTimer, log } from "../logger.js";

const STDERR_TAIL_LINES = 20;

export interface WlstRunOptions {
  /** Path of wlst.sh */
  wlstPath: string;
  /** Extra environment for the WLST process (credentials) */
  env?: Record<string, string>;
  cwd?: string;
}

export interface WlstRunResult {
  exitCode: number;
  duration: string;
}

export type WlstRunner = (script: string, options: WlstRunOptions) => Promise<WlstRunResult>;

/**
 * Write the script to a private temp file and run it through WLST.
 * Output is streamed line by line into the `wlst` logger.
 */
export const runWlst: WlstRunner = async (script, options) => {
  const dir = await mkdtemp(join(tmpdir(), "wlst-"));
  const scriptPath = join(dir, "create-domain.py");

  try {
    await writeFile(scriptPath, script, { mode: 0o600 });
    return await spawnWlst(scriptPath, options);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

function spawnWlst(scriptPath: string, options: WlstRunOptions): Promise<WlstRunResult> {
  const timer = createTimer();
  const stderrTail: string[] = [];

  log.wlst.info({ wlst: options.wlstPath }, "starting WLST");

  return new Promise((resolve, reject) => {
    const child = spawn(options.wlstPath, [scriptPath], {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ["ignore", "pipe", "pipe"],
    });

    createInterface({ input: child.stdout }).on("line", (line) => {
      log.wlst.info({ stream: "stdout" }, line);
    });

    createInterface({ input: child.stderr }).on("line", (line) => {
      stderrTail.push(line);
      if (stderrTail.length > STDERR_TAIL_LINES) {
        stderrTail.shift();
      }
      log.wlst.warn({ stream: "stderr" }, line);
    });

    child.once("error", (error) => {
      reject(new WlstExecutionError(`Cannot start WLST at ${options.wlstPath}: ${error.message}`, null, [], {
        cause: error,
      }));
    });

    child.once("close", (code, signal) => {
      const duration = timer();

      if (code === 0) {
        log.wlst.info({ duration }, "WLST finished");
        resolve({ exitCode: 0, duration });
        return;
      }

      const reason = signal ? `killed by ${signal}` : `exited with code ${code}`;
      reject(new WlstExecutionError(`WLST ${reason}`, code, [...stderrTail]));
    });
  });
}
