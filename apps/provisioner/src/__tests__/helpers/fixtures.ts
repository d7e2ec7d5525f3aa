import { parseConfig, type Config } from "../../config.js";
import type { EditSession } from "../../http/edit-session.js";

/**
 * Config built from defaults plus overrides, independent of the real process env.
 */
export function testConfig(env: Record<string, string> = {}): Config {
  return parseConfig({
    ADMIN_USERNAME: "weblogic",
    ADMIN_PASSWORD: "test-password",
    DOMAIN_SECURITY_PROPERTIES: "/nonexistent/domain_security.properties",
    ...env,
  });
}

export type SessionCall =
  | { call: "adminServerName" }
  | { call: "startEdit" }
  | { call: "list"; path: string }
  | { call: "create"; path: string; bean: Record<string, unknown> }
  | { call: "activate" }
  | { call: "disconnect" };

/**
 * EditSession that records calls and serves JMSServers from memory.
 * `failOn` makes the first matching create throw.
 */
export class RecordingSession implements EditSession {
  readonly calls: SessionCall[] = [];
  jmsServers: string[];
  private readonly failOn?: string;

  constructor(options: { jmsServers?: string[]; failOn?: string } = {}) {
    this.jmsServers = [...(options.jmsServers ?? [])];
    this.failOn = options.failOn;
  }

  async adminServerName(): Promise<string> {
    this.calls.push({ call: "adminServerName" });
    return "AdminServer";
  }

  async startEdit(): Promise<void> {
    this.calls.push({ call: "startEdit" });
  }

  async list(path: readonly string[]): Promise<string[]> {
    this.calls.push({ call: "list", path: path.join("/") });
    return path.join("/") === "JMSServers" ? [...this.jmsServers] : [];
  }

  async create(path: readonly string[], bean: Record<string, unknown>): Promise<void> {
    const joined = path.join("/");
    this.calls.push({ call: "create", path: joined, bean });
    if (this.failOn === joined) {
      throw new Error(`create failed: ${joined}`);
    }
    if (joined === "JMSServers" && typeof bean.name === "string") {
      this.jmsServers.push(bean.name);
    }
  }

  async activate(): Promise<void> {
    this.calls.push({ call: "activate" });
  }

  async disconnect(): Promise<void> {
    this.calls.push({ call: "disconnect" });
  }
}
