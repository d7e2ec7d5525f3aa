/**
 * Runtime configuration for the mock admin server
 * Can be updated via API during tests
 */

export type ServerState = "SHUTDOWN" | "STARTING" | "STANDBY" | "RESUMING" | "RUNNING";

export interface InjectedFailure {
  method: string;
  /** Path below the management root, e.g. /edit/JMSSystemResources */
  path: string;
  status: number;
  detail?: string;
}

export interface MockConfig {
  username: string;
  password: string;
  serverState: ServerState;
  failures: InjectedFailure[];
}

const defaultConfig: MockConfig = {
  username: "weblogic",
  password: "test-password",
  serverState: "RUNNING",
  failures: [],
};

let currentConfig: MockConfig = { ...defaultConfig };

export function getConfig(): MockConfig {
  return { ...currentConfig, failures: [...currentConfig.failures] };
}

export function updateConfig(updates: Partial<MockConfig>): MockConfig {
  currentConfig = { ...currentConfig, ...updates };
  return getConfig();
}

export function resetConfig(): MockConfig {
  currentConfig = { ...defaultConfig };
  return getConfig();
}
