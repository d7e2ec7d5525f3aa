import { z } from "zod";
import { ProvisioningError } from "../errors.js";
import { log } from "../logger.js";
import { parseResponse, type AdminRestClient } from "./admin-client.js";

/**
 * Change-managed view of the domain's edit tree.
 *
 * Paths are bean-tree segments below `/edit`, e.g.
 * `["JMSSystemResources", "TestJMSModule", "subDeployments"]`.
 */
export interface EditSession {
  adminServerName(): Promise<string>;
  startEdit(): Promise<void>;
  /** Names of the beans in a collection */
  list(path: readonly string[]): Promise<string[]>;
  create(path: readonly string[], bean: Record<string, unknown>): Promise<void>;
  /** Save pending changes and activate them */
  activate(): Promise<void>;
  disconnect(): Promise<void>;
}

const collectionSchema = z.object({
  items: z.array(z.object({ name: z.string() })),
});

const domainSchema = z.object({
  adminServerName: z.string(),
});

export function editPath(path: readonly string[]): string {
  return `/edit/${path.map(encodeURIComponent).join("/")}`;
}

export class RestEditSession implements EditSession {
  private closed = false;

  constructor(private readonly client: AdminRestClient) {}

  async adminServerName(): Promise<string> {
    this.assertOpen();
    const body = await this.client.get("/edit", { fields: "adminServerName", links: "none" });
    return parseResponse(domainSchema, body, { method: "GET", path: "/edit" }).adminServerName;
  }

  async startEdit(): Promise<void> {
    this.assertOpen();
    await this.client.post("/edit/changeManager/startEdit");
    log.admin.info({ url: this.client.baseUrl }, "edit session started");
  }

  async list(path: readonly string[]): Promise<string[]> {
    this.assertOpen();
    const collectionPath = editPath(path);
    const body = await this.client.get(collectionPath, { fields: "name", links: "none" });
    const collection = parseResponse(collectionSchema, body, { method: "GET", path: collectionPath });
    return collection.items.map((item) => item.name);
  }

  async create(path: readonly string[], bean: Record<string, unknown>): Promise<void> {
    this.assertOpen();
    await this.client.post(editPath(path), bean);
  }

  async activate(): Promise<void> {
    this.assertOpen();
    await this.client.post("/edit/changeManager/activate");
    log.admin.info({ url: this.client.baseUrl }, "changes activated");
  }

  async disconnect(): Promise<void> {
    this.closed = true;
    log.admin.info({ url: this.client.baseUrl }, "disconnected");
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ProvisioningError("Edit session already disconnected", "SESSION_CLOSED");
    }
  }
}
