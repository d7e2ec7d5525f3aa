/**
 * In-memory WebLogic edit tree.
 *
 * Beans hold attributes plus named children. A child is either a collection
 * (JMSServers, queues, ...) or a singleton bean (a system resource's
 * JMSResource). Changes are only accepted inside an edit session.
 */

export interface Bean {
  name: string;
  attributes: Record<string, unknown>;
  children: Map<string, Collection | Bean>;
}

export type Collection = Map<string, Bean>;

export interface RecordedCall {
  method: string;
  path: string;
  body?: unknown;
}

export interface TreeStats {
  editing: boolean;
  pendingChanges: number;
  activations: number;
}

export type TreeResult<T> =
  | { ok: true; value: T }
  | { ok: false; status: 400 | 404; detail: string };

// Singleton beans created together with their parent, keyed by collection
const SINGLETON_CHILDREN: Record<string, string[]> = {
  JMSSystemResources: ["JMSResource"],
};

function newBean(name: string, attributes: Record<string, unknown> = {}): Bean {
  return { name, attributes, children: new Map() };
}

function isBean(node: Collection | Bean): node is Bean {
  return !(node instanceof Map);
}

export class EditTree {
  readonly domainName: string;
  readonly adminServerName: string;
  private root: Bean;
  private editing = false;
  private pendingChanges = 0;
  private activations = 0;

  constructor(domainName: string, adminServerName: string) {
    this.domainName = domainName;
    this.adminServerName = adminServerName;
    this.root = this.freshRoot();
  }

  private freshRoot(): Bean {
    const root = newBean(this.domainName, { adminServerName: this.adminServerName });
    root.children.set("servers", new Map([[this.adminServerName, newBean(this.adminServerName)]]));
    return root;
  }

  reset(): void {
    this.root = this.freshRoot();
    this.editing = false;
    this.pendingChanges = 0;
    this.activations = 0;
  }

  startEdit(): void {
    this.editing = true;
  }

  activate(): TreeResult<{ changes: number }> {
    if (!this.editing) {
      return { ok: false, status: 400, detail: "No edit session in progress" };
    }
    const changes = this.pendingChanges;
    this.editing = false;
    this.pendingChanges = 0;
    this.activations++;
    return { ok: true, value: { changes } };
  }

  cancelEdit(): void {
    this.editing = false;
    this.pendingChanges = 0;
  }

  stats(): TreeStats {
    return { editing: this.editing, pendingChanges: this.pendingChanges, activations: this.activations };
  }

  /**
   * Resolve a collection path such as ["JMSSystemResources", "M", "JMSResource", "queues"].
   * A missing collection under an existing bean is created empty.
   */
  private resolveCollection(segments: string[]): TreeResult<Collection> {
    if (segments.length === 0) {
      return { ok: false, status: 404, detail: "Not a collection: /" };
    }

    let bean = this.root;
    for (let i = 0; i < segments.length; i++) {
      const segment = segments[i];
      const isLast = i === segments.length - 1;
      let child = bean.children.get(segment);

      if (child === undefined) {
        if (!isLast) {
          return { ok: false, status: 404, detail: `Not found: ${segments.slice(0, i + 1).join("/")}` };
        }
        child = new Map();
        bean.children.set(segment, child);
      }

      if (isBean(child)) {
        if (isLast) {
          return { ok: false, status: 404, detail: `Not a collection: ${segments.join("/")}` };
        }
        bean = child;
        continue;
      }

      if (isLast) {
        return { ok: true, value: child };
      }

      const next = child.get(segments[i + 1]);
      if (next === undefined) {
        return { ok: false, status: 404, detail: `Not found: ${segments.slice(0, i + 2).join("/")}` };
      }
      bean = next;
      i++;
      if (i === segments.length - 1) {
        return { ok: false, status: 404, detail: `Not a collection: ${segments.join("/")}` };
      }
    }

    return { ok: false, status: 404, detail: `Not found: ${segments.join("/")}` };
  }

  list(segments: string[]): TreeResult<Array<{ name: string } & Record<string, unknown>>> {
    const collection = this.resolveCollection(segments);
    if (!collection.ok) {
      return collection;
    }
    const items = Array.from(collection.value.values()).map((bean) => ({ ...bean.attributes, name: bean.name }));
    return { ok: true, value: items };
  }

  create(segments: string[], name: string, attributes: Record<string, unknown>): TreeResult<{ name: string }> {
    if (!this.editing) {
      return { ok: false, status: 400, detail: "Changes require an edit session (startEdit)" };
    }

    const collection = this.resolveCollection(segments);
    if (!collection.ok) {
      return collection;
    }
    if (collection.value.has(name)) {
      return { ok: false, status: 400, detail: `Bean already exists: ${[...segments, name].join("/")}` };
    }

    const bean = newBean(name, attributes);
    const collectionName = segments[segments.length - 1];
    for (const singleton of SINGLETON_CHILDREN[collectionName] ?? []) {
      bean.children.set(singleton, newBean(name));
    }

    collection.value.set(name, bean);
    this.pendingChanges++;
    return { ok: true, value: { name } };
  }

  /** Seed a bean outside any edit session (test fixtures) */
  seed(segments: string[], name: string, attributes: Record<string, unknown> = {}): void {
    const wasEditing = this.editing;
    const pending = this.pendingChanges;
    this.editing = true;
    const result = this.create(segments, name, attributes);
    this.editing = wasEditing;
    this.pendingChanges = pending;
    if (!result.ok) {
      throw new Error(result.detail);
    }
  }
}
