/**
 * Offline WLST domain-creation plan.
 *
 * A plan is an ordered list of WLST calls against the domain template tree.
 * Nothing in it touches the filesystem; rendering and execution live in
 * `src/wlst`.
 */

export type ServerStartMode = "dev" | "prod";

/** Value read from the WLST process environment instead of being inlined */
export interface SecretRef {
  secret: string;
}

export type WlstValue = string | number | SecretRef;

export type DomainStep =
  | { op: "selectTemplate"; template: string }
  | { op: "loadTemplates" }
  | { op: "cd"; path: string }
  | { op: "set"; attribute: string; value: WlstValue }
  | { op: "setOption"; option: string; value: string }
  | { op: "create"; name: string; type: string }
  | { op: "writeDomain"; path: string }
  | { op: "closeTemplate" }
  | { op: "exit" };

export interface DomainPlanInput {
  domainName: string;
  adminName: string;
  adminListenPort: number;
  productionMode: ServerStartMode;
  administrationPortEnabled: boolean;
  administrationPort: number;
  domainRoot: string;
  template: string;
  nodeManagerListenPort: number;
}
