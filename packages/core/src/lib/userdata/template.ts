import type { Machine } from "../machine/types.js";

export type MachineRole = "control-plane" | "worker";

const PLACEHOLDER_RE = /\{\{\s*([A-Za-z][A-Za-z0-9_]*)\s*\}\}/g;

export type StartupScriptParams = {
  template: string;
  machine: Machine;
  clusterName: string;
  role: MachineRole;
  // Only joining nodes receive a token.
  token?: string;
};

export class TemplateRenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateRenderError";
  }
}

const COMMON_VARIABLES = ["machineName", "namespace", "clusterName", "role"] as const;

function knownVariables(role: MachineRole): ReadonlySet<string> {
  return new Set<string>(role === "worker" ? [...COMMON_VARIABLES, "token"] : COMMON_VARIABLES);
}

/**
 * Fails on placeholders the role does not offer. Needs no token, so callers can
 * check a template before minting one.
 */
export function assertTemplateVariables(template: string, role: MachineRole): void {
  const known = knownVariables(role);
  const unknown = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER_RE)) {
    const name = match[1];
    if (name !== undefined && !known.has(name)) unknown.add(name);
  }
  if (unknown.size > 0) {
    const names = Array.from(unknown).sort().join(", ");
    throw new TemplateRenderError(`unknown template variable(s) for ${role} startup script: ${names}`);
  }
}

function templateVariables(params: StartupScriptParams): Map<string, string> {
  const vars = new Map<string, string>([
    ["machineName", params.machine.metadata.name],
    ["namespace", params.machine.metadata.namespace],
    ["clusterName", params.clusterName],
    ["role", params.role],
  ]);
  if (params.role === "worker") {
    const token = String(params.token ?? "").trim();
    if (!token) throw new TemplateRenderError("joining node startup script requires a bootstrap token");
    vars.set("token", token);
  }
  return vars;
}

/**
 * Substitutes mustache-style `{{ name }}` placeholders in a startup script. An
 * unknown placeholder fails the render rather than leaving it in the payload.
 */
export function renderStartupScript(params: StartupScriptParams): string {
  const vars = templateVariables(params);
  assertTemplateVariables(params.template, params.role);
  return params.template.replace(PLACEHOLDER_RE, (match, name: string) => vars.get(name) ?? match);
}

const CONTROL_PLANE_ROLES: ReadonlySet<string> = new Set(["master", "control-plane"]);

export function machineRoleFromLabel(value: string | undefined): MachineRole {
  return CONTROL_PLANE_ROLES.has(String(value ?? "").trim().toLowerCase()) ? "control-plane" : "worker";
}
