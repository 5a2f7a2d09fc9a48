import { z } from "zod";
import { LabelKeySchema, LabelValueSchema, MachineNameSchema, NamespaceSchema } from "@vmreconcile/shared/lib/identifiers";

export const CLUSTER_LABEL = "machine.uccp.io/cluster-api-cluster";
export const MACHINE_ROLE_LABEL = "machine.uccp.io/cluster-api-machine-role";
export const MACHINE_TYPE_LABEL = "machine.uccp.io/cluster-api-machine-type";

export const INSTANCE_STATE_ANNOTATION = "machine.uccp.io/instance-state";
export const RESOURCE_ID_ANNOTATION = "openstack-resourceId";

// Written to INSTANCE_STATE_ANNOTATION when the backing instance is broken or gone.
export const ERROR_STATE = "ERROR";

export const PROVIDER_ID_PREFIX = "openstack:///";

export type NodeAddressType = "ExternalIP" | "InternalIP" | "Hostname" | "InternalDNS";

export const NodeAddressSchema = z.object({
  type: z.enum(["ExternalIP", "InternalIP", "Hostname", "InternalDNS"]),
  address: z.string(),
});

export type NodeAddress = z.infer<typeof NodeAddressSchema>;

export const MachineSchema = z.object({
  metadata: z.object({
    namespace: NamespaceSchema,
    name: MachineNameSchema,
    labels: z.record(LabelKeySchema, LabelValueSchema).default({}),
    annotations: z.record(z.string()).default({}),
    resourceVersion: z.number().int().nonnegative().default(0),
    deletionTimestamp: z.string().optional(),
  }),
  spec: z.object({
    providerSpec: z.unknown(),
    providerID: z.string().optional(),
  }),
  status: z
    .object({
      addresses: z.array(NodeAddressSchema).default([]),
      errorReason: z.string().optional(),
      errorMessage: z.string().optional(),
    })
    .default({}),
});

export type Machine = z.infer<typeof MachineSchema>;

export type MachineKey = { namespace: string; name: string };

export function machineKey(machine: Machine): MachineKey {
  return { namespace: machine.metadata.namespace, name: machine.metadata.name };
}

export function formatMachineKey(key: MachineKey): string {
  return `${key.namespace}/${key.name}`;
}

export function providerIdForInstance(instanceId: string): string {
  return `${PROVIDER_ID_PREFIX}${instanceId}`;
}

export function parseMachine(value: unknown): Machine {
  return MachineSchema.parse(value);
}

// Copies persisted state back onto the caller's record so it observes what was written.
export function assignMachine(target: Machine, source: Machine): void {
  target.metadata = structuredClone(source.metadata);
  target.spec = structuredClone(source.spec);
  target.status = structuredClone(source.status);
}

export type Secret = {
  namespace: string;
  name: string;
  type: string;
  data: Record<string, string>;
};
