import { z } from "zod";
import type { OpenstackProviderSpec } from "../machine/provider-spec.js";

export const InstanceAddressSchema = z.object({
  addr: z.string(),
  version: z.number(),
  "OS-EXT-IPS:type": z.string().optional(),
});

export type InstanceAddress = z.infer<typeof InstanceAddressSchema>;

export const InstanceSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  status: z.string(),
  addresses: z.record(z.array(z.unknown())).optional().default({}),
  metadata: z.record(z.string()).optional().default({}),
  // Empty string for servers booted from a volume.
  image: z.union([z.literal(""), z.object({ id: z.string() }).passthrough()]).optional(),
  // Compute microversion 2.47 and later report the flavor name instead of its id.
  flavor: z.object({ id: z.string().optional(), original_name: z.string().optional() }).passthrough().optional(),
});

export type Instance = z.infer<typeof InstanceSchema>;

export type InstanceStatus = "BUILD" | "ACTIVE" | "ERROR" | "SHUTOFF" | "DELETED" | (string & {});

export const INSTANCE_STATUS_ACTIVE: InstanceStatus = "ACTIVE";

export type InstanceListFilter = {
  name: string;
  // null skips the image match (volume-booted servers carry no image).
  image: string | null;
  flavor: string;
};

export type CreateInstanceParams = {
  name: string;
  clusterName: string;
  spec: OpenstackProviderSpec;
  userData: string;
  keyName: string;
};

/**
 * Narrow view of the compute API the actuator depends on. The OpenStack HTTP client
 * implements it; tests substitute in-process fakes.
 */
export interface ComputeProvider {
  createInstance(params: CreateInstanceParams): Promise<Instance>;
  getInstance(id: string): Promise<Instance>;
  listInstances(filter: InstanceListFilter): Promise<Instance[]>;
  deleteInstance(id: string): Promise<void>;
  associateFloatingIP(instanceId: string, floatingIP: string): Promise<void>;
  setInstanceMetadata(instanceId: string, metadata: Record<string, string>): Promise<void>;
  assertImageExists(image: string): Promise<void>;
  assertFlavorExists(flavor: string): Promise<void>;
  assertAvailabilityZoneExists(zone: string): Promise<void>;
}
