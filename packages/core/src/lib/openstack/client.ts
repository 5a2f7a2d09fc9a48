import { z } from "zod";
import { escapeRegExp, nonEmptyRecord } from "@vmreconcile/shared/lib/strings";
import {
  InstanceSchema,
  type ComputeProvider,
  type CreateInstanceParams,
  type Instance,
  type InstanceListFilter,
} from "./types.js";

export const OPENSTACK_REQUEST_TIMEOUT_MS = 15_000;
const OPENSTACK_ERROR_BODY_LIMIT_BYTES = 64 * 1024;
// Server tags on create need compute microversion 2.52.
const COMPUTE_API_MICROVERSION = "compute 2.52";

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type OpenstackEndpoints = {
  token: string;
  computeUrl: string;
  networkUrl: string;
  imageUrl: string;
};

export class OpenstackHttpError extends Error {
  readonly status: number;
  readonly bodyText: string;

  constructor(message: string, params: { status: number; bodyText: string }) {
    super(`${message}: HTTP ${params.status}: ${params.bodyText}`);
    this.name = "OpenstackHttpError";
    this.status = params.status;
    this.bodyText = params.bodyText;
  }
}

const NamedResourceSchema = z.object({ id: z.string(), name: z.string().nullable().optional() }).passthrough();
const ImageListSchema = z.object({ images: z.array(NamedResourceSchema) });
const FlavorListSchema = z.object({ flavors: z.array(NamedResourceSchema) });

const ServerEnvelopeSchema = z.object({ server: InstanceSchema });
const ServerListSchema = z.object({ servers: z.array(InstanceSchema) });
const CreatedServerSchema = z.object({ server: z.object({ id: z.string().min(1) }).passthrough() });
const AvailabilityZoneListSchema = z.object({
  availabilityZoneInfo: z.array(
    z.object({ zoneName: z.string(), zoneState: z.object({ available: z.boolean() }).optional() }).passthrough(),
  ),
});
const FloatingIpListSchema = z.object({ floatingips: z.array(z.object({ id: z.string() }).passthrough()) });
const PortListSchema = z.object({ ports: z.array(z.object({ id: z.string() }).passthrough()) });

async function readResponseTextLimited(res: Response, limitBytes: number): Promise<string> {
  if (!res.body) return "";
  const reader = res.body.getReader();
  const decoder = new TextDecoder();
  let total = 0;
  let out = "";
  while (true) {
    const { value, done } = await reader.read();
    if (done) break;
    if (!value || value.byteLength === 0) continue;
    const nextTotal = total + value.byteLength;
    if (nextTotal > limitBytes) {
      const sliceLen = Math.max(0, limitBytes - total);
      if (sliceLen > 0) {
        out += decoder.decode(value.slice(0, sliceLen), { stream: true });
      }
      out += "...(truncated)";
      await reader.cancel();
      break;
    }
    total = nextTotal;
    out += decoder.decode(value, { stream: true });
  }
  out += decoder.decode();
  return out;
}

function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}${path}`;
}

function buildQuery(query: Record<string, string | number | undefined> | undefined): string {
  if (!query) return "";
  const entries = Object.entries(query)
    .filter(([, v]) => v !== undefined && `${v}`.length > 0)
    .map(([k, v]): [string, string] => [k, `${v}`]);
  if (entries.length === 0) return "";
  return `?${new URLSearchParams(entries).toString()}`;
}

async function openstackRequest(params: {
  token: string;
  method: "GET" | "POST" | "PUT" | "DELETE";
  url: string;
  query?: Record<string, string | number | undefined>;
  body?: unknown;
}): Promise<{ ok: true; status: number; json: unknown } | { ok: false; status: number; bodyText: string }> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, OPENSTACK_REQUEST_TIMEOUT_MS);

  let res: Response;
  try {
    res = await fetch(`${params.url}${buildQuery(params.query)}`, {
      method: params.method,
      headers: {
        "X-Auth-Token": params.token,
        "Content-Type": "application/json",
        Accept: "application/json",
        "OpenStack-API-Version": COMPUTE_API_MICROVERSION,
      },
      body: params.body ? JSON.stringify(params.body) : undefined,
      signal: controller.signal,
    });
  } catch (err) {
    const bodyText = controller.signal.aborted
      ? `request timed out after ${OPENSTACK_REQUEST_TIMEOUT_MS}ms`
      : err instanceof Error
        ? err.message
        : String(err);
    return { ok: false, status: 0, bodyText };
  } finally {
    clearTimeout(timeoutId);
  }

  if (!res.ok) {
    const bodyText = await readResponseTextLimited(res, OPENSTACK_ERROR_BODY_LIMIT_BYTES);
    return { ok: false, status: res.status, bodyText };
  }

  const text = await res.text();
  return { ok: true, status: res.status, json: text ? JSON.parse(text) : null };
}

async function requestJson<T>(
  label: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  params: Parameters<typeof openstackRequest>[0],
): Promise<T> {
  const res = await openstackRequest(params);
  if (!res.ok) throw new OpenstackHttpError(label, { status: res.status, bodyText: res.bodyText });
  const parsed = schema.safeParse(res.json);
  if (!parsed.success) {
    throw new OpenstackHttpError(label, { status: res.status, bodyText: `unexpected response shape: ${parsed.error.message}` });
  }
  return parsed.data;
}

async function requestNoContent(label: string, params: Parameters<typeof openstackRequest>[0]): Promise<void> {
  const res = await openstackRequest(params);
  if (!res.ok) throw new OpenstackHttpError(label, { status: res.status, bodyText: res.bodyText });
}

function imageBaseUrl(endpoints: OpenstackEndpoints): string {
  // Without an image endpoint fall back to the compute API's image proxy.
  return endpoints.imageUrl ? joinUrl(endpoints.imageUrl, "/v2") : endpoints.computeUrl;
}

async function findImageId(endpoints: OpenstackEndpoints, image: string): Promise<string | null> {
  const base = imageBaseUrl(endpoints);
  const path = endpoints.imageUrl ? "/images" : "/images/detail";
  const list = await requestJson("openstack list images failed", ImageListSchema, {
    token: endpoints.token,
    method: "GET",
    url: joinUrl(base, path),
    query: { name: image },
  });
  const byName = list.images.find((i) => i.name === image);
  if (byName) return byName.id;

  if (UUID_RE.test(image)) {
    const res = await openstackRequest({ token: endpoints.token, method: "GET", url: joinUrl(base, `/images/${image}`) });
    if (res.ok) return image;
    if (res.status !== 404) throw new OpenstackHttpError("openstack get image failed", { status: res.status, bodyText: res.bodyText });
  }
  return null;
}

export async function resolveImageId(endpoints: OpenstackEndpoints, image: string): Promise<string> {
  const id = await findImageId(endpoints, image);
  if (id === null) throw new Error(`image not found: ${image}`);
  return id;
}

async function findFlavorId(endpoints: OpenstackEndpoints, flavor: string): Promise<string | null> {
  const list = await requestJson("openstack list flavors failed", FlavorListSchema, {
    token: endpoints.token,
    method: "GET",
    url: joinUrl(endpoints.computeUrl, "/flavors/detail"),
  });
  return list.flavors.find((f) => f.name === flavor || f.id === flavor)?.id ?? null;
}

export async function resolveFlavorId(endpoints: OpenstackEndpoints, flavor: string): Promise<string> {
  const id = await findFlavorId(endpoints, flavor);
  if (id === null) throw new Error(`flavor not found: ${flavor}`);
  return id;
}

export async function assertAvailabilityZoneExists(endpoints: OpenstackEndpoints, zone: string): Promise<void> {
  const name = zone.trim();
  if (!name) return;
  const list = await requestJson("openstack list availability zones failed", AvailabilityZoneListSchema, {
    token: endpoints.token,
    method: "GET",
    url: joinUrl(endpoints.computeUrl, "/os-availability-zone"),
  });
  const found = list.availabilityZoneInfo.find((z) => z.zoneName === name);
  if (!found) throw new Error(`availability zone not found: ${name}`);
  if (found.zoneState && !found.zoneState.available) throw new Error(`availability zone not available: ${name}`);
}

export async function createServer(endpoints: OpenstackEndpoints, params: CreateInstanceParams): Promise<Instance> {
  const spec = params.spec;
  const flavorRef = await resolveFlavorId(endpoints, spec.flavor);
  const bootFromVolume = spec.rootVolume !== undefined;
  const imageRef = bootFromVolume && spec.rootVolume?.sourceUUID ? "" : await resolveImageId(endpoints, spec.image);

  const server: Record<string, unknown> = {
    name: params.name,
    flavorRef,
    user_data: Buffer.from(params.userData, "utf8").toString("base64"),
    metadata: { ...nonEmptyRecord(spec.serverMetadata), "cluster-name": params.clusterName },
  };
  if (!bootFromVolume) server["imageRef"] = imageRef;
  if (spec.availabilityZone) server["availability_zone"] = spec.availabilityZone;
  if (params.keyName) server["key_name"] = params.keyName;
  if (spec.networks.length > 0) {
    server["networks"] = spec.networks.map((n) => ({
      ...(n.uuid ? { uuid: n.uuid } : {}),
      ...(n.fixedIP ? { fixed_ip: n.fixedIP } : {}),
    }));
  }
  if (spec.securityGroups.length > 0) server["security_groups"] = spec.securityGroups.map((name) => ({ name }));
  if (spec.tags.length > 0) server["tags"] = spec.tags;
  if (spec.rootVolume) {
    server["block_device_mapping_v2"] = [
      {
        boot_index: 0,
        uuid: spec.rootVolume.sourceUUID || imageRef,
        source_type: "image",
        destination_type: "volume",
        volume_size: spec.rootVolume.diskSize,
        ...(spec.rootVolume.volumeType ? { volume_type: spec.rootVolume.volumeType } : {}),
        delete_on_termination: true,
      },
    ];
  }

  const created = await requestJson("openstack create server failed", CreatedServerSchema, {
    token: endpoints.token,
    method: "POST",
    url: joinUrl(endpoints.computeUrl, "/servers"),
    body: { server },
  });
  return { id: created.server.id, name: params.name, status: "BUILD", addresses: {}, metadata: {} };
}

export async function getServer(endpoints: OpenstackEndpoints, id: string): Promise<Instance> {
  const sid = id.trim();
  if (!sid) throw new Error("openstack server id missing");
  const res = await requestJson("openstack get server failed", ServerEnvelopeSchema, {
    token: endpoints.token,
    method: "GET",
    url: joinUrl(endpoints.computeUrl, `/servers/${encodeURIComponent(sid)}`),
  });
  return res.server;
}

function serverImageMatches(server: Instance, image: string, imageId: string | null): boolean {
  const ref = server.image;
  if (!ref) return false;
  return ref.id === image || (imageId !== null && ref.id === imageId);
}

function serverFlavorMatches(server: Instance, flavor: string, flavorId: string | null): boolean {
  const ref = server.flavor;
  if (!ref) return false;
  if (ref.original_name === flavor) return true;
  return ref.id !== undefined && (ref.id === flavor || ref.id === flavorId);
}

/**
 * Servers named exactly `filter.name` whose image and flavor match. The catalog is
 * consulted only to translate names to ids; a name that no longer resolves matches
 * nothing instead of failing the lookup.
 */
export async function listServers(endpoints: OpenstackEndpoints, filter: InstanceListFilter): Promise<Instance[]> {
  const res = await requestJson("openstack list servers failed", ServerListSchema, {
    token: endpoints.token,
    method: "GET",
    url: joinUrl(endpoints.computeUrl, "/servers/detail"),
    // The compute API treats name as a regular expression.
    query: { name: `^${escapeRegExp(filter.name)}$` },
  });
  const named = res.servers.filter((s) => s.name === filter.name);
  if (named.length === 0) return [];

  const image = filter.image;
  const [imageId, flavorId] = await Promise.all([
    image === null ? Promise.resolve(null) : findImageId(endpoints, image),
    findFlavorId(endpoints, filter.flavor),
  ]);
  return named.filter(
    (s) => serverFlavorMatches(s, filter.flavor, flavorId) && (image === null || serverImageMatches(s, image, imageId)),
  );
}

export async function deleteServer(endpoints: OpenstackEndpoints, id: string): Promise<void> {
  const sid = id.trim();
  if (!sid) throw new Error("openstack server id missing");
  const res = await openstackRequest({
    token: endpoints.token,
    method: "DELETE",
    url: joinUrl(endpoints.computeUrl, `/servers/${encodeURIComponent(sid)}`),
  });
  if (res.ok || res.status === 404) return;
  throw new OpenstackHttpError("openstack delete server failed", { status: res.status, bodyText: res.bodyText });
}

export async function associateFloatingIp(endpoints: OpenstackEndpoints, instanceId: string, floatingIp: string): Promise<void> {
  if (!endpoints.networkUrl) throw new Error("network endpoint not configured (needed for floating IP association)");
  const base = joinUrl(endpoints.networkUrl, "/v2.0");

  const fips = await requestJson("openstack list floating ips failed", FloatingIpListSchema, {
    token: endpoints.token,
    method: "GET",
    url: joinUrl(base, "/floatingips"),
    query: { floating_ip_address: floatingIp },
  });
  const fip = fips.floatingips[0];
  if (!fip) throw new Error(`floating IP not found: ${floatingIp}`);

  const ports = await requestJson("openstack list ports failed", PortListSchema, {
    token: endpoints.token,
    method: "GET",
    url: joinUrl(base, "/ports"),
    query: { device_id: instanceId },
  });
  const port = ports.ports[0];
  if (!port) throw new Error(`no port found for instance ${instanceId}`);

  await requestNoContent("openstack associate floating ip failed", {
    token: endpoints.token,
    method: "PUT",
    url: joinUrl(base, `/floatingips/${encodeURIComponent(fip.id)}`),
    body: { floatingip: { port_id: port.id } },
  });
}

export async function updateServerMetadata(
  endpoints: OpenstackEndpoints,
  instanceId: string,
  metadata: Record<string, string>,
): Promise<void> {
  await requestNoContent("openstack update server metadata failed", {
    token: endpoints.token,
    method: "POST",
    url: joinUrl(endpoints.computeUrl, `/servers/${encodeURIComponent(instanceId)}/metadata`),
    body: { metadata },
  });
}

export function createOpenstackComputeProvider(endpoints: OpenstackEndpoints): ComputeProvider {
  if (!endpoints.token.trim()) throw new Error("openstack auth token missing");
  if (!endpoints.computeUrl.trim()) throw new Error("openstack compute endpoint missing");

  return {
    createInstance: async (params) => await createServer(endpoints, params),
    getInstance: async (id) => await getServer(endpoints, id),
    listInstances: async (filter) => await listServers(endpoints, filter),
    deleteInstance: async (id) => await deleteServer(endpoints, id),
    associateFloatingIP: async (instanceId, ip) => await associateFloatingIp(endpoints, instanceId, ip),
    setInstanceMetadata: async (instanceId, metadata) => await updateServerMetadata(endpoints, instanceId, metadata),
    assertImageExists: async (image) => {
      await resolveImageId(endpoints, image);
    },
    assertFlavorExists: async (flavor) => {
      await resolveFlavorId(endpoints, flavor);
    },
    assertAvailabilityZoneExists: async (zone) => await assertAvailabilityZoneExists(endpoints, zone),
  };
}
