import { afterEach, describe, expect, it, vi } from "vitest";
import {
  OPENSTACK_REQUEST_TIMEOUT_MS,
  OpenstackHttpError,
  createOpenstackComputeProvider,
  type OpenstackEndpoints,
} from "../src/lib/openstack/client.js";
import { decodeProviderSpec, type OpenstackProviderSpec } from "../src/lib/machine/provider-spec.js";

const endpoints: OpenstackEndpoints = {
  token: "test-token",
  computeUrl: "https://compute.example.invalid/v2.1/",
  networkUrl: "https://network.example.invalid",
  imageUrl: "",
};

type Call = { method: string; url: string; body: unknown; headers: Record<string, string> };

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

function stubFetch(route: (method: string, url: URL) => Response) {
  const calls: Call[] = [];
  const fetchMock = vi.fn(async (input: string, init?: RequestInit) => {
    const method = init?.method ?? "GET";
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    calls.push({ method, url: input, body, headers });
    return route(method, new URL(input));
  });
  vi.stubGlobal("fetch", fetchMock);
  return { calls, fetchMock };
}

function spec(raw: Record<string, unknown>): OpenstackProviderSpec {
  const res = decodeProviderSpec(raw);
  if (!res.ok) throw new Error(res.error);
  return res.spec;
}

const catalog = (method: string, url: URL): Response | null => {
  if (method === "GET" && url.pathname === "/v2.1/flavors/detail") {
    return jsonResponse({ flavors: [{ id: "flv-1", name: "m1.large" }] });
  }
  if (method === "GET" && url.pathname === "/v2.1/images/detail") {
    return jsonResponse({ images: url.searchParams.get("name") === "rhcos" ? [{ id: "img-1", name: "rhcos" }] : [] });
  }
  return null;
};

afterEach(() => {
  vi.unstubAllGlobals();
  vi.useRealTimers();
});

describe("openstack compute provider", () => {
  it("requires a token and compute endpoint", () => {
    expect(() => createOpenstackComputeProvider({ ...endpoints, token: "" })).toThrow("openstack auth token missing");
    expect(() => createOpenstackComputeProvider({ ...endpoints, computeUrl: " " })).toThrow(
      "openstack compute endpoint missing",
    );
  });

  it("creates a server with resolved references and encoded user data", async () => {
    const { calls } = stubFetch((method, url) => {
      const hit = catalog(method, url);
      if (hit) return hit;
      if (method === "POST" && url.pathname === "/v2.1/servers") return jsonResponse({ server: { id: "srv-1" } }, 202);
      return jsonResponse({ error: "unexpected" }, 500);
    });
    const compute = createOpenstackComputeProvider(endpoints);

    const instance = await compute.createInstance({
      name: "worker-0",
      clusterName: "machines-test-cluster",
      spec: spec({
        image: "rhcos",
        flavor: "m1.large",
        availabilityZone: "nova",
        networks: [{ uuid: "net-1" }],
        securityGroups: ["default"],
        serverMetadata: { team: "infra" },
        tags: ["managed"],
      }),
      userData: "#!/bin/sh\necho hi\n",
      keyName: "ops",
    });

    expect(instance).toEqual({ id: "srv-1", name: "worker-0", status: "BUILD", addresses: {}, metadata: {} });
    const create = calls.find((c) => c.method === "POST");
    expect(create?.headers["x-auth-token"]).toBe("test-token");
    expect(create?.headers["openstack-api-version"]).toBe("compute 2.52");
    expect(create?.body).toEqual({
      server: {
        name: "worker-0",
        flavorRef: "flv-1",
        imageRef: "img-1",
        user_data: Buffer.from("#!/bin/sh\necho hi\n", "utf8").toString("base64"),
        metadata: { team: "infra", "cluster-name": "machines-test-cluster" },
        availability_zone: "nova",
        key_name: "ops",
        networks: [{ uuid: "net-1" }],
        security_groups: [{ name: "default" }],
        tags: ["managed"],
      },
    });
  });

  it("boots from a volume without an image reference", async () => {
    const { calls } = stubFetch((method, url) => {
      const hit = catalog(method, url);
      if (hit) return hit;
      return jsonResponse({ server: { id: "srv-2" } }, 202);
    });
    const compute = createOpenstackComputeProvider(endpoints);

    await compute.createInstance({
      name: "worker-1",
      clusterName: "c",
      spec: spec({ image: "rhcos", flavor: "m1.large", rootVolume: { diskSize: 30, volumeType: "ssd" } }),
      userData: "",
      keyName: "",
    });

    const server = calls.find((c) => c.method === "POST")?.body;
    expect(server).toMatchObject({
      server: {
        block_device_mapping_v2: [
          {
            boot_index: 0,
            uuid: "img-1",
            source_type: "image",
            destination_type: "volume",
            volume_size: 30,
            volume_type: "ssd",
            delete_on_termination: true,
          },
        ],
      },
    });
    expect(server).not.toHaveProperty("server.imageRef");
  });

  it("lists servers by anchored name and matches image and flavor locally", async () => {
    const { calls } = stubFetch((method, url) => {
      const hit = catalog(method, url);
      if (hit) return hit;
      return jsonResponse({
        servers: [
          {
            id: "srv-1",
            name: "worker.0",
            status: "ACTIVE",
            addresses: { private: [{ addr: "10.0.0.5", version: 4, "OS-EXT-IPS:type": "fixed" }] },
            image: { id: "img-1" },
            flavor: { id: "flv-1" },
          },
          { id: "srv-2", name: "worker.0", status: "ACTIVE", image: { id: "img-9" }, flavor: { original_name: "m1.large" } },
          { id: "srv-3", name: "worker.0", status: "ACTIVE", image: { id: "img-1" }, flavor: { original_name: "m1.small" } },
        ],
      });
    });
    const compute = createOpenstackComputeProvider(endpoints);

    const servers = await compute.listInstances({ name: "worker.0", image: "rhcos", flavor: "m1.large" });

    expect(servers).toEqual([
      {
        id: "srv-1",
        name: "worker.0",
        status: "ACTIVE",
        addresses: { private: [{ addr: "10.0.0.5", version: 4, "OS-EXT-IPS:type": "fixed" }] },
        metadata: {},
        image: { id: "img-1" },
        flavor: { id: "flv-1" },
      },
    ]);
    const list = new URL(calls.find((c) => c.url.includes("/servers/detail"))?.url ?? "http://missing");
    expect(list.searchParams.get("name")).toBe("^worker\\.0$");
    expect(list.searchParams.get("image")).toBeNull();
    expect(list.searchParams.get("flavor")).toBeNull();
  });

  it("matches volume-booted servers without consulting the image catalog", async () => {
    const { calls } = stubFetch((method, url) => {
      const hit = catalog(method, url);
      if (hit) return hit;
      return jsonResponse({
        servers: [{ id: "srv-1", name: "worker-0", status: "ACTIVE", image: "", flavor: { original_name: "m1.large" } }],
      });
    });
    const compute = createOpenstackComputeProvider(endpoints);

    const servers = await compute.listInstances({ name: "worker-0", image: null, flavor: "m1.large" });

    expect(servers.map((s) => s.id)).toEqual(["srv-1"]);
    expect(calls.some((c) => c.url.includes("/images"))).toBe(false);
  });

  it("treats an image that no longer resolves as no match", async () => {
    stubFetch((method, url) => {
      const hit = catalog(method, url);
      if (hit) return hit;
      return jsonResponse({
        servers: [
          { id: "srv-1", name: "worker-0", status: "ACTIVE", image: { id: "img-7" }, flavor: { original_name: "m1.large" } },
        ],
      });
    });
    const compute = createOpenstackComputeProvider(endpoints);

    await expect(compute.listInstances({ name: "worker-0", image: "retired", flavor: "m1.large" })).resolves.toEqual([]);
    await expect(compute.listInstances({ name: "worker-0", image: "img-7", flavor: "m1.large" })).resolves.toHaveLength(1);
  });

  it("skips catalog lookups when no server carries the name", async () => {
    const { calls } = stubFetch((method, url) => catalog(method, url) ?? jsonResponse({ servers: [] }));
    const compute = createOpenstackComputeProvider(endpoints);

    await expect(compute.listInstances({ name: "worker-0", image: "rhcos", flavor: "m1.large" })).resolves.toEqual([]);
    expect(calls).toHaveLength(1);
  });

  it("reports unknown images and flavors", async () => {
    stubFetch((method, url) => catalog(method, url) ?? jsonResponse({}, 404));
    const compute = createOpenstackComputeProvider(endpoints);

    await expect(compute.assertImageExists("fedora")).rejects.toThrow("image not found: fedora");
    await expect(compute.assertFlavorExists("m1.tiny")).rejects.toThrow("flavor not found: m1.tiny");
    await expect(compute.assertFlavorExists("flv-1")).resolves.toBeUndefined();
  });

  it("checks availability zones", async () => {
    stubFetch(() =>
      jsonResponse({
        availabilityZoneInfo: [
          { zoneName: "nova", zoneState: { available: true } },
          { zoneName: "dr", zoneState: { available: false } },
        ],
      }),
    );
    const compute = createOpenstackComputeProvider(endpoints);

    await expect(compute.assertAvailabilityZoneExists("nova")).resolves.toBeUndefined();
    await expect(compute.assertAvailabilityZoneExists("dr")).rejects.toThrow("availability zone not available: dr");
    await expect(compute.assertAvailabilityZoneExists("moon")).rejects.toThrow("availability zone not found: moon");
  });

  it("treats deleting a missing server as success", async () => {
    const { fetchMock } = stubFetch(() => jsonResponse({ itemNotFound: {} }, 404));
    const compute = createOpenstackComputeProvider(endpoints);

    await expect(compute.deleteInstance("srv-9")).resolves.toBeUndefined();
    expect(fetchMock).toHaveBeenCalledWith("https://compute.example.invalid/v2.1/servers/srv-9", expect.anything());
  });

  it("surfaces http failures with status and body", async () => {
    stubFetch(() => new Response("conflict: task_state deleting", { status: 409 }));
    const compute = createOpenstackComputeProvider(endpoints);

    const err = await compute.getInstance("srv-1").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OpenstackHttpError);
    expect(err).toMatchObject({
      status: 409,
      message: "openstack get server failed: HTTP 409: conflict: task_state deleting",
    });
  });

  it("truncates large error bodies", async () => {
    stubFetch(() => new Response("x".repeat(70 * 1024), { status: 500 }));
    const compute = createOpenstackComputeProvider(endpoints);

    const err = await compute.getInstance("srv-1").catch((e: unknown) => e);

    if (!(err instanceof OpenstackHttpError)) throw new Error("expected OpenstackHttpError");
    expect(err.bodyText.endsWith("...(truncated)")).toBe(true);
    expect(err.bodyText.length).toBe(64 * 1024 + "...(truncated)".length);
  });

  it("associates a floating ip with the server port", async () => {
    const { calls } = stubFetch((method, url) => {
      if (url.pathname === "/v2.0/floatingips" && method === "GET") return jsonResponse({ floatingips: [{ id: "fip-1" }] });
      if (url.pathname === "/v2.0/ports") return jsonResponse({ ports: [{ id: "port-1" }] });
      return jsonResponse({ floatingip: { id: "fip-1" } });
    });
    const compute = createOpenstackComputeProvider(endpoints);

    await compute.associateFloatingIP("srv-1", "203.0.113.10");

    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      "GET https://network.example.invalid/v2.0/floatingips?floating_ip_address=203.0.113.10",
      "GET https://network.example.invalid/v2.0/ports?device_id=srv-1",
      "PUT https://network.example.invalid/v2.0/floatingips/fip-1",
    ]);
    expect(calls[2]?.body).toEqual({ floatingip: { port_id: "port-1" } });
  });

  it("needs a network endpoint for floating ips", async () => {
    const compute = createOpenstackComputeProvider({ ...endpoints, networkUrl: "" });

    await expect(compute.associateFloatingIP("srv-1", "203.0.113.10")).rejects.toThrow(
      "network endpoint not configured (needed for floating IP association)",
    );
  });

  it("aborts requests that exceed the timeout", async () => {
    vi.useFakeTimers();
    const fetchMock = vi.fn((_url: string, init?: RequestInit) => {
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    });
    vi.stubGlobal("fetch", fetchMock);
    const compute = createOpenstackComputeProvider(endpoints);

    const pending = compute.getInstance("srv-1");
    const assertion = expect(pending).rejects.toThrow(
      `openstack get server failed: HTTP 0: request timed out after ${OPENSTACK_REQUEST_TIMEOUT_MS}ms`,
    );
    await vi.advanceTimersByTimeAsync(OPENSTACK_REQUEST_TIMEOUT_MS);
    await assertion;
  });
});
