import { describe, expect, it, vi } from "vitest";
import { MachineError } from "../src/lib/errors.js";
import { decodeProviderSpec, type OpenstackProviderSpec } from "../src/lib/machine/provider-spec.js";
import type { Secret } from "../src/lib/machine/types.js";
import { resolveUserData } from "../src/lib/userdata/resolve.js";
import { makeMachine, silentLogger } from "./helpers/fixtures.js";

function spec(raw: Record<string, unknown>): OpenstackProviderSpec {
  const res = decodeProviderSpec(raw);
  if (!res.ok) throw new Error(res.error);
  return res.spec;
}

function secretsWith(secret: Secret | null) {
  return {
    getSecret: vi.fn(async (_namespace: string, _name: string) => secret),
    createSecret: vi.fn(async (s: Secret) => s),
  };
}

const issuer = { issue: vi.fn(async () => "abcdef.0123456789abcdef") };

describe("resolveUserData", () => {
  it("returns an empty payload without a secret reference", async () => {
    const secrets = secretsWith(null);

    const out = await resolveUserData({
      machine: makeMachine(),
      spec: spec({ image: "rhcos", flavor: "m1.large" }),
      clusterName: "prod",
      secrets,
      issuer,
      logger: silentLogger(),
    });

    expect(out).toBe("");
    expect(secrets.getSecret).not.toHaveBeenCalled();
  });

  it("looks the secret up in the machine namespace by default", async () => {
    const secrets = secretsWith({ namespace: "machines", name: "ud", type: "Opaque", data: { userData: "id={{ machineName }}" } });

    const out = await resolveUserData({
      machine: makeMachine({ role: "master" }),
      spec: spec({ image: "rhcos", flavor: "m1.large", userDataSecret: { name: "ud" } }),
      clusterName: "prod",
      secrets,
      issuer,
      logger: silentLogger(),
    });

    expect(out).toBe("id=worker-0");
    expect(secrets.getSecret).toHaveBeenCalledWith("machines", "ud");
  });

  it("requires a secret name", async () => {
    const err = await resolveUserData({
      machine: makeMachine(),
      spec: spec({ image: "rhcos", flavor: "m1.large", userDataSecret: { namespace: "other" } }),
      clusterName: "prod",
      secrets: secretsWith(null),
      issuer,
      logger: silentLogger(),
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MachineError);
    expect(err).toMatchObject({ reason: "InvalidConfiguration", message: "UserDataSecret name must be provided" });
  });

  it("classifies render failures as create errors without minting a token", async () => {
    const secrets = secretsWith({ namespace: "machines", name: "ud", type: "Opaque", data: { userData: "{{ nope }}" } });
    const tokens = { issue: vi.fn(async () => "abcdef.0123456789abcdef") };

    const err = await resolveUserData({
      machine: makeMachine(),
      spec: spec({ image: "rhcos", flavor: "m1.large", userDataSecret: { name: "ud" } }),
      clusterName: "prod",
      secrets,
      issuer: tokens,
      logger: silentLogger(),
    }).catch((e: unknown) => e);

    expect(err).toMatchObject({
      reason: "CreateError",
      message: "error creating Openstack instance: unknown template variable(s) for worker startup script: nope",
    });
    expect(tokens.issue).not.toHaveBeenCalled();
  });

  it("rejects an unknown postprocessor before minting a token", async () => {
    const secrets = secretsWith({
      namespace: "machines",
      name: "ud",
      type: "Opaque",
      data: { userData: "join {{ token }}", postprocessor: "bogus" },
    });
    const tokens = { issue: vi.fn(async () => "abcdef.0123456789abcdef") };

    const err = await resolveUserData({
      machine: makeMachine(),
      spec: spec({ image: "rhcos", flavor: "m1.large", userDataSecret: { name: "ud" } }),
      clusterName: "prod",
      secrets,
      issuer: tokens,
      logger: silentLogger(),
    }).catch((e: unknown) => e);

    expect(err).toMatchObject({ reason: "InvalidConfiguration", message: "Postprocessor error: unknown postprocessor: 'bogus'" });
    expect(tokens.issue).not.toHaveBeenCalled();
  });

  it("substitutes the minted token for joining nodes", async () => {
    const secrets = secretsWith({ namespace: "machines", name: "ud", type: "Opaque", data: { userData: "join {{ token }}" } });
    const tokens = { issue: vi.fn(async () => "abcdef.0123456789abcdef") };

    const out = await resolveUserData({
      machine: makeMachine(),
      spec: spec({ image: "rhcos", flavor: "m1.large", userDataSecret: { name: "ud" } }),
      clusterName: "prod",
      secrets,
      issuer: tokens,
      logger: silentLogger(),
    });

    expect(out).toBe("join abcdef.0123456789abcdef");
    expect(tokens.issue).toHaveBeenCalledTimes(1);
  });

  it("classifies transpile failures as configuration errors", async () => {
    const secrets = secretsWith({
      namespace: "machines",
      name: "ud",
      type: "Opaque",
      data: { userData: "storage: [\n", disableTemplating: "", postprocessor: "ct" },
    });

    const err = await resolveUserData({
      machine: makeMachine(),
      spec: spec({ image: "rhcos", flavor: "m1.large", userDataSecret: { name: "ud" } }),
      clusterName: "prod",
      secrets,
      issuer,
      logger: silentLogger(),
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MachineError);
    expect(err).toMatchObject({ reason: "InvalidConfiguration" });
  });
});
