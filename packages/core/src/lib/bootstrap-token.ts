import { randomBytes } from "node:crypto";
import type { Secret } from "./machine/types.js";
import type { SecretStore } from "./store/types.js";

export const BOOTSTRAP_TOKEN_NAMESPACE = "kube-system";
export const BOOTSTRAP_TOKEN_SECRET_PREFIX = "bootstrap-token-";
export const BOOTSTRAP_TOKEN_SECRET_TYPE = "bootstrap.kubernetes.io/token";
export const BOOTSTRAP_TOKEN_EXTRA_GROUPS = "system:bootstrappers:kubeadm:default-node-token";
export const DEFAULT_BOOTSTRAP_TOKEN_TTL_MS = 60 * 60_000;

export const BOOTSTRAP_TOKEN_RE = /^([a-z0-9]{6})\.([a-z0-9]{16})$/;

const TOKEN_CHARSET = "0123456789abcdefghijklmnopqrstuvwxyz";
const TOKEN_ID_LENGTH = 6;
const TOKEN_SECRET_LENGTH = 16;

export type BootstrapTokenParts = { id: string; secret: string };

function randomTokenString(length: number, random: (size: number) => Buffer): string {
  let out = "";
  // 252 is the largest multiple of 36 below 256; rejecting above it keeps the output uniform.
  const limit = 256 - (256 % TOKEN_CHARSET.length);
  while (out.length < length) {
    for (const byte of random(length * 2)) {
      if (byte >= limit) continue;
      out += TOKEN_CHARSET.charAt(byte % TOKEN_CHARSET.length);
      if (out.length === length) break;
    }
  }
  return out;
}

export function generateBootstrapTokenParts(random: (size: number) => Buffer = randomBytes): BootstrapTokenParts {
  return {
    id: randomTokenString(TOKEN_ID_LENGTH, random),
    secret: randomTokenString(TOKEN_SECRET_LENGTH, random),
  };
}

export function formatBootstrapToken(parts: BootstrapTokenParts): string {
  return `${parts.id}.${parts.secret}`;
}

export function buildBootstrapTokenSecret(parts: BootstrapTokenParts, expiresAt: Date): Secret {
  if (!BOOTSTRAP_TOKEN_RE.test(formatBootstrapToken(parts))) {
    throw new Error("bootstrap token does not match [a-z0-9]{6}.[a-z0-9]{16}");
  }
  return {
    namespace: BOOTSTRAP_TOKEN_NAMESPACE,
    name: `${BOOTSTRAP_TOKEN_SECRET_PREFIX}${parts.id}`,
    type: BOOTSTRAP_TOKEN_SECRET_TYPE,
    data: {
      "token-id": parts.id,
      "token-secret": parts.secret,
      // RFC 3339 without fractional seconds.
      expiration: expiresAt.toISOString().replace(/\.\d{3}Z$/, "Z"),
      "usage-bootstrap-authentication": "true",
      "usage-bootstrap-signing": "true",
      "auth-extra-groups": BOOTSTRAP_TOKEN_EXTRA_GROUPS,
      description: "bootstrap token generated by the machine actuator",
    },
  };
}

export type BootstrapTokenIssuer = {
  issue(): Promise<string>;
};

/**
 * Mints a join token for a node, persisting it as a short-lived secret record. The
 * returned string is only handed out once the secret is stored.
 */
export function createBootstrapTokenIssuer(params: {
  secrets: SecretStore;
  ttlMs?: number;
  now?: () => Date;
  random?: (size: number) => Buffer;
}): BootstrapTokenIssuer {
  const ttlMs = params.ttlMs ?? DEFAULT_BOOTSTRAP_TOKEN_TTL_MS;
  if (!Number.isFinite(ttlMs) || ttlMs <= 0) throw new Error(`invalid bootstrap token ttl: ${ttlMs}`);
  const now = params.now ?? (() => new Date());

  return {
    issue: async () => {
      const parts = generateBootstrapTokenParts(params.random);
      const expiresAt = new Date(now().getTime() + ttlMs);
      const secret = buildBootstrapTokenSecret(parts, expiresAt);
      const stored = await params.secrets.createSecret(secret);
      const id = stored.data["token-id"] ?? parts.id;
      const tokenSecret = stored.data["token-secret"] ?? parts.secret;
      return formatBootstrapToken({ id, secret: tokenSecret });
    },
  };
}
