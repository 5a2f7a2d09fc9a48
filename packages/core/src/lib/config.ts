import { coerceTrimmedString } from "@vmreconcile/shared/lib/strings";
import { DEFAULT_BOOTSTRAP_TOKEN_TTL_MS } from "./bootstrap-token.js";
import { parseLogLevel, type LogLevel } from "./logging/logger.js";

export const INSTANCE_CREATE_TIMEOUT_ENV = "CLUSTER_API_OPENSTACK_INSTANCE_CREATE_TIMEOUT";
export const INSTANCE_STATUS_POLL_ENV = "CLUSTER_API_OPENSTACK_INSTANCE_STATUS_POLL_MS";

export const DEFAULT_INSTANCE_CREATE_TIMEOUT_MINUTES = 5;
export const DEFAULT_INSTANCE_STATUS_POLL_MS = 10_000;

export type ActuatorTimings = {
  instanceCreateTimeoutMs: number;
  instanceStatusPollMs: number;
  bootstrapTokenTtlMs: number;
};

export type ActuatorConfig = ActuatorTimings & {
  logLevel: LogLevel;
  storePath: string;
  clusterInfrastructureName: string;
  openstack: {
    token: string;
    computeUrl: string;
    networkUrl: string;
    imageUrl: string;
  };
  reconcile: {
    pollMs: number;
    concurrency: number;
    maxAttempts: number;
  };
};

export const DEFAULT_ACTUATOR_TIMINGS: ActuatorTimings = {
  instanceCreateTimeoutMs: DEFAULT_INSTANCE_CREATE_TIMEOUT_MINUTES * 60_000,
  instanceStatusPollMs: DEFAULT_INSTANCE_STATUS_POLL_MS,
  bootstrapTokenTtlMs: DEFAULT_BOOTSTRAP_TOKEN_TTL_MS,
};

function parseIntEnv(value: string | undefined, fallback: number): number {
  const v = coerceTrimmedString(value);
  if (!v) return fallback;
  if (!/^-?\d+$/.test(v)) throw new Error(`invalid int env value: ${v}`);
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`invalid int env value: ${v}`);
  return n;
}

// Malformed or non-positive values fall back to the default instead of failing startup.
function parsePositiveIntEnvLenient(value: string | undefined, fallback: number): number {
  const v = coerceTrimmedString(value);
  if (!/^\d+$/.test(v)) return fallback;
  const n = Number(v);
  return Number.isSafeInteger(n) && n > 0 ? n : fallback;
}

function parseStringEnv(value: string | undefined, fallback: string): string {
  return coerceTrimmedString(value) || fallback;
}

function parseUrlEnv(name: string, value: string | undefined): string {
  const v = parseStringEnv(value, "");
  if (v && !/^https?:\/\//.test(v)) throw new Error(`invalid ${name} (expected http(s)): ${v}`);
  return v;
}

export function resolveActuatorTimings(env: NodeJS.ProcessEnv): ActuatorTimings {
  const timeoutMinutes = parsePositiveIntEnvLenient(env[INSTANCE_CREATE_TIMEOUT_ENV], DEFAULT_INSTANCE_CREATE_TIMEOUT_MINUTES);
  return {
    instanceCreateTimeoutMs: timeoutMinutes * 60_000,
    instanceStatusPollMs: parsePositiveIntEnvLenient(env[INSTANCE_STATUS_POLL_ENV], DEFAULT_INSTANCE_STATUS_POLL_MS),
    bootstrapTokenTtlMs: DEFAULT_BOOTSTRAP_TOKEN_TTL_MS,
  };
}

/**
 * Reads the actuator configuration once at startup. Only the instance timing
 * overrides are lenient; everything else fails fast on malformed input.
 */
export function loadActuatorConfigFromEnv(env: NodeJS.ProcessEnv): ActuatorConfig {
  const token = parseStringEnv(env.OS_AUTH_TOKEN, "");
  if (!token) throw new Error("missing OS_AUTH_TOKEN");
  const computeUrl = parseUrlEnv("OS_COMPUTE_ENDPOINT", env.OS_COMPUTE_ENDPOINT);
  if (!computeUrl) throw new Error("missing OS_COMPUTE_ENDPOINT");
  const clusterInfrastructureName = parseStringEnv(env.CLUSTER_INFRASTRUCTURE_NAME, "");
  if (!clusterInfrastructureName) throw new Error("missing CLUSTER_INFRASTRUCTURE_NAME");

  return {
    ...resolveActuatorTimings(env),
    logLevel: parseLogLevel(env.MACHINE_ACTUATOR_LOG_LEVEL, "info"),
    storePath: parseStringEnv(env.MACHINE_STORE_PATH, "/var/lib/machine-actuator/state.sqlite"),
    clusterInfrastructureName,
    openstack: {
      token,
      computeUrl,
      networkUrl: parseUrlEnv("OS_NETWORK_ENDPOINT", env.OS_NETWORK_ENDPOINT),
      imageUrl: parseUrlEnv("OS_IMAGE_ENDPOINT", env.OS_IMAGE_ENDPOINT),
    },
    reconcile: {
      pollMs: Math.max(1_000, Math.min(10 * 60_000, parseIntEnv(env.MACHINE_RECONCILE_POLL_MS, 30_000))),
      concurrency: Math.max(1, Math.min(64, parseIntEnv(env.MACHINE_RECONCILE_CONCURRENCY, 4))),
      maxAttempts: Math.max(1, Math.min(20, parseIntEnv(env.MACHINE_RECONCILE_MAX_ATTEMPTS, 5))),
    },
  };
}
