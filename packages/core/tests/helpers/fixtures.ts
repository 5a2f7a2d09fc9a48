import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createActuatorLogger, type Logger } from "../../src/lib/logging/logger.js";
import { CLUSTER_LABEL, MACHINE_ROLE_LABEL, parseMachine, type Machine } from "../../src/lib/machine/types.js";
import { openSqliteRecordStore } from "../../src/lib/store/sqlite-store.js";
import type { RecordStore } from "../../src/lib/store/types.js";

export const TEST_CLUSTER = "test-cluster";

export function silentLogger(): Logger {
  return createActuatorLogger({ level: "silent", destination: { write: () => {} } });
}

export function makeMachine(params: {
  name?: string;
  namespace?: string;
  role?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  providerSpec?: unknown;
  providerID?: string;
} = {}): Machine {
  return parseMachine({
    metadata: {
      namespace: params.namespace ?? "machines",
      name: params.name ?? "worker-0",
      labels: {
        [CLUSTER_LABEL]: TEST_CLUSTER,
        [MACHINE_ROLE_LABEL]: params.role ?? "worker",
        ...params.labels,
      },
      annotations: params.annotations ?? {},
    },
    spec: {
      providerSpec: params.providerSpec ?? { image: "rhcos", flavor: "m1.large" },
      ...(params.providerID !== undefined ? { providerID: params.providerID } : {}),
    },
  });
}

export function openTempStore(): { store: RecordStore; dir: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "machine-actuator-"));
  const store = openSqliteRecordStore(path.join(dir, "state.sqlite"));
  return {
    store,
    dir,
    cleanup: () => {
      store.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
