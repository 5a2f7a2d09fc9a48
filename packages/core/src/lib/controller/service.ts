import type { Logger } from "pino";
import { MachineActuator, type ClusterInfo } from "../actuator/actuator.js";
import { createLoggingEventRecorder } from "../actuator/events.js";
import type { ActuatorConfig } from "../config.js";
import { createOpenstackComputeProvider } from "../openstack/client.js";
import type { ComputeProvider } from "../openstack/types.js";
import { openSqliteRecordStore } from "../store/sqlite-store.js";
import type { RecordStore } from "../store/types.js";
import { MachineReconciler, runMachineReconcileLoop } from "./reconciler.js";

export function createStaticClusterInfo(infrastructureName: string): ClusterInfo {
  return { getInfrastructureName: async () => infrastructureName };
}

export type MachineActuatorService = {
  store: RecordStore;
  reconciler: MachineReconciler;
  done: Promise<void>;
  stop(): Promise<void>;
};

export function startMachineActuatorService(params: {
  config: ActuatorConfig;
  logger: Logger;
  store?: RecordStore;
  compute?: ComputeProvider;
}): MachineActuatorService {
  const { config, logger } = params;
  const store = params.store ?? openSqliteRecordStore(config.storePath);
  const compute = params.compute ?? createOpenstackComputeProvider(config.openstack);

  const actuator = new MachineActuator({
    compute,
    clusterInfo: createStaticClusterInfo(config.clusterInfrastructureName),
    store,
    secrets: store,
    events: createLoggingEventRecorder(logger),
    logger,
    config,
  });
  const reconciler = new MachineReconciler({ store, actuator, logger });

  const stopSignal = { stopped: false };
  const done = runMachineReconcileLoop({
    store,
    reconciler,
    pollMs: config.reconcile.pollMs,
    concurrency: config.reconcile.concurrency,
    maxAttempts: config.reconcile.maxAttempts,
    logger,
    stopSignal,
  });

  return {
    store,
    reconciler,
    done,
    stop: async () => {
      stopSignal.stopped = true;
      try {
        await done;
      } finally {
        store.close();
      }
    },
  };
}
