#!/usr/bin/env node
import process from "node:process";
import { loadActuatorConfigFromEnv } from "./lib/config.js";
import { startMachineActuatorService } from "./lib/controller/service.js";
import { createActuatorLogger } from "./lib/logging/logger.js";

async function main(): Promise<void> {
  const config = loadActuatorConfigFromEnv(process.env);
  const logger = createActuatorLogger({ level: config.logLevel });

  const service = startMachineActuatorService({ config, logger });
  logger.info(
    { storePath: config.storePath, cluster: config.clusterInfrastructureName, concurrency: config.reconcile.concurrency },
    "machine actuator started",
  );

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    service.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await service.done;
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
