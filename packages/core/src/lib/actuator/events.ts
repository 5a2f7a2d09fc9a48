import type { Logger } from "pino";
import type { Machine } from "../machine/types.js";

export type EventType = "Normal" | "Warning";

export type MachineEvent = {
  namespace: string;
  name: string;
  type: EventType;
  reason: string;
  message: string;
};

export interface EventRecorder {
  record(machine: Machine, type: EventType, reason: string, message: string): void;
}

export function createLoggingEventRecorder(logger: Logger): EventRecorder {
  const log = logger.child({ component: "events" });
  return {
    record: (machine, type, reason, message) => {
      const event: MachineEvent = {
        namespace: machine.metadata.namespace,
        name: machine.metadata.name,
        type,
        reason,
        message,
      };
      if (type === "Warning") log.warn({ event }, message);
      else log.info({ event }, message);
    },
  };
}
