import type { Logger } from "pino";
import type { MachineActuator } from "../actuator/actuator.js";
import { errorMessage, isRetryableError } from "../errors.js";
import { formatMachineKey, machineKey, type Machine, type MachineKey } from "../machine/types.js";
import { KeyedMutex, mapWithConcurrency } from "../runtime/concurrency.js";
import type { MachineStore } from "../store/types.js";

export type ReconcileAction = "created" | "updated" | "deleted" | "missing";

export type ReconcileResult = { key: MachineKey; action: ReconcileAction };

export function computeBackoffMs(params: { attempt: number; baseMs: number; maxMs: number }): number {
  const a = Math.max(1, Math.floor(params.attempt));
  const base = Math.max(1, Math.floor(params.baseMs));
  const max = Math.max(base, Math.floor(params.maxMs));
  return Math.min(max, base * 2 ** (a - 1));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Stand-in for the controller that owns the actuator: picks the operation for a
 * record and makes sure only one invocation per record runs at a time.
 */
export class MachineReconciler {
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly params: {
      store: MachineStore;
      actuator: MachineActuator;
      logger: Logger;
    },
  ) {}

  async reconcile(key: MachineKey): Promise<ReconcileResult> {
    return await this.mutex.runExclusive(formatMachineKey(key), async () => {
      const machine = await this.params.store.getMachine(key);
      if (!machine) return { key, action: "missing" };

      if (machine.metadata.deletionTimestamp) {
        await this.params.actuator.delete(machine);
        await this.params.store.deleteMachine(key);
        this.params.logger.info({ machine: formatMachineKey(key) }, "machine deleted");
        return { key, action: "deleted" };
      }

      if (await this.params.actuator.exists(machine)) {
        await this.params.actuator.update(machine);
        return { key, action: "updated" };
      }

      await this.params.actuator.create(machine);
      this.params.logger.info({ machine: formatMachineKey(key) }, "machine created");
      return { key, action: "created" };
    });
  }
}

export async function reconcileWithRetry(params: {
  reconciler: Pick<MachineReconciler, "reconcile">;
  key: MachineKey;
  maxAttempts: number;
  baseBackoffMs?: number;
  maxBackoffMs?: number;
  logger: Logger;
}): Promise<ReconcileResult> {
  const maxAttempts = Math.max(1, Math.floor(params.maxAttempts));
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await params.reconciler.reconcile(params.key);
    } catch (err) {
      if (!isRetryableError(err) || attempt >= maxAttempts) throw err;
      const delayMs = computeBackoffMs({
        attempt,
        baseMs: params.baseBackoffMs ?? 1_000,
        maxMs: params.maxBackoffMs ?? 60_000,
      });
      params.logger.warn(
        { machine: formatMachineKey(params.key), attempt, delayMs, error: errorMessage(err) },
        "reconcile failed, retrying",
      );
      await sleep(delayMs);
    }
  }
}

export async function runMachineReconcileLoop(params: {
  store: MachineStore;
  reconciler: MachineReconciler;
  pollMs: number;
  concurrency: number;
  maxAttempts: number;
  baseBackoffMs?: number;
  logger: Logger;
  stopSignal: { stopped: boolean };
}): Promise<void> {
  while (!params.stopSignal.stopped) {
    let machines: Machine[] = [];
    try {
      machines = await params.store.listMachines();
    } catch (err) {
      params.logger.error({ err }, "listing machines failed");
    }
    await mapWithConcurrency({
      items: machines,
      concurrency: params.concurrency,
      fn: async (machine) => {
        const key = machineKey(machine);
        try {
          await reconcileWithRetry({
            reconciler: params.reconciler,
            key,
            maxAttempts: params.maxAttempts,
            baseBackoffMs: params.baseBackoffMs,
            logger: params.logger,
          });
        } catch (err) {
          params.logger.error({ machine: formatMachineKey(key), err }, "reconcile failed");
        }
      },
    });
    if (params.stopSignal.stopped) break;
    await sleep(params.pollMs);
  }
}
