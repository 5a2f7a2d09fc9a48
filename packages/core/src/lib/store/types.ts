import type { Machine, MachineKey, Secret } from "../machine/types.js";

/**
 * Record store for machines. `updateMachine` writes metadata and spec only,
 * `updateMachineStatus` writes the status subset only; both reject stale
 * resourceVersions.
 */
export interface MachineStore {
  getMachine(key: MachineKey): Promise<Machine | null>;
  listMachines(params?: { namespace?: string }): Promise<Machine[]>;
  createMachine(machine: Machine): Promise<Machine>;
  updateMachine(machine: Machine): Promise<Machine>;
  updateMachineStatus(machine: Machine): Promise<Machine>;
  markMachineDeleted(key: MachineKey, deletedAt?: Date): Promise<Machine | null>;
  deleteMachine(key: MachineKey): Promise<boolean>;
}

export interface SecretStore {
  getSecret(namespace: string, name: string): Promise<Secret | null>;
  createSecret(secret: Secret): Promise<Secret>;
}

export type RecordStore = MachineStore & SecretStore & { close(): void };
