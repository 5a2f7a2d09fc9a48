import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import BetterSqlite3, { type Database } from "better-sqlite3";
import { MachineConflictError, MachineStoreError } from "../errors.js";
import { formatMachineKey, parseMachine, type Machine, type MachineKey, type Secret } from "../machine/types.js";
import type { RecordStore } from "./types.js";

const SCHEMA_VERSION = 1;

type MachineRow = {
  namespace: string;
  name: string;
  labels_json: string;
  annotations_json: string;
  resource_version: number;
  deletion_timestamp: string | null;
  spec_json: string;
  status_json: string;
};

type SecretRow = {
  namespace: string;
  name: string;
  type: string;
  data_json: string;
};

function migrateRecordStore(db: Database): void {
  const current = Number(db.pragma("user_version", { simple: true }) || 0);
  if (current >= SCHEMA_VERSION) return;
  db.exec(`
    create table if not exists machines (
      namespace text not null,
      name text not null,
      labels_json text not null,
      annotations_json text not null,
      resource_version integer not null,
      deletion_timestamp text,
      spec_json text not null,
      status_json text not null,
      created_at integer not null,
      updated_at integer not null,
      primary key (namespace, name)
    );

    create table if not exists secrets (
      namespace text not null,
      name text not null,
      type text not null,
      data_json text not null,
      created_at integer not null,
      primary key (namespace, name)
    );
  `);
  db.pragma(`user_version = ${SCHEMA_VERSION}`);
}

function parseJsonColumn(value: string, column: string, key: string): unknown {
  try {
    return JSON.parse(value);
  } catch (err) {
    throw new MachineStoreError(`corrupt ${column} for ${key}`, { cause: err });
  }
}

function rowToMachine(row: MachineRow): Machine {
  const key = `${row.namespace}/${row.name}`;
  return parseMachine({
    metadata: {
      namespace: row.namespace,
      name: row.name,
      labels: parseJsonColumn(row.labels_json, "labels", key),
      annotations: parseJsonColumn(row.annotations_json, "annotations", key),
      resourceVersion: row.resource_version,
      ...(row.deletion_timestamp ? { deletionTimestamp: row.deletion_timestamp } : {}),
    },
    spec: parseJsonColumn(row.spec_json, "spec", key),
    status: parseJsonColumn(row.status_json, "status", key),
  });
}

function rowToSecret(row: SecretRow): Secret {
  const data = parseJsonColumn(row.data_json, "data", `${row.namespace}/${row.name}`);
  const out: Record<string, string> = {};
  if (data && typeof data === "object" && !Array.isArray(data)) {
    for (const [k, v] of Object.entries(data)) {
      if (typeof v === "string") out[k] = v;
    }
  }
  return { namespace: row.namespace, name: row.name, type: row.type, data: out };
}

function isSqliteUniqueConstraintError(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  const code = String(err.code || "");
  return code === "SQLITE_CONSTRAINT_UNIQUE" || code === "SQLITE_CONSTRAINT_PRIMARYKEY";
}

function createRecordStoreOps(db: Database, now: () => number): Omit<RecordStore, "close"> {
  const selectMachine = db.prepare<{ namespace: string; name: string }, MachineRow>(
    `select * from machines where namespace = @namespace and name = @name limit 1`,
  );
  const selectMachines = db.prepare<[], MachineRow>(`select * from machines order by namespace, name`);
  const selectMachinesInNamespace = db.prepare<{ namespace: string }, MachineRow>(
    `select * from machines where namespace = @namespace order by name`,
  );

  const insertMachine = db.prepare<{
    namespace: string;
    name: string;
    labels_json: string;
    annotations_json: string;
    spec_json: string;
    status_json: string;
    now: number;
  }>(
    `
      insert into machines (
        namespace, name, labels_json, annotations_json, resource_version,
        deletion_timestamp, spec_json, status_json, created_at, updated_at
      )
      values (
        @namespace, @name, @labels_json, @annotations_json, 1,
        null, @spec_json, @status_json, @now, @now
      )
    `,
  );

  const updateMachineMeta = db.prepare<{
    namespace: string;
    name: string;
    labels_json: string;
    annotations_json: string;
    spec_json: string;
    resource_version: number;
    now: number;
  }>(
    `
      update machines
      set labels_json = @labels_json,
          annotations_json = @annotations_json,
          spec_json = @spec_json,
          resource_version = resource_version + 1,
          updated_at = @now
      where namespace = @namespace and name = @name and resource_version = @resource_version
    `,
  );

  const updateMachineStatusRow = db.prepare<{
    namespace: string;
    name: string;
    status_json: string;
    resource_version: number;
    now: number;
  }>(
    `
      update machines
      set status_json = @status_json,
          resource_version = resource_version + 1,
          updated_at = @now
      where namespace = @namespace and name = @name and resource_version = @resource_version
    `,
  );

  const setDeletionTimestamp = db.prepare<{ namespace: string; name: string; deleted_at: string; now: number }>(
    `
      update machines
      set deletion_timestamp = coalesce(deletion_timestamp, @deleted_at),
          resource_version = resource_version + 1,
          updated_at = @now
      where namespace = @namespace and name = @name
    `,
  );

  const deleteMachineRow = db.prepare<{ namespace: string; name: string }>(
    `delete from machines where namespace = @namespace and name = @name`,
  );

  const selectSecret = db.prepare<{ namespace: string; name: string }, SecretRow>(
    `select * from secrets where namespace = @namespace and name = @name limit 1`,
  );

  const insertSecret = db.prepare<{ namespace: string; name: string; type: string; data_json: string; now: number }>(
    `insert into secrets (namespace, name, type, data_json, created_at) values (@namespace, @name, @type, @data_json, @now)`,
  );

  const readMachine = (key: MachineKey): Machine | null => {
    const row = selectMachine.get({ namespace: key.namespace, name: key.name });
    return row ? rowToMachine(row) : null;
  };

  const requireMachine = (key: MachineKey): Machine => {
    const machine = readMachine(key);
    if (!machine) throw new MachineStoreError(`machine not found: ${formatMachineKey(key)}`);
    return machine;
  };

  const explainStaleWrite = (machine: Machine): never => {
    const key = { namespace: machine.metadata.namespace, name: machine.metadata.name };
    const current = readMachine(key);
    if (!current) throw new MachineStoreError(`machine not found: ${formatMachineKey(key)}`);
    throw new MachineConflictError(
      `machine ${formatMachineKey(key)} was modified (resourceVersion ${machine.metadata.resourceVersion} != ${current.metadata.resourceVersion})`,
    );
  };

  return {
    getMachine: async (key) => readMachine(key),

    listMachines: async (params) => {
      const namespace = String(params?.namespace || "").trim();
      const rows = namespace ? selectMachinesInNamespace.all({ namespace }) : selectMachines.all();
      return rows.map(rowToMachine);
    },

    createMachine: async (machine) => {
      const record = parseMachine(machine);
      try {
        insertMachine.run({
          namespace: record.metadata.namespace,
          name: record.metadata.name,
          labels_json: JSON.stringify(record.metadata.labels),
          annotations_json: JSON.stringify(record.metadata.annotations),
          spec_json: JSON.stringify(record.spec),
          status_json: JSON.stringify(record.status),
          now: now(),
        });
      } catch (err) {
        if (isSqliteUniqueConstraintError(err)) {
          throw new MachineStoreError(`machine already exists: ${formatMachineKey(record.metadata)}`, { cause: err });
        }
        throw err;
      }
      return requireMachine(record.metadata);
    },

    updateMachine: async (machine) => {
      const res = updateMachineMeta.run({
        namespace: machine.metadata.namespace,
        name: machine.metadata.name,
        labels_json: JSON.stringify(machine.metadata.labels),
        annotations_json: JSON.stringify(machine.metadata.annotations),
        spec_json: JSON.stringify(machine.spec),
        resource_version: machine.metadata.resourceVersion,
        now: now(),
      });
      if (res.changes !== 1) explainStaleWrite(machine);
      return requireMachine(machine.metadata);
    },

    updateMachineStatus: async (machine) => {
      const res = updateMachineStatusRow.run({
        namespace: machine.metadata.namespace,
        name: machine.metadata.name,
        status_json: JSON.stringify(machine.status),
        resource_version: machine.metadata.resourceVersion,
        now: now(),
      });
      if (res.changes !== 1) explainStaleWrite(machine);
      return requireMachine(machine.metadata);
    },

    markMachineDeleted: async (key, deletedAt) => {
      const res = setDeletionTimestamp.run({
        namespace: key.namespace,
        name: key.name,
        deleted_at: (deletedAt ?? new Date(now())).toISOString(),
        now: now(),
      });
      if (res.changes !== 1) return null;
      return readMachine(key);
    },

    deleteMachine: async (key) => {
      const res = deleteMachineRow.run({ namespace: key.namespace, name: key.name });
      return res.changes === 1;
    },

    getSecret: async (namespace, name) => {
      const row = selectSecret.get({ namespace, name });
      return row ? rowToSecret(row) : null;
    },

    createSecret: async (secret) => {
      try {
        insertSecret.run({
          namespace: secret.namespace,
          name: secret.name,
          type: secret.type,
          data_json: JSON.stringify(secret.data),
          now: now(),
        });
      } catch (err) {
        if (isSqliteUniqueConstraintError(err)) {
          throw new MachineStoreError(`secret already exists: ${secret.namespace}/${secret.name}`, { cause: err });
        }
        throw err;
      }
      const row = selectSecret.get({ namespace: secret.namespace, name: secret.name });
      if (!row) throw new MachineStoreError(`secret not found after insert: ${secret.namespace}/${secret.name}`);
      return rowToSecret(row);
    },
  };
}

/**
 * Opens (and migrates) the sqlite-backed record store. Pass ":memory:" for a
 * throwaway store.
 */
export function openSqliteRecordStore(dbPath: string, opts: { now?: () => number } = {}): RecordStore {
  const inMemory = dbPath === ":memory:";
  const abs = inMemory ? dbPath : path.isAbsolute(dbPath) ? dbPath : path.resolve(process.cwd(), dbPath);
  if (!inMemory) fs.mkdirSync(path.dirname(abs), { recursive: true, mode: 0o700 });

  const db = new BetterSqlite3(abs);
  if (!inMemory) fs.chmodSync(abs, 0o600);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");

  migrateRecordStore(db);

  const ops = createRecordStoreOps(db, opts.now ?? Date.now);
  return {
    close: () => db.close(),
    ...ops,
  };
}
