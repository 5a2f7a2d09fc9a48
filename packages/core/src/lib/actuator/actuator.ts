import type { Logger } from "pino";
import { createBootstrapTokenIssuer, type BootstrapTokenIssuer } from "../bootstrap-token.js";
import type { ActuatorTimings } from "../config.js";
import {
  MachineError,
  MachineStoreError,
  createMachineError,
  deleteMachineError,
  errorMessage,
  invalidMachineConfiguration,
  updateMachineError,
} from "../errors.js";
import { decodeProviderSpec, type OpenstackProviderSpec } from "../machine/provider-spec.js";
import {
  CLUSTER_LABEL,
  ERROR_STATE,
  INSTANCE_STATE_ANNOTATION,
  MACHINE_ROLE_LABEL,
  MACHINE_TYPE_LABEL,
  RESOURCE_ID_ANNOTATION,
  assignMachine,
  formatMachineKey,
  machineKey,
  providerIdForInstance,
  type Machine,
  type NodeAddress,
} from "../machine/types.js";
import { buildMachineAddresses, nodeAddressesEqual } from "../openstack/addresses.js";
import { INSTANCE_STATUS_ACTIVE, type ComputeProvider, type Instance } from "../openstack/types.js";
import type { MachineStore, SecretStore } from "../store/types.js";
import { resolveUserData } from "../userdata/resolve.js";
import type { EventRecorder } from "./events.js";
import { pollImmediate } from "./poll.js";

export type ActuatorAction = "Create" | "Update" | "Delete";

export interface ClusterInfo {
  getInfrastructureName(): Promise<string>;
}

export type MachineActuatorParams = {
  compute: ComputeProvider;
  clusterInfo: ClusterInfo;
  // Absent while the cluster is being installed; status then lives in memory only.
  store?: MachineStore;
  secrets: SecretStore;
  events: EventRecorder;
  logger: Logger;
  config: ActuatorTimings;
  issuer?: BootstrapTokenIssuer;
};

const IDENTITY_LABELS = [CLUSTER_LABEL, MACHINE_ROLE_LABEL, MACHINE_TYPE_LABEL] as const;

/**
 * Drives one OpenStack instance towards the state described by one machine record.
 * Every operation is safe to re-invoke after a failure; the actuator keeps no state
 * between calls.
 */
export class MachineActuator {
  private readonly compute: ComputeProvider;
  private readonly clusterInfo: ClusterInfo;
  private readonly store: MachineStore | undefined;
  private readonly secrets: SecretStore;
  private readonly events: EventRecorder;
  private readonly logger: Logger;
  private readonly config: ActuatorTimings;
  private readonly issuer: BootstrapTokenIssuer;

  constructor(params: MachineActuatorParams) {
    this.compute = params.compute;
    this.clusterInfo = params.clusterInfo;
    this.store = params.store;
    this.secrets = params.secrets;
    this.events = params.events;
    this.logger = params.logger.child({ component: "actuator" });
    this.config = params.config;
    this.issuer =
      params.issuer ?? createBootstrapTokenIssuer({ secrets: params.secrets, ttlMs: params.config.bootstrapTokenTtlMs });
  }

  async create(machine: Machine): Promise<void> {
    const name = machine.metadata.name;
    const infraName = await this.getClusterInfraName();

    const clusterLabel = machine.metadata.labels[CLUSTER_LABEL] ?? "";
    if (clusterLabel !== infraName) {
      throw await this.handleMachineError(
        machine,
        invalidMachineConfiguration(
          `${CLUSTER_LABEL} label value is incorrect: ${clusterLabel}, machine ${name} cannot join cluster ${infraName}`,
        ),
        "Create",
      );
    }

    // A bound record whose instance is gone must not get a new instance under the old name.
    if (machine.spec.providerID !== undefined) {
      throw await this.handleMachineError(
        machine,
        invalidMachineConfiguration(`the instance has been destroyed for the machine ${name}, cannot recreate it`),
        "Create",
      );
    }

    const decoded = decodeProviderSpec(machine.spec.providerSpec);
    if (!decoded.ok) {
      throw await this.handleMachineError(
        machine,
        invalidMachineConfiguration(`Cannot unmarshal providerSpec field: ${decoded.error}`),
        "Create",
      );
    }
    const spec = decoded.spec;

    try {
      await this.validateMachine(spec);
    } catch (err) {
      throw await this.handleMachineError(
        machine,
        invalidMachineConfiguration(`Machine validation failed: ${errorMessage(err)}`),
        "Create",
      );
    }

    let userData: string;
    try {
      userData = await resolveUserData({
        machine,
        spec,
        clusterName: infraName,
        secrets: this.secrets,
        issuer: this.issuer,
        logger: this.logger,
      });
    } catch (err) {
      if (err instanceof MachineError) throw await this.handleMachineError(machine, err, "Create");
      throw err;
    }

    let instance: Instance;
    try {
      instance = await this.compute.createInstance({
        name,
        clusterName: `${machine.metadata.namespace}-${clusterLabel}`,
        spec,
        userData,
        keyName: spec.keyName,
      });
    } catch (err) {
      throw await this.handleMachineError(
        machine,
        createMachineError(`error creating Openstack instance: ${errorMessage(err)}`),
        "Create",
      );
    }
    this.logger.info({ machine: name, instanceId: instance.id }, "instance created, waiting for it to become active");

    try {
      await pollImmediate({
        intervalMs: this.config.instanceStatusPollMs,
        timeoutMs: this.config.instanceCreateTimeoutMs,
        condition: async () => {
          try {
            instance = await this.compute.getInstance(instance.id);
          } catch (err) {
            this.logger.debug({ machine: name, instanceId: instance.id, err }, "instance status check failed");
            return false;
          }
          return instance.status === INSTANCE_STATUS_ACTIVE;
        },
      });
    } catch (err) {
      throw await this.handleMachineError(
        machine,
        createMachineError(`error creating Openstack instance: ${errorMessage(err)}`),
        "Create",
      );
    }

    if (spec.floatingIP) {
      try {
        await this.compute.associateFloatingIP(instance.id, spec.floatingIP);
      } catch (err) {
        throw await this.handleMachineError(
          machine,
          createMachineError(`Associate floatingIP err: ${errorMessage(err)}`),
          "Create",
        );
      }
    }

    try {
      await this.compute.setInstanceMetadata(instance.id, this.identityMetadata(machine));
    } catch (err) {
      this.logger.warn({ machine: name, instanceId: instance.id, err }, "unable to push machine labels to instance metadata");
    }

    this.events.record(machine, "Normal", "Created", `Created machine ${name}`);
    await this.updateAnnotation(machine, instance);
  }

  async update(machine: Machine): Promise<void> {
    await this.getClusterInfraName();

    let instance: Instance | null;
    try {
      instance = await this.instanceExists(machine);
    } catch (err) {
      throw await this.handleMachineError(
        machine,
        updateMachineError(`error fetching OpenStack server for machine ${machine.metadata.name}: ${errorMessage(err)}`),
        "Update",
      );
    }

    await this.updateAnnotation(machine, instance);
  }

  async delete(machine: Machine): Promise<void> {
    const name = machine.metadata.name;
    const instance = await this.instanceExists(machine);
    if (!instance) {
      this.logger.info({ machine: name }, "skipped deleting machine that is already deleted");
      return;
    }

    const id = machine.metadata.annotations[RESOURCE_ID_ANNOTATION] || instance.id;
    try {
      await this.compute.deleteInstance(id);
    } catch (err) {
      throw await this.handleMachineError(
        machine,
        deleteMachineError(`error deleting Openstack instance: ${errorMessage(err)}`),
        "Delete",
      );
    }

    this.events.record(machine, "Normal", "Deleted", `Deleted machine ${name}`);
  }

  async exists(machine: Machine): Promise<boolean> {
    try {
      return (await this.instanceExists(machine)) !== null;
    } catch (err) {
      throw new Error(`error checking if instance exists: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async getClusterInfraName(): Promise<string> {
    try {
      return await this.clusterInfo.getInfrastructureName();
    } catch (err) {
      throw new Error(`failed to retrieve cluster infrastructure name: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async validateMachine(spec: OpenstackProviderSpec): Promise<void> {
    if (!spec.rootVolume) await this.compute.assertImageExists(spec.image);
    await this.compute.assertFlavorExists(spec.flavor);
    if (spec.availabilityZone) await this.compute.assertAvailabilityZoneExists(spec.availabilityZone);
  }

  // Matches on name, image and flavor; volume boots skip the image.
  // Two records sharing all three resolve to the same instance.
  private async instanceExists(machine: Machine): Promise<Instance | null> {
    const decoded = decodeProviderSpec(machine.spec.providerSpec);
    if (!decoded.ok) throw new Error(`error getting the machine spec from the provider spec: ${decoded.error}`);

    let instances: Instance[];
    try {
      instances = await this.compute.listInstances({
        name: machine.metadata.name,
        image: decoded.spec.rootVolume ? null : decoded.spec.image,
        flavor: decoded.spec.flavor,
      });
    } catch (err) {
      throw new Error(`error listing the instances: ${errorMessage(err)}`, { cause: err });
    }
    return instances[0] ?? null;
  }

  private identityMetadata(machine: Machine): Record<string, string> {
    const out: Record<string, string> = {};
    for (const label of IDENTITY_LABELS) {
      const value = machine.metadata.labels[label];
      if (value !== undefined) out[label] = value;
    }
    return out;
  }

  private async readCurrent(machine: Machine, store: MachineStore): Promise<Machine> {
    const current = await store.getMachine(machineKey(machine));
    if (!current) throw new MachineStoreError(`machine not found: ${formatMachineKey(machineKey(machine))}`);
    return current;
  }

  /**
   * Status write-back. With an instance the record is bound to it (providerID,
   * annotations, addresses); without one the annotations and addresses are cleared.
   * Metadata is always written, status only when the addresses changed.
   */
  private async updateAnnotation(machine: Machine, instance: Instance | null): Promise<void> {
    const target = this.store ? await this.readCurrent(machine, this.store) : machine;

    let addresses: NodeAddress[] = [];
    if (instance) {
      const providerID = providerIdForInstance(instance.id);
      if (target.spec.providerID !== undefined && target.spec.providerID !== providerID) {
        throw await this.handleMachineError(
          machine,
          invalidMachineConfiguration(
            `providerID has changed from ${target.spec.providerID} to ${providerID}. This is not supported. ` +
              "The recommended action is to delete and recreate this machine.",
          ),
          "Update",
        );
      }
      target.spec.providerID = providerID;
      target.metadata.annotations[RESOURCE_ID_ANNOTATION] = instance.id;
      target.metadata.annotations[INSTANCE_STATE_ANNOTATION] = instance.status;
      addresses = buildMachineAddresses(instance, target.metadata.name, (skip) => {
        this.logger.debug({ machine: target.metadata.name, ...skip }, "ignoring instance address");
      });
    } else {
      delete target.metadata.annotations[RESOURCE_ID_ANNOTATION];
      delete target.metadata.annotations[INSTANCE_STATE_ANNOTATION];
    }

    if (!this.store) {
      target.status.addresses = addresses;
      return;
    }

    let saved = await this.store.updateMachine(target);
    if (!nodeAddressesEqual(saved.status.addresses, addresses)) {
      saved.status.addresses = addresses;
      saved = await this.store.updateMachineStatus(saved);
    }
    assignMachine(machine, saved);
  }

  /**
   * Records a classified failure: a Warning event, then (with a store) the error
   * fields and the ERROR state annotation on the persisted record. Returns the
   * error to throw, or a persistence error when the record could not be updated.
   */
  private async handleMachineError(machine: Machine, err: MachineError, action: ActuatorAction): Promise<Error> {
    this.events.record(machine, "Warning", `Failed${action}`, err.reason);

    if (this.store) {
      try {
        const current = await this.readCurrent(machine, this.store);
        current.metadata.annotations[INSTANCE_STATE_ANNOTATION] = ERROR_STATE;
        const saved = await this.store.updateMachine(current);
        saved.status.errorReason = err.reason;
        saved.status.errorMessage = err.message;
        assignMachine(machine, await this.store.updateMachineStatus(saved));
      } catch (persistErr) {
        return new Error(`unable to update machine status: ${errorMessage(persistErr)}`, { cause: persistErr });
      }
    }

    this.logger.error({ machine: machine.metadata.name, reason: err.reason }, `machine error: ${err.message}`);
    return err;
  }
}
