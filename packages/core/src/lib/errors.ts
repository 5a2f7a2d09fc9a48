import { formatUnknown } from "@vmreconcile/shared/lib/strings";

export type MachineErrorReason = "InvalidConfiguration" | "CreateError" | "UpdateError" | "DeleteError";

export type MachineErrorKind = "configuration" | "provisioning";

export class MachineError extends Error {
  readonly reason: MachineErrorReason;

  constructor(reason: MachineErrorReason, message: string) {
    super(message);
    this.name = "MachineError";
    this.reason = reason;
  }

  get kind(): MachineErrorKind {
    return this.reason === "InvalidConfiguration" ? "configuration" : "provisioning";
  }
}

export function invalidMachineConfiguration(message: string): MachineError {
  return new MachineError("InvalidConfiguration", message);
}

export function createMachineError(message: string): MachineError {
  return new MachineError("CreateError", message);
}

export function updateMachineError(message: string): MachineError {
  return new MachineError("UpdateError", message);
}

export function deleteMachineError(message: string): MachineError {
  return new MachineError("DeleteError", message);
}

// Configuration errors need operator correction; everything else may succeed on re-invocation.
export function isRetryableError(err: unknown): boolean {
  return !(err instanceof MachineError && err.kind === "configuration");
}

export class MachineStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MachineStoreError";
  }
}

export class MachineConflictError extends MachineStoreError {
  constructor(message: string) {
    super(message);
    this.name = "MachineConflictError";
  }
}

export function errorMessage(err: unknown): string {
  return formatUnknown(err, "unknown error");
}
