import type { NodeAddress, NodeAddressType } from "../machine/types.js";
import { InstanceAddressSchema, type Instance } from "./types.js";

const SUPPORTED_IP_VERSION = 4;

export type AddressSkip = { address: string; reason: string };

/**
 * Maps the per-network interface lists reported by the compute API onto node
 * addresses. Only IPv4 is reported; floating interfaces become ExternalIP and fixed
 * ones InternalIP. Anything else is skipped, never treated as an error.
 */
export function getNodeAddressesFromInstance(
  instance: Instance,
  onSkip?: (skip: AddressSkip) => void,
): NodeAddress[] {
  const out: NodeAddress[] = [];

  for (const [network, interfaces] of Object.entries(instance.addresses)) {
    for (const raw of interfaces) {
      const parsed = InstanceAddressSchema.safeParse(raw);
      if (!parsed.success) {
        throw new Error(`malformed address on network ${network} for instance ${instance.id}`);
      }
      const address = parsed.data;

      if (address.version !== SUPPORTED_IP_VERSION) {
        onSkip?.({ address: address.addr, reason: `IPv${address.version} not supported` });
        continue;
      }

      let type: NodeAddressType;
      switch (address["OS-EXT-IPS:type"]) {
        case "floating":
          type = "ExternalIP";
          break;
        case "fixed":
          type = "InternalIP";
          break;
        default:
          onSkip?.({ address: address.addr, reason: `unknown address type '${address["OS-EXT-IPS:type"] ?? ""}'` });
          continue;
      }

      out.push({ type, address: address.addr });
    }
  }

  return out;
}

export function buildMachineAddresses(instance: Instance, machineName: string, onSkip?: (skip: AddressSkip) => void): NodeAddress[] {
  return [
    ...getNodeAddressesFromInstance(instance, onSkip),
    { type: "Hostname", address: machineName },
    { type: "InternalDNS", address: machineName },
  ];
}

// Order-sensitive structural equality.
export function nodeAddressesEqual(a: readonly NodeAddress[], b: readonly NodeAddress[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((entry, i) => {
    const other = b[i];
    return other !== undefined && entry.type === other.type && entry.address === other.address;
  });
}
