import { z } from "zod";

// DNS-1123 subdomain, the naming rule for machine and secret records.
const DNS_SUBDOMAIN_RE = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;
const DNS_LABEL_RE = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const LABEL_VALUE_RE = /^(([A-Za-z0-9][-A-Za-z0-9_.]*)?[A-Za-z0-9])?$/;
const QUALIFIED_NAME_RE = /^([A-Za-z0-9][-A-Za-z0-9_.]*)?[A-Za-z0-9]$/;

export const MachineNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(253)
  .refine((v) => DNS_SUBDOMAIN_RE.test(v), { message: "invalid machine name (use a DNS-1123 subdomain)" });

export const NamespaceSchema = z
  .string()
  .trim()
  .min(1)
  .max(63)
  .refine((v) => DNS_LABEL_RE.test(v), { message: "invalid namespace (use a DNS-1123 label)" });

export const LabelValueSchema = z
  .string()
  .max(63)
  .refine((v) => LABEL_VALUE_RE.test(v), { message: "invalid label value" });

export const LabelKeySchema = z
  .string()
  .trim()
  .min(1)
  .refine(
    (v) => {
      const slash = v.lastIndexOf("/");
      const prefix = slash >= 0 ? v.slice(0, slash) : "";
      const name = slash >= 0 ? v.slice(slash + 1) : v;
      if (prefix && (prefix.length > 253 || !DNS_SUBDOMAIN_RE.test(prefix))) return false;
      return name.length <= 63 && QUALIFIED_NAME_RE.test(name);
    },
    { message: "invalid label key" },
  );
