export function coerceString(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  return "";
}

export function coerceTrimmedString(value: unknown): string {
  return coerceString(value).trim();
}

export function formatUnknown(value: unknown, fallback = ""): string {
  if (value instanceof Error) {
    const msg = value.message.trim();
    if (msg) return msg;
  }
  const primitive = coerceTrimmedString(value);
  if (primitive) return primitive;
  try {
    const encoded = JSON.stringify(value);
    if (typeof encoded === "string" && encoded !== "{}" && encoded !== "[]") return encoded;
  } catch {
    // Circular or non-serializable values fall through to the fallback.
  }
  return fallback;
}

// Escapes a literal for use inside a RegExp source (OpenStack name filters are regexes).
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function nonEmptyRecord(value: Record<string, string> | undefined | null): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value || {})) {
    const key = coerceTrimmedString(k);
    if (!key) continue;
    out[key] = coerceString(v);
  }
  return out;
}
