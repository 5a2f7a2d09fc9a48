import { z } from "zod";

export const RootVolumeSchema = z
  .object({
    sourceUUID: z.string().trim().min(1).optional(),
    volumeType: z.string().trim().min(1).optional(),
    diskSize: z.number().int().positive(),
  })
  .strict();

export const UserDataSecretRefSchema = z
  .object({
    name: z.string().trim().default(""),
    namespace: z.string().trim().default(""),
  })
  .strict();

export const NetworkParamSchema = z
  .object({
    uuid: z.string().trim().min(1).optional(),
    fixedIP: z.string().trim().min(1).optional(),
  })
  .strict();

export const OpenstackProviderSpecSchema = z
  .object({
    apiVersion: z.string().trim().optional(),
    kind: z.literal("OpenstackProviderSpec").optional(),
    image: z.string().trim().min(1),
    flavor: z.string().trim().min(1),
    availabilityZone: z.string().trim().optional().default(""),
    keyName: z.string().trim().optional().default(""),
    rootVolume: RootVolumeSchema.optional(),
    floatingIP: z.string().trim().optional().default(""),
    userDataSecret: UserDataSecretRefSchema.optional(),
    networks: z.array(NetworkParamSchema).optional().default([]),
    securityGroups: z.array(z.string().trim().min(1)).optional().default([]),
    serverMetadata: z.record(z.string()).optional().default({}),
    tags: z.array(z.string().trim().min(1)).optional().default([]),
  })
  .strict();

export type OpenstackProviderSpec = z.infer<typeof OpenstackProviderSpecSchema>;

export type ProviderSpecDecodeResult =
  | { ok: true; spec: OpenstackProviderSpec }
  | { ok: false; error: string };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Decodes the opaque providerSpec blob of a machine. Unknown fields are rejected so a
 * typo in the record never silently falls back to a default.
 */
export function decodeProviderSpec(raw: unknown): ProviderSpecDecodeResult {
  if (raw == null) return { ok: false, error: "providerSpec is missing" };
  const parsed = OpenstackProviderSpecSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, error: formatIssues(parsed.error) };
  return { ok: true, spec: parsed.data };
}
