import YAML from "yaml";
import { z } from "zod";

export const IGNITION_SPEC_VERSION = "2.2.0";

const FileContentsSchema = z
  .object({
    inline: z.string().optional(),
    remote: z
      .object({
        url: z.string().trim().min(1),
        verification: z.object({ hash: z.string().trim().min(1) }).strict().optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .refine((c) => (c.inline === undefined) !== (c.remote === undefined), {
    message: "exactly one of inline or remote is required",
  });

const OwnerSchema = z
  .object({
    id: z.number().int().nonnegative().optional(),
    name: z.string().trim().min(1).optional(),
  })
  .strict();

const FileSchema = z
  .object({
    path: z.string().trim().startsWith("/"),
    filesystem: z.string().trim().min(1).default("root"),
    mode: z.number().int().min(0).max(0o7777).optional(),
    overwrite: z.boolean().optional(),
    append: z.boolean().optional(),
    contents: FileContentsSchema.optional(),
    user: OwnerSchema.optional(),
    group: OwnerSchema.optional(),
  })
  .strict();

const DirectorySchema = z
  .object({
    path: z.string().trim().startsWith("/"),
    filesystem: z.string().trim().min(1).default("root"),
    mode: z.number().int().min(0).max(0o7777).optional(),
    user: OwnerSchema.optional(),
    group: OwnerSchema.optional(),
  })
  .strict();

const LinkSchema = z
  .object({
    path: z.string().trim().startsWith("/"),
    filesystem: z.string().trim().min(1).default("root"),
    target: z.string().trim().min(1),
    hard: z.boolean().optional(),
  })
  .strict();

const UnitSchema = z
  .object({
    name: z.string().trim().min(1),
    enable: z.boolean().optional(),
    enabled: z.boolean().optional(),
    mask: z.boolean().optional(),
    contents: z.string().optional(),
    dropins: z.array(z.object({ name: z.string().trim().min(1), contents: z.string() }).strict()).optional(),
  })
  .strict();

const NetworkdUnitSchema = z.object({ name: z.string().trim().min(1), contents: z.string() }).strict();

const UserSchema = z
  .object({
    name: z.string().trim().min(1),
    password_hash: z.string().optional(),
    ssh_authorized_keys: z.array(z.string().trim().min(1)).optional(),
    groups: z.array(z.string().trim().min(1)).optional(),
    home_dir: z.string().optional(),
    shell: z.string().optional(),
    uid: z.number().int().nonnegative().optional(),
  })
  .strict();

const GroupSchema = z
  .object({
    name: z.string().trim().min(1),
    gid: z.number().int().nonnegative().optional(),
  })
  .strict();

export const ContainerLinuxConfigSchema = z
  .object({
    storage: z
      .object({
        files: z.array(FileSchema).optional(),
        directories: z.array(DirectorySchema).optional(),
        links: z.array(LinkSchema).optional(),
      })
      .strict()
      .optional(),
    systemd: z.object({ units: z.array(UnitSchema).optional() }).strict().optional(),
    networkd: z.object({ units: z.array(NetworkdUnitSchema).optional() }).strict().optional(),
    passwd: z
      .object({
        users: z.array(UserSchema).optional(),
        groups: z.array(GroupSchema).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ContainerLinuxConfig = z.infer<typeof ContainerLinuxConfigSchema>;

export type IgnitionConfig = {
  ignition: { version: string; config: Record<string, never> };
  storage: {
    files?: unknown[];
    directories?: unknown[];
    links?: unknown[];
  };
  systemd: { units?: unknown[] };
  networkd: { units?: unknown[] };
  passwd: { users?: unknown[]; groups?: unknown[] };
};

export class ContainerLinuxConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`container linux config invalid: ${issues.join("; ")}`);
    this.name = "ContainerLinuxConfigError";
    this.issues = issues;
  }
}

export function toDataUrl(text: string): string {
  return `data:,${encodeURIComponent(text)}`;
}

function convertOwner(owner: z.infer<typeof OwnerSchema> | undefined): Record<string, unknown> | undefined {
  if (!owner) return undefined;
  return {
    ...(owner.id !== undefined ? { id: owner.id } : {}),
    ...(owner.name ? { name: owner.name } : {}),
  };
}

function compact(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

function convert(cfg: ContainerLinuxConfig): IgnitionConfig {
  const files = (cfg.storage?.files ?? []).map((f) =>
    compact({
      filesystem: f.filesystem,
      path: f.path,
      mode: f.mode,
      overwrite: f.overwrite,
      append: f.append,
      user: convertOwner(f.user),
      group: convertOwner(f.group),
      contents: f.contents
        ? compact({
            source: f.contents.remote ? f.contents.remote.url : toDataUrl(f.contents.inline ?? ""),
            verification: f.contents.remote?.verification ? { hash: f.contents.remote.verification.hash } : {},
          })
        : undefined,
    }),
  );

  const directories = (cfg.storage?.directories ?? []).map((d) =>
    compact({
      filesystem: d.filesystem,
      path: d.path,
      mode: d.mode,
      user: convertOwner(d.user),
      group: convertOwner(d.group),
    }),
  );

  const links = (cfg.storage?.links ?? []).map((l) =>
    compact({ filesystem: l.filesystem, path: l.path, target: l.target, hard: l.hard }),
  );

  const units = (cfg.systemd?.units ?? []).map((u) =>
    compact({
      name: u.name,
      enabled: u.enabled ?? u.enable,
      mask: u.mask,
      contents: u.contents,
      dropins: u.dropins?.map((d) => ({ name: d.name, contents: d.contents })),
    }),
  );

  const networkdUnits = (cfg.networkd?.units ?? []).map((u) => ({ name: u.name, contents: u.contents }));

  const users = (cfg.passwd?.users ?? []).map((u) =>
    compact({
      name: u.name,
      passwordHash: u.password_hash,
      sshAuthorizedKeys: u.ssh_authorized_keys,
      groups: u.groups,
      homeDir: u.home_dir,
      shell: u.shell,
      uid: u.uid,
    }),
  );

  const groups = (cfg.passwd?.groups ?? []).map((g) => compact({ name: g.name, gid: g.gid }));

  return {
    ignition: { version: IGNITION_SPEC_VERSION, config: {} },
    storage: {
      ...(files.length > 0 ? { files } : {}),
      ...(directories.length > 0 ? { directories } : {}),
      ...(links.length > 0 ? { links } : {}),
    },
    systemd: units.length > 0 ? { units } : {},
    networkd: networkdUnits.length > 0 ? { units: networkdUnits } : {},
    passwd: {
      ...(users.length > 0 ? { users } : {}),
      ...(groups.length > 0 ? { groups } : {}),
    },
  };
}

/**
 * Transpiles a Container Linux Config (YAML) into an Ignition config. Unknown keys
 * and YAML errors are reported together as a ContainerLinuxConfigError.
 */
export function transpileContainerLinuxConfig(source: string): IgnitionConfig {
  // YAML 1.1 so that `mode: 0644` reads as octal.
  const doc = YAML.parseDocument(source, { version: "1.1", prettyErrors: false });
  if (doc.errors.length > 0) {
    throw new ContainerLinuxConfigError(doc.errors.map((e) => e.message));
  }
  const raw: unknown = doc.toJS() ?? {};
  const parsed = ContainerLinuxConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ContainerLinuxConfigError(
      parsed.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`),
    );
  }
  return convert(parsed.data);
}
