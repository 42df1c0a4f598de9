import { z } from "zod";

export const CatalogAssetSchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
  size: z.number().int().nonnegative().optional(),
});

export const CatalogReleaseSchema = z.object({
  version: z.string().min(1),
  tag: z.string().optional(),
  release_date: z.string().default(""),
  notes: z.string().default(""),
  url: z.string().default(""),
  assets: z.array(CatalogAssetSchema).default([]),
});

export const FleetConfigSchema = z.object({
  devices: z.array(z.string().min(1)).default([]),
  components: z.array(z.string().min(1)).min(1).default(["os", "kernel", "bootloader"]),
  /** device -> component -> version believed installed before fleetfw managed it */
  seed: z.record(z.record(z.string())).default({}),
});

export const RegistryConfigSchema = z.object({
  kind: z.enum(["github", "catalog"]).default("github"),
  api_url: z.string().url().default("https://api.github.com"),
  token_env: z.string().default("FLEETFW_REGISTRY_TOKEN"),
  timeout_ms: z.number().int().positive().default(30000),
  max_attempts: z.number().int().positive().default(3),
  /** component -> owner/name */
  repos: z.record(z.string()).default({}),
  catalog: z.record(CatalogReleaseSchema).default({}),
});

export const InstallerConfigSchema = z.object({
  install_root: z.string().default(".fleetfw/installs"),
  download_timeout_ms: z.number().int().positive().default(600000),
  chunk_size: z.number().int().min(1024).default(65536),
});

export const UpdatePolicySchema = z.object({
  require_checksum: z.boolean().default(true),
  allow_downgrade: z.boolean().default(true),
  max_retry: z.number().int().nonnegative().default(0),
  max_concurrency: z.number().int().positive().default(2),
});

export const StateConfigSchema = z.object({
  db_path: z.string().default(".fleetfw/state.db"),
});

export const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  color: z.boolean().default(true),
});

export const ConfigSchema = z
  .object({
    fleet: FleetConfigSchema.default({}),
    registry: RegistryConfigSchema.default({}),
    installer: InstallerConfigSchema.default({}),
    policy: UpdatePolicySchema.default({}),
    state: StateConfigSchema.default({}),
    logging: LoggingSchema.default({}),
  })
  .superRefine((cfg, ctx) => {
    for (const device of Object.keys(cfg.fleet.seed)) {
      for (const component of Object.keys(cfg.fleet.seed[device] ?? {})) {
        if (!cfg.fleet.components.includes(component)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["fleet", "seed", device, component],
            message: `Unknown component "${component}"`,
          });
        }
      }
    }
  });

export type CatalogAsset = z.infer<typeof CatalogAssetSchema>;
export type CatalogRelease = z.infer<typeof CatalogReleaseSchema>;
export type FleetConfig = z.infer<typeof FleetConfigSchema>;
export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;
export type InstallerConfig = z.infer<typeof InstallerConfigSchema>;
export type UpdatePolicy = z.infer<typeof UpdatePolicySchema>;
export type StateConfig = z.infer<typeof StateConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
