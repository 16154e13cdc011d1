import { z } from "zod";

// Ignore config file: a list of pattern strings, or { patterns: [...] }
export const IgnorePatternListSchema = z.array(z.string());
export const IgnoreConfigSchema = z.union([
  IgnorePatternListSchema,
  z.object({ patterns: IgnorePatternListSchema }),
]);
export type IgnoreConfig = z.infer<typeof IgnoreConfigSchema>;

// Options of one sync run, after merging profile and CLI flags.
// Numbers are coerced because commander hands flags over as strings.
export const SyncOptionsSchema = z.object({
  sourceRegistry: z.string().trim().min(1, "Source registry is required"),
  targetRegistry: z.string().trim().min(1, "Target registry is required"),
  sourceSubscription: z.string().trim().min(1).optional(),
  targetSubscription: z.string().trim().min(1).optional(),
  repository: z.string().trim().min(1).optional(),
  letters: z.string().optional(),
  ignorePatterns: z.array(z.string()).default([]),
  ignoreConfig: z.string().optional(),
  maxRepositories: z.coerce.number().int().min(0).default(0),
  delaySeconds: z.coerce.number().min(0).default(0),
  concurrency: z.coerce.number().int().min(1).default(1),
  repositoryWorkers: z.coerce.number().int().min(1).default(4),
  dryRun: z.boolean().default(false),
  force: z.boolean().default(false),
});
export type SyncOptionsInput = z.input<typeof SyncOptionsSchema>;
export type SyncOptions = z.infer<typeof SyncOptionsSchema>;

// Profile file (regsync.yaml) - any subset of the run options
export const SyncProfileSchema = SyncOptionsSchema.partial().strict();
export type SyncProfile = z.infer<typeof SyncProfileSchema>;

// `az acr repository list --output json`
export const AzRepositoryListSchema = z.array(z.string());

// `az acr repository show-tags --detail --output json`
// Tags without a manifest come back without a digest and are dropped.
export const AzTagDetailListSchema = z.array(
  z
    .object({
      name: z.string(),
      digest: z.string().optional(),
    })
    .passthrough()
);
export type AzTagDetail = z.infer<typeof AzTagDetailListSchema>[number];

// GET /v2/_catalog
export const OciCatalogSchema = z.object({
  repositories: z.array(z.string()).nullable().default([]),
});

// GET /v2/<name>/tags/list
export const OciTagsListSchema = z.object({
  name: z.string(),
  tags: z.array(z.string()).nullable().default([]),
});

// Token endpoint response (Docker token auth spec allows either field)
export const OciTokenResponseSchema = z.object({
  token: z.string().optional(),
  access_token: z.string().optional(),
});

// `az acr show --query "{loginServer: loginServer, id: id}" --output json`
export const AzRegistryShowSchema = z.object({
  loginServer: z.string(),
  id: z.string(),
});
