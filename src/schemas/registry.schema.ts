import { z } from 'zod';

/** Canonical 8-4-4-4-12 hexadecimal package identity. */
export const PackageUuid = z
  .string()
  .regex(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i, 'invalid package uuid');

export type PackageUuid = z.infer<typeof PackageUuid>;

export const RegistryManifestEntry = z.object({
  name: z.string().min(1),
  /** Relative to the registry root */
  path: z.string().min(1),
});

export type RegistryManifestEntry = z.infer<typeof RegistryManifestEntry>;

/**
 * Top-level `Registry.toml`. Only `packages` is required; the remaining
 * keys describe the registry itself.
 */
export const RegistryManifest = z.object({
  name: z.string().optional(),
  uuid: PackageUuid.optional(),
  repo: z.string().optional(),
  description: z.string().optional(),
  packages: z.record(PackageUuid, RegistryManifestEntry),
});

export type RegistryManifest = z.infer<typeof RegistryManifest>;

/** One entry of a package's `Versions.toml`, keyed by version string. */
export const VersionInfo = z.object({
  'git-tree-sha1': z.string().regex(/^[0-9a-f]{40}$/i, 'invalid tree hash'),
  yanked: z.boolean().default(false),
});

export type VersionInfo = z.infer<typeof VersionInfo>;

export const VersionsFile = z.record(z.string(), VersionInfo);

export type VersionsFile = z.infer<typeof VersionsFile>;

/**
 * `Deps.toml`: version range → dependency name → dependency uuid.
 */
export const CompressedDepsTable = z.record(z.string(), z.record(z.string(), PackageUuid));

export type CompressedDepsTable = z.infer<typeof CompressedDepsTable>;

/**
 * `Compat.toml`: version range → dependency name → compat bound(s).
 */
export const CompatValue = z.union([z.string(), z.array(z.string())]);

export type CompatValue = z.infer<typeof CompatValue>;

export const CompressedCompatTable = z.record(z.string(), z.record(z.string(), CompatValue));

export type CompressedCompatTable = z.infer<typeof CompressedCompatTable>;

/**
 * Format zod issues as `path: message` fragments for error messages.
 */
export function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
