/**
 * Registry Index Builder: enumerates every package of every registry
 * source and records its maximum live version.
 */

import path from 'node:path';
import type { SemVer } from 'semver';
import { RegistryManifest, describeIssues } from '../schemas/registry.schema.js';
import { RegistryFormatError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { readTomlFile, type RegistryStorage } from './storage.js';
import {
  readVersionTable,
  resolveProspectiveVersion,
  withProspectiveVersion,
  maxLiveVersion,
  type ProspectiveVersions,
} from './version-table.js';

export const REGISTRY_MANIFEST_FILE = 'Registry.toml';

export interface PackageRecord {
  readonly uuid: string;
  readonly name: string;
  /** Absolute directory holding the package's registry files */
  readonly path: string;
  readonly maxVersion: SemVer;
  /** Every version listed in `Versions.toml`, yanked included */
  readonly listedVersions: readonly SemVer[];
}

/** uuid → PackageRecord */
export type RegistryIndex = ReadonlyMap<string, PackageRecord>;

export interface BuildIndexOptions {
  storage: RegistryStorage;
  newVersions?: ProspectiveVersions;
  logger?: Logger;
}

interface ManifestPackage {
  uuid: string;
  name: string;
  path: string;
}

export function readRegistryManifest(storage: RegistryStorage, registryPath: string): ManifestPackage[] {
  const filePath = path.join(registryPath, REGISTRY_MANIFEST_FILE);
  const raw = readTomlFile(storage, filePath);
  if (raw === null) {
    throw new RegistryFormatError(filePath, 'file is missing');
  }

  const parsed = RegistryManifest.safeParse(raw);
  if (!parsed.success) {
    throw new RegistryFormatError(filePath, describeIssues(parsed.error));
  }

  return Object.entries(parsed.data.packages).map(([uuid, entry]) => ({
    uuid: uuid.toLowerCase(),
    name: entry.name,
    path: path.join(registryPath, entry.path),
  }));
}

/**
 * Build the uuid → PackageRecord index.
 *
 * Sources are read in the order given. When two sources declare the same
 * uuid the later source wins.
 */
export function buildRegistryIndex(
  registryPaths: readonly string[],
  options: BuildIndexOptions,
): RegistryIndex {
  const { storage, newVersions = {}, logger = defaultLogger } = options;
  const index = new Map<string, PackageRecord>();

  for (const registryPath of registryPaths) {
    const packages = readRegistryManifest(storage, registryPath);
    logger.debug(`Indexing ${packages.length} packages from ${registryPath}`);

    for (const pkg of packages) {
      const table = readVersionTable(storage, pkg.path);
      const prospective = resolveProspectiveVersion(newVersions, pkg.uuid, pkg.name);
      const entries = withProspectiveVersion(table.live, prospective, pkg.path);
      const maxVersion = maxLiveVersion(entries);
      if (maxVersion === null) {
        throw new RegistryFormatError(pkg.path, `package "${pkg.name}" has no live versions`);
      }

      const previous = index.get(pkg.uuid);
      if (previous) {
        logger.warn(`Package ${pkg.name} (${pkg.uuid}) from ${registryPath} supersedes ${previous.path}`);
      }

      index.set(pkg.uuid, {
        uuid: pkg.uuid,
        name: pkg.name,
        path: pkg.path,
        maxVersion,
        listedVersions: table.listed,
      });
    }
  }

  return index;
}
