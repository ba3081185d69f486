/**
 * Version Table Loader: reads a package's `Versions.toml` and derives its
 * live version set.
 */

import path from 'node:path';
import type { SemVer } from 'semver';
import { parseVersion, maxVersion } from '../compat/version.js';
import { VersionsFile, describeIssues } from '../schemas/registry.schema.js';
import { RegistryFormatError } from '../utils/errors.js';
import { readTomlFile, type RegistryStorage } from './storage.js';

export const VERSIONS_FILE = 'Versions.toml';

/** Tree hash given to an injected prospective version. */
export const PROSPECTIVE_TREE_HASH = '0'.repeat(40);

export interface VersionEntry {
  version: SemVer;
  treeHash: string;
}

export interface VersionTable {
  /** Every listed version, yanked ones included, in file order */
  listed: SemVer[];
  /** Non-yanked versions only */
  live: VersionEntry[];
}

/**
 * Prospective versions keyed by package uuid or package name.
 */
export type ProspectiveVersions = Readonly<Record<string, string>>;

export function readVersionTable(storage: RegistryStorage, packagePath: string): VersionTable {
  const filePath = path.join(packagePath, VERSIONS_FILE);
  const raw = readTomlFile(storage, filePath);
  if (raw === null) {
    throw new RegistryFormatError(filePath, 'file is missing');
  }

  const parsed = VersionsFile.safeParse(raw);
  if (!parsed.success) {
    throw new RegistryFormatError(filePath, describeIssues(parsed.error));
  }

  const table: VersionTable = { listed: [], live: [] };
  for (const [key, info] of Object.entries(parsed.data)) {
    const version = parseVersion(key);
    if (version === null) {
      throw new RegistryFormatError(filePath, `unparsable version "${key}"`);
    }
    table.listed.push(version);
    if (!info.yanked) {
      table.live.push({ version, treeHash: info['git-tree-sha1'] });
    }
  }
  return table;
}

/**
 * Find the prospective version for a package: by uuid first, then by name.
 */
export function resolveProspectiveVersion(
  overrides: ProspectiveVersions,
  uuid: string,
  name: string,
): string | undefined {
  if (Object.hasOwn(overrides, uuid)) return overrides[uuid];
  if (Object.hasOwn(overrides, name)) return overrides[name];
  return undefined;
}

/**
 * Live entries plus, when given, a synthetic entry for the prospective version.
 */
export function withProspectiveVersion(
  live: readonly VersionEntry[],
  prospective: string | undefined,
  context: string,
): VersionEntry[] {
  if (prospective === undefined) return [...live];
  const version = parseVersion(prospective);
  if (version === null) {
    throw new RegistryFormatError(context, `unparsable prospective version "${prospective}"`);
  }
  return [...live, { version, treeHash: PROSPECTIVE_TREE_HASH }];
}

export function maxLiveVersion(entries: readonly VersionEntry[]): SemVer | null {
  return maxVersion(entries.map((entry) => entry.version));
}
