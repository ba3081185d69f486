/**
 * Compat/Deps Resolver: looks up what a package declares at its maximum
 * version.
 *
 * Absence is not an error: a missing table, or a table with no entry for the
 * exact version, means there is nothing to check.
 */

import path from 'node:path';
import { loadCompressedTable, lookupVersion } from '../registry/compressed-table.js';
import type { PackageRecord } from '../registry/index-builder.js';
import type { RegistryStorage } from '../registry/storage.js';
import {
  CompressedCompatTable,
  CompressedDepsTable,
  type CompatValue,
} from '../schemas/registry.schema.js';

export const DEPS_FILE = 'Deps.toml';
export const COMPAT_FILE = 'Compat.toml';

/** dependency name → dependency uuid */
export type ResolvedDeps = Readonly<Record<string, string>>;

/** dependency name → compat bound(s) */
export type ResolvedCompat = Readonly<Record<string, CompatValue>>;

export interface ResolvedDeclarations {
  deps?: ResolvedDeps;
  compat?: ResolvedCompat;
}

export function resolveCompatAndDeps(record: PackageRecord, storage: RegistryStorage): ResolvedDeclarations {
  const depsTable = loadCompressedTable(
    storage,
    path.join(record.path, DEPS_FILE),
    CompressedDepsTable,
    record.listedVersions,
  );
  // Never declared any dependencies
  if (depsTable === null) return {};

  const deps = lookupVersion(depsTable, record.maxVersion);

  const compatTable = loadCompressedTable(
    storage,
    path.join(record.path, COMPAT_FILE),
    CompressedCompatTable,
    record.listedVersions,
  );
  const compat = compatTable === null ? undefined : lookupVersion(compatTable, record.maxVersion);

  return { deps, compat };
}
