/**
 * Version-range-compressed tables (`Deps.toml`, `Compat.toml`).
 *
 * On disk each table maps a version range to a set of entries. Expanding it
 * against the package's listed versions yields one merged mapping per
 * version; the engine only ever asks for a single exact version.
 */

import type { z } from 'zod';
import type { SemVer } from 'semver';
import { CompatSpec } from '../compat/compat-spec.js';
import { describeIssues } from '../schemas/registry.schema.js';
import { CompatParseError, RegistryFormatError } from '../utils/errors.js';
import { readTomlFile, type RegistryStorage } from './storage.js';

export type CompressedTable<T> = Record<string, Record<string, T>>;

/** Per-version mapping keyed by {@link versionKey}. */
export type VersionKeyedTable<T> = ReadonlyMap<string, Readonly<Record<string, T>>>;

export function versionKey(version: SemVer): string {
  return version.build.length > 0 ? `${version.version}+${version.build.join('.')}` : version.version;
}

export function decompressTable<T>(
  table: CompressedTable<T>,
  versions: readonly SemVer[],
  filePath: string,
): VersionKeyedTable<T> {
  const expanded = new Map<string, Record<string, T>>();

  for (const [rangeKey, entries] of Object.entries(table)) {
    let range: CompatSpec;
    try {
      range = CompatSpec.parse(rangeKey);
    } catch (err) {
      if (err instanceof CompatParseError) {
        throw new RegistryFormatError(filePath, `invalid version range key "${rangeKey}"`);
      }
      throw err;
    }

    for (const version of versions) {
      if (!range.satisfies(version)) continue;
      const key = versionKey(version);
      expanded.set(key, { ...expanded.get(key), ...entries });
    }
  }

  return expanded;
}

export function lookupVersion<T>(
  table: VersionKeyedTable<T>,
  version: SemVer,
): Readonly<Record<string, T>> | undefined {
  return table.get(versionKey(version));
}

/**
 * Read, validate and expand a compressed table. Returns null when the file
 * does not exist.
 */
export function loadCompressedTable<T>(
  storage: RegistryStorage,
  filePath: string,
  schema: z.ZodType<CompressedTable<T>, z.ZodTypeDef, unknown>,
  versions: readonly SemVer[],
): VersionKeyedTable<T> | null {
  const raw = readTomlFile(storage, filePath);
  if (raw === null) return null;

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new RegistryFormatError(filePath, describeIssues(parsed.error));
  }
  return decompressTable(parsed.data, versions, filePath);
}
