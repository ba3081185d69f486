/**
 * Held-Back Computation: cross-references every package's declared compat
 * bounds against the latest live version of each dependency.
 */

import type { SemVer } from 'semver';
import { CompatSpec } from '../compat/compat-spec.js';
import type { RegistryIndex } from '../registry/index-builder.js';
import type { RegistryStorage } from '../registry/storage.js';
import { RegistryInvariantError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { resolveCompatAndDeps } from './compat-resolver.js';

/**
 * A dependency whose latest version is excluded by the holder's compat bound.
 */
export interface HeldBack {
  readonly name: string;
  readonly lastVersion: SemVer;
  readonly compat: CompatSpec;
}

/**
 * holder name → dependencies it holds back, in the order the holder's
 * dependency table lists them.
 */
export type HoldMap = Map<string, HeldBack[]>;

export interface ComputeHeldBackOptions {
  storage: RegistryStorage;
  stdlibs: ReadonlySet<string>;
  logger?: Logger;
}

export function makeHeldBack(name: string, lastVersion: SemVer, compat: CompatSpec): HeldBack {
  return Object.freeze({ name, lastVersion, compat });
}

/** `name@version {compat}` */
export function formatHeldBack(heldBack: HeldBack): string {
  return `${heldBack.name}@${heldBack.lastVersion.version} {${heldBack.compat.toString()}}`;
}

export function computeHeldBack(index: RegistryIndex, options: ComputeHeldBackOptions): HoldMap {
  const { storage, stdlibs, logger = defaultLogger } = options;
  const holdMap: HoldMap = new Map();

  for (const holder of index.values()) {
    const { deps, compat } = resolveCompatAndDeps(holder, storage);
    if (deps === undefined || compat === undefined) {
      logger.debug(`No deps/compat data for ${holder.name}@${holder.maxVersion.version}`);
      continue;
    }

    const heldBack: HeldBack[] = [];
    for (const [depName, depUuid] of Object.entries(deps)) {
      if (stdlibs.has(depName)) continue;

      const bound = compat[depName];
      // No bound declared
      if (bound === undefined) continue;

      const spec = CompatSpec.parse(bound);
      const dependency = index.get(depUuid.toLowerCase());
      if (dependency === undefined) {
        throw new RegistryInvariantError(holder.name, depName, depUuid);
      }

      if (!spec.satisfies(dependency.maxVersion)) {
        heldBack.push(makeHeldBack(depName, dependency.maxVersion, spec));
      }
    }

    if (heldBack.length > 0) {
      holdMap.set(holder.name, heldBack);
    }
  }

  return holdMap;
}
