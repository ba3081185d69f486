/**
 * compat-holdback: find packages whose declared compat bounds hold back
 * the latest release of one of their dependencies.
 *
 * - `heldBackPackages()` maps each holder to the dependencies it holds back
 * - `heldBackBy("SomePkg")` lists the packages holding back SomePkg
 * - `heldBackBy("SomePkg", "2.0.0")` lists who would hold back an unreleased 2.0.0
 * - `findPackagesOnHost()` discovers the packages you can push to
 *
 * Pipeline: locate registries → build index → resolve deps/compat →
 * compute held-back map → invert / print.
 */

import { loadConfig } from './config/config.js';
import { parseVersion } from './compat/version.js';
import { loadBundledStdlibs, loadStdlibsFromDirectory } from './compat/stdlib.js';
import { buildRegistryIndex } from './registry/index-builder.js';
import { locateRegistries } from './registry/registry-locator.js';
import { FileSystemStorage, type RegistryStorage } from './registry/storage.js';
import type { ProspectiveVersions } from './registry/version-table.js';
import { computeHeldBack, type HoldMap } from './checker/held-back.js';
import { invertHoldMap } from './checker/held-back-by.js';
import { printHoldMap, type PrintOptions, type TextOutput } from './reporter/held-back-printer.js';
import { logger as defaultLogger, type Logger } from './utils/logger.js';
import { RegistryFormatError } from './utils/errors.js';

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

export const VERSION = '1.0.0';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface EngineOptions {
  /** Registry source directories, in precedence order (later wins). Defaults to configuration. */
  registries?: readonly string[];
  /** Injected storage, defaults to the local file system */
  storage?: RegistryStorage;
  /** Standard-library names excluded from the analysis */
  stdlibs?: ReadonlySet<string>;
  /** Environment used to load configuration */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export interface HeldBackOptions extends EngineOptions {
  /**
   * Unregistered versions to treat as released, keyed by package uuid or
   * name. Identifies packages whose compat would need a bump if the given
   * version were released.
   */
  newVersions?: ProspectiveVersions;
}

interface ResolvedEngine {
  registries: readonly string[];
  storage: RegistryStorage;
  stdlibs: ReadonlySet<string>;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Re-exports for consumer convenience
// ---------------------------------------------------------------------------

export type { HeldBack, HoldMap } from './checker/held-back.js';
export type { PackageRecord, RegistryIndex } from './registry/index-builder.js';
export type { RegistryStorage } from './registry/storage.js';
export type { ProspectiveVersions } from './registry/version-table.js';
export type { PrintOptions, TextOutput } from './reporter/held-back-printer.js';
export type { HostClient, HostRepository } from './host/github-client.js';
export type { Logger } from './utils/logger.js';
export { CompatSpec } from './compat/compat-spec.js';
export { FileSystemStorage } from './registry/storage.js';
export { buildRegistryIndex } from './registry/index-builder.js';
export { computeHeldBack, formatHeldBack } from './checker/held-back.js';
export { invertHoldMap } from './checker/held-back-by.js';
export { formatHoldMap } from './reporter/held-back-printer.js';
export { findPackagesOnHost, GitHubClient } from './host/github-client.js';
export { serializeHoldMap, deserializeReport, toHeldBackReport } from './utils/serializer.js';
export {
  HoldbackError,
  RegistryFormatError,
  CompatParseError,
  RegistryInvariantError,
  ConfigError,
  HostApiError,
} from './utils/errors.js';

// ---------------------------------------------------------------------------
// Engine wiring
// ---------------------------------------------------------------------------

function resolveEngine(options: EngineOptions): ResolvedEngine {
  const storage = options.storage ?? new FileSystemStorage();
  const logger = options.logger ?? defaultLogger;

  // Configuration is only consulted for what the caller did not supply
  const needsConfig = options.registries === undefined || options.stdlibs === undefined;
  const config = needsConfig ? loadConfig(options.env) : undefined;

  let registries = options.registries;
  if (registries === undefined && config) {
    registries =
      config.registries.length > 0 ? config.registries : locateRegistries(config.depotPaths, storage, logger);
  }

  let stdlibs = options.stdlibs;
  if (stdlibs === undefined) {
    stdlibs = config?.stdlibDir ? loadStdlibsFromDirectory(config.stdlibDir) : loadBundledStdlibs();
  }

  return { registries: registries ?? [], storage, stdlibs, logger };
}

// ---------------------------------------------------------------------------
// Query surface
// ---------------------------------------------------------------------------

/**
 * Map every holder package name to the dependencies it holds back.
 *
 * Each call re-reads registry storage; nothing is cached. Holders with no
 * violations are absent from the map.
 */
export function heldBackPackages(options: HeldBackOptions = {}): HoldMap {
  const engine = resolveEngine(options);
  if (engine.registries.length === 0) {
    engine.logger.warn('No registries found; the held-back map is empty');
  }

  const index = buildRegistryIndex(engine.registries, {
    storage: engine.storage,
    newVersions: options.newVersions,
    logger: engine.logger,
  });
  engine.logger.debug(`Registry index holds ${index.size} packages`);

  return computeHeldBack(index, {
    storage: engine.storage,
    stdlibs: engine.stdlibs,
    logger: engine.logger,
  });
}

/**
 * Packages holding back `name`, sorted and distinct.
 *
 * - no source: computes a fresh map from the registries
 * - a version string: computes a fresh map with `name` released at that version
 * - a HoldMap: inverts the given map without touching storage
 */
export function heldBackBy(name: string, source?: HoldMap | string, options: EngineOptions = {}): string[] {
  if (source instanceof Map) {
    return invertHoldMap(name, source);
  }
  if (source !== undefined && parseVersion(source) === null) {
    throw new RegistryFormatError(name, `unparsable prospective version "${source}"`);
  }
  const newVersions = source === undefined ? undefined : { [name]: source };
  return invertHoldMap(name, heldBackPackages({ ...options, newVersions }));
}

/**
 * Write the held-back report, one holder per line sorted by name.
 */
export function printHeldBack(
  output: TextOutput,
  holdMap?: HoldMap,
  options: PrintOptions & EngineOptions = {},
): void {
  printHoldMap(output, holdMap ?? heldBackPackages(options), options);
}
