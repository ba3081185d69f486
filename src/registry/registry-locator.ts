import path from 'node:path';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { REGISTRY_MANIFEST_FILE } from './index-builder.js';
import type { RegistryStorage } from './storage.js';

/**
 * Find installed registry sources: every `<depot>/registries/<name>`
 * directory that holds a `Registry.toml`.
 *
 * Depots are visited in the order given and registries within a depot in
 * name order, so the result (and therefore index precedence) is stable.
 */
export function locateRegistries(
  depotPaths: readonly string[],
  storage: RegistryStorage,
  logger: Logger = defaultLogger,
): string[] {
  const found: string[] = [];
  const seen = new Set<string>();

  for (const depot of depotPaths) {
    const registriesDir = path.join(depot, 'registries');
    const names = storage.listDirectories(registriesDir).sort();

    for (const name of names) {
      const registryPath = path.join(registriesDir, name);
      if (seen.has(registryPath)) continue;
      if (storage.readFile(path.join(registryPath, REGISTRY_MANIFEST_FILE)) === null) {
        logger.debug(`Skipping ${registryPath}: no ${REGISTRY_MANIFEST_FILE}`);
        continue;
      }
      seen.add(registryPath);
      found.push(registryPath);
    }
  }

  return found;
}
