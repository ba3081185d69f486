/**
 * Standard-library module names. These are shipped with the language
 * runtime rather than the registry, so they are never held back.
 */

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const StdlibList = z.array(z.string().min(1));

const BUNDLED_STDLIBS_URL = new URL('../../data/stdlibs.json', import.meta.url);

/**
 * Read the bundled list of standard-library names from `data/stdlibs.json`.
 */
export function loadBundledStdlibs(): ReadonlySet<string> {
  const raw: unknown = JSON.parse(fs.readFileSync(fileURLToPath(BUNDLED_STDLIBS_URL), 'utf-8'));
  return new Set(StdlibList.parse(raw));
}

/**
 * List standard-library names from a runtime's stdlib directory: one
 * subdirectory per module.
 */
export function loadStdlibsFromDirectory(dir: string): ReadonlySet<string> {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    throw new ConfigError(`Cannot read stdlib directory ${dir}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return new Set(entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name));
}
