/**
 * Registry storage: synchronous, read-only access to registry files.
 *
 * Injectable for testability: the real implementation reads the local file
 * system, tests supply an in-memory stand-in.
 */

import fs from 'node:fs';
import { parse as parseToml, TomlError } from 'smol-toml';
import { RegistryFormatError } from '../utils/errors.js';

export interface RegistryStorage {
  /** File contents, or null when the file does not exist. */
  readFile(filePath: string): string | null;
  /** Names of the immediate subdirectories, or an empty array when the directory is missing. */
  listDirectories(dirPath: string): string[];
}

export class FileSystemStorage implements RegistryStorage {
  readFile(filePath: string): string | null {
    try {
      return fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      if (isMissingFileError(err)) return null;
      throw err;
    }
  }

  listDirectories(dirPath: string): string[] {
    try {
      return fs
        .readdirSync(dirPath, { withFileTypes: true })
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name);
    } catch (err) {
      if (isMissingFileError(err)) return [];
      throw err;
    }
  }
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Read and decode a TOML file. Returns null when the file is absent; a file
 * that exists but does not decode is a structural fault.
 */
export function readTomlFile(storage: RegistryStorage, filePath: string): Record<string, unknown> | null {
  const text = storage.readFile(filePath);
  if (text === null) return null;
  try {
    return parseToml(text);
  } catch (err) {
    const reason = err instanceof TomlError ? err.message : String(err);
    throw new RegistryFormatError(filePath, `invalid TOML (${reason})`);
  }
}
