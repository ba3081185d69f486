/**
 * Configuration: read from the environment and validated with zod.
 *
 * | Setting     | Variable                                   |
 * |-------------|--------------------------------------------|
 * | registries  | HOLDBACK_REGISTRIES (path-delimited)       |
 * | depotPaths  | JULIA_DEPOT_PATH (path-delimited), ~/.julia |
 * | stdlibDir   | HOLDBACK_STDLIB_DIR                        |
 * | hostToken   | GITHUB_AUTH                                |
 *
 * The log level (HOLDBACK_LOG_LEVEL, HOLDBACK_VERBOSE=1) is read by the
 * logger itself.
 */

import os from 'node:os';
import path from 'node:path';
import { ZodError } from 'zod';
import { HoldbackConfig } from '../schemas/config.schema.js';
import { describeIssues } from '../schemas/registry.schema.js';
import { ConfigError } from '../utils/errors.js';

export const HOST_TOKEN_ENV = 'GITHUB_AUTH';

function splitPathList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function defaultDepotPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.julia');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HoldbackConfig {
  const depotPaths = splitPathList(env.JULIA_DEPOT_PATH);

  const candidate = {
    registries: splitPathList(env.HOLDBACK_REGISTRIES),
    depotPaths: depotPaths.length > 0 ? depotPaths : [defaultDepotPath()],
    stdlibDir: env.HOLDBACK_STDLIB_DIR || undefined,
    hostToken: env[HOST_TOKEN_ENV] || undefined,
  };

  try {
    return HoldbackConfig.parse(candidate);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(`Invalid configuration: ${describeIssues(err)}`, { issues: err.errors });
    }
    throw err;
  }
}
