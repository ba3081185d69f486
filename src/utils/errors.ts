import { logger } from './logger.js';

/**
 * Error taxonomy for the held-back engine.
 *
 * Structural faults and invariant violations always propagate to the caller;
 * the engine never returns a partial result.
 */

export const ErrorCodes = {
  REGISTRY_FORMAT: 'REGISTRY_FORMAT',
  COMPAT_PARSE: 'COMPAT_PARSE',
  REGISTRY_INVARIANT: 'REGISTRY_INVARIANT',
  CONFIG_ERROR: 'CONFIG_ERROR',
  HOST_API_ERROR: 'HOST_API_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class HoldbackError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HoldbackError';
    this.code = code;
    this.details = details;
  }
}

/** A registry file is present but malformed (missing fields, bad version keys). */
export class RegistryFormatError extends HoldbackError {
  constructor(filePath: string, reason: string, details?: Record<string, unknown>) {
    super(`Malformed registry file ${filePath}: ${reason}`, ErrorCodes.REGISTRY_FORMAT, {
      filePath,
      ...details,
    });
    this.name = 'RegistryFormatError';
  }
}

export class CompatParseError extends HoldbackError {
  constructor(expression: string, reason: string) {
    super(`Cannot parse compat bound "${expression}": ${reason}`, ErrorCodes.COMPAT_PARSE, {
      expression,
    });
    this.name = 'CompatParseError';
  }
}

/**
 * A dependency uuid referenced by a Deps table is absent from the index.
 * Unreachable for a consistent registry snapshot.
 */
export class RegistryInvariantError extends HoldbackError {
  constructor(holder: string, dependency: string, dependencyUuid: string) {
    super(
      `Package "${holder}" depends on "${dependency}" (${dependencyUuid}) which is not in the registry index`,
      ErrorCodes.REGISTRY_INVARIANT,
      { holder, dependency, dependencyUuid },
    );
    this.name = 'RegistryInvariantError';
  }
}

export class ConfigError extends HoldbackError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class HostApiError extends HoldbackError {
  constructor(status: number, url: string, body?: string) {
    const reason = body ? ` (${body})` : '';
    super(`Source host request failed with HTTP ${status}: ${url}${reason}`, ErrorCodes.HOST_API_ERROR, {
      status,
      url,
      body,
    });
    this.name = 'HostApiError';
  }
}

export interface CommandResult {
  success: boolean;
  error?: string;
}

/**
 * Convert any thrown value into a CommandResult, logging the details at debug level.
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof HoldbackError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return { success: false, error: error.message };
  }
  if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return { success: false, error: error.message };
  }
  logger.debug('Unknown error occurred', { error });
  return { success: false, error: 'An unknown error occurred' };
}

/**
 * Wrap a commander action so failures print one line to stderr and set exit code 1.
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void> | void,
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exitCode = 1;
    }
  };
}
