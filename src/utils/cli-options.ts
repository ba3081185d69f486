import { InvalidArgumentError } from 'commander';

/**
 * Parse repeated `name=version` pairs into a prospective-version map.
 * A later pair for the same package replaces an earlier one.
 */
export function parseNewVersions(pairs: readonly string[]): Record<string, string> {
  const versions: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const name = pair.slice(0, separator).trim();
    const version = pair.slice(separator + 1).trim();
    if (separator < 0 || name === '' || version === '') {
      throw new InvalidArgumentError(`Expected <package>=<version>, got "${pair}"`);
    }
    versions[name] = version;
  }
  return versions;
}

/** Commander reducer for repeatable options. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
