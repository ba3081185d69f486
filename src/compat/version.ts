import semver from 'semver';
import type { SemVer } from 'semver';

/**
 * Parse a strict `major.minor.patch[-prerelease][+build]` version.
 * Returns null when the text is not a valid semantic version.
 */
export function parseVersion(text: string): SemVer | null {
  return semver.parse(text.trim());
}

/**
 * Total order over versions: semver precedence, with build metadata as a
 * final tie-breaker so that the maximum of a set is deterministic.
 */
export function compareVersions(a: SemVer, b: SemVer): number {
  return semver.compareBuild(a, b);
}

export function maxVersion(versions: Iterable<SemVer>): SemVer | null {
  let best: SemVer | null = null;
  for (const version of versions) {
    if (best === null || compareVersions(version, best) > 0) {
      best = version;
    }
  }
  return best;
}

export type { SemVer };
