/**
 * CompatSpec: a version predicate parsed from a registry compat expression.
 *
 * Accepted item forms (each item is one range; a list of items is a union):
 *
 * - range notation used by registry tables: `1`, `1.2`, `0.5-0.7`, `1.2.3-1`, `*`
 * - caret / tilde: `^1.2`, `~1.2.3`
 * - inequalities: `>= 1.2`, `< 2`, `≥ 1`, `= 1.2.3`
 * - wildcards: `1.*`, `1.x`
 *
 * A string may hold several comma-separated items; a table may also store
 * an array of items. Both are unions.
 *
 * Matching follows semver precedence with prereleases taken into account:
 * `2.0.0-rc.1` sorts below `2.0.0` and therefore falls outside `1`, while
 * `1.4.0-beta` falls inside it.
 */

import semver, { Range } from 'semver';
import type { SemVer } from 'semver';
import { CompatParseError } from '../utils/errors.js';

export type CompatExpression = string | readonly string[];

const RANGE_OPTIONS = { includePrerelease: true } as const;

const PARTIAL_VERSION = String.raw`\d+(?:\.\d+){0,2}`;
const HYPHEN_RANGE = new RegExp(`^(${PARTIAL_VERSION})\\s*-\\s*(${PARTIAL_VERSION}|\\*)$`);
const UNICODE_OPERATORS: ReadonlyArray<[RegExp, string]> = [
  [/≥/g, '>='],
  [/≤/g, '<='],
];

/**
 * Translate one compat item into the equivalent node-semver range string.
 */
export function toSemverRange(item: string): string {
  let text = item.trim();
  if (text === '') {
    throw new CompatParseError(item, 'empty range');
  }
  for (const [pattern, replacement] of UNICODE_OPERATORS) {
    text = text.replace(pattern, replacement);
  }

  // `1.2.3-1` would otherwise read as a prerelease version
  const hyphen = HYPHEN_RANGE.exec(text);
  if (hyphen) {
    const [, lower, upper] = hyphen;
    return upper === '*' ? `>=${lower}` : `${lower} - ${upper}`;
  }

  const range = semver.validRange(text, RANGE_OPTIONS);
  if (range === null) {
    throw new CompatParseError(item, 'not a recognised version range');
  }
  return text;
}

function splitItems(expression: CompatExpression): string[] {
  const items = typeof expression === 'string' ? expression.split(',') : [...expression];
  return items.map((item) => item.trim());
}

export class CompatSpec {
  readonly items: readonly string[];
  private readonly range: Range;

  private constructor(items: readonly string[], range: Range) {
    this.items = items;
    this.range = range;
  }

  static parse(expression: CompatExpression): CompatSpec {
    const items = splitItems(expression);
    if (items.length === 0) {
      throw new CompatParseError(String(expression), 'no ranges given');
    }
    const translated = items.map((item) => toSemverRange(item));
    try {
      return new CompatSpec(items, new Range(translated.join(' || '), RANGE_OPTIONS));
    } catch (err) {
      throw new CompatParseError(items.join(', '), err instanceof Error ? err.message : String(err));
    }
  }

  satisfies(version: SemVer | string): boolean {
    return this.range.test(version);
  }

  /** `1` for a single item, `[0.5-0.7, 1]` for a union. */
  toString(): string {
    return this.items.length === 1 ? (this.items[0] ?? '') : `[${this.items.join(', ')}]`;
  }

  toJSON(): string {
    return this.toString();
  }
}
