import type { HoldMap } from '../checker/held-back.js';
import { compareNames } from '../checker/held-back-by.js';
import { HeldBackReport } from '../schemas/output.schema.js';

/**
 * Project a HoldMap onto its JSON report shape, holders sorted by name.
 */
export function toHeldBackReport(holdMap: HoldMap): HeldBackReport {
  const holders = [...holdMap.entries()]
    .sort(([a], [b]) => compareNames(a, b))
    .map(([name, heldBack]) => ({
      name,
      heldBack: heldBack.map((entry) => ({
        name: entry.name,
        lastVersion: entry.lastVersion.version,
        compat: entry.compat.toString(),
      })),
    }));
  return { holders };
}

/**
 * Serialize a HoldMap to a compact JSON string.
 */
export function serializeHoldMap(holdMap: HoldMap): string {
  return JSON.stringify(toHeldBackReport(holdMap));
}

/**
 * Parse and validate a serialized report.
 * Throws a ZodError if the JSON does not conform to the schema.
 */
export function deserializeReport(json: string): HeldBackReport {
  const parsed: unknown = JSON.parse(json);
  return HeldBackReport.parse(parsed);
}

/**
 * Pretty-print any report with 2-space indentation.
 */
export function prettyPrint(report: unknown): string {
  return JSON.stringify(report, null, 2);
}
