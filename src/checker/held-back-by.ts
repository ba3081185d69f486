/**
 * Names of the packages holding back `name`, distinct and sorted ascending.
 */
export function invertHoldMap(name: string, holdMap: ReadonlyMap<string, readonly { name: string }[]>): string[] {
  const heldBy = new Set<string>();
  for (const [holder, heldBack] of holdMap) {
    if (heldBack.some((entry) => entry.name === name)) {
      heldBy.add(holder);
    }
  }
  return [...heldBy].sort(compareNames);
}

/** Code-unit order, independent of locale. */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
