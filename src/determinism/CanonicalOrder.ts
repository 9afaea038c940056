/**
 * Canonical ordering: binary UTF-16 code unit ascending only.
 * NEVER use localeCompare; ordering must not depend on the host locale.
 */

/** Binary string comparison (UTF-16 code unit ascending). Returns -1 | 0 | 1. */
export function stringCompareBinary(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortIds(ids: Iterable<string>): string[] {
  return [...ids].sort(stringCompareBinary);
}

/** Sort edges by (from asc, to asc), dropping repeated pairs. */
export function canonicalEdges<T extends { from: string; to: string }>(edges: readonly T[]): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const e of edges) {
    const key = `${e.from}\u0000${e.to}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(e);
  }
  return out.sort((a, b) => {
    const fromCmp = stringCompareBinary(a.from, b.from);
    if (fromCmp !== 0) return fromCmp;
    return stringCompareBinary(a.to, b.to);
  });
}
