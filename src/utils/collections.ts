/**
 * Ordering helpers shared by both output paths.
 */

/**
 * Ordinal (UTF-16 code unit) comparison. Unlike `localeCompare`, the
 * result does not depend on the host locale.
 */
export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Drop exact duplicates and sort ascending by ordinal comparison.
 */
export function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort(compareOrdinal);
}
