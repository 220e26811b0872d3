/**
 * Deterministic ordering for identifiers and field names.
 *
 * Plain UTF-16 code unit comparison: independent of locale, ICU data and
 * input file order.
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortIds(ids: Iterable<string>): string[] {
  return [...ids].sort(compareIds);
}
