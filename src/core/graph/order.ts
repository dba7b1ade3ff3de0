/**
 * Locale-independent identity ordering used for every tie-break.
 */
export function compareIdentity(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortIdentities(ids: Iterable<string>): string[] {
  return [...ids].sort(compareIdentity);
}
