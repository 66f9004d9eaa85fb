/**
 * Locale-independent string comparison, so ordering never depends on the host
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
