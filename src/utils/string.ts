/**
 * String comparison utilities.
 */

/**
 * Order strings by UTF-16 code units, independent of the host locale.
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
