/**
 * Bounded Damerau-Levenshtein distance (optimal string alignment).
 *
 * Counts insertions, deletions, substitutions and adjacent transpositions at
 * unit cost, comparing Unicode code points rather than UTF-16 units.
 */

/** Returned when the distance is larger than the caller's bound. */
export const EXCEEDS_BOUND = -1;

/**
 * Compute the distance between `source` and `target`, or {@link EXCEEDS_BOUND}
 * as soon as it is known to exceed `maxDistance`.
 */
export function distance(source: string, target: string, maxDistance: number): number {
  if (source === target) return 0;

  const a = Array.from(source);
  const b = Array.from(target);
  const lenA = a.length;
  const lenB = b.length;

  if (lenA === 0) return lenB <= maxDistance ? lenB : EXCEEDS_BOUND;
  if (lenB === 0) return lenA <= maxDistance ? lenA : EXCEEDS_BOUND;

  // Quick length-based rejection
  if (Math.abs(lenA - lenB) > maxDistance) return EXCEEDS_BOUND;

  // Flat matrix, row-major
  const cols = lenB + 1;
  const d = new Array<number>((lenA + 1) * cols);

  for (let i = 0; i <= lenA; i++) d[i * cols] = i;
  for (let j = 0; j <= lenB; j++) d[j] = j;

  for (let i = 1; i <= lenA; i++) {
    let minInRow = d[i * cols];
    for (let j = 1; j <= lenB; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      let val = Math.min(
        d[(i - 1) * cols + j] + 1,         // deletion
        d[i * cols + (j - 1)] + 1,         // insertion
        d[(i - 1) * cols + (j - 1)] + cost // substitution
      );
      // Transposition
      if (i > 1 && j > 1 && a[i - 1] === b[j - 2] && a[i - 2] === b[j - 1]) {
        val = Math.min(val, d[(i - 2) * cols + (j - 2)] + cost);
      }
      d[i * cols + j] = val;
      if (val < minInRow) minInRow = val;
    }
    // Row minimums never decrease, so nothing below can come back under the bound
    if (minInRow > maxDistance) return EXCEEDS_BOUND;
  }

  const result = d[lenA * cols + lenB];
  return result <= maxDistance ? result : EXCEEDS_BOUND;
}

/**
 * Distance with no bound at all. Used where a score is wanted for a
 * candidate found by other means (the phonetic tier).
 */
export function unboundedDistance(source: string, target: string): number {
  return distance(source, target, Number.MAX_SAFE_INTEGER);
}
