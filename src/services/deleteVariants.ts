/**
 * Generate all deletion variants of a word up to maxDistance deletes.
 *
 * Breadth-first: every string at depth d has exactly d fewer code points than
 * the word, so the first time a variant is seen is also its shallowest depth.
 * The word itself is never part of the result.
 */
export function generateDeletes(word: string, maxDistance: number): Set<string> {
  const deletes = new Set<string>();
  const queue: Array<{ w: string; d: number }> = [{ w: word, d: 0 }];

  for (let head = 0; head < queue.length; head++) {
    const { w, d } = queue[head];
    if (d >= maxDistance) continue;

    const chars = Array.from(w);
    for (let i = 0; i < chars.length; i++) {
      const deleted = chars.slice(0, i).join('') + chars.slice(i + 1).join('');
      if (!deletes.has(deleted)) {
        deletes.add(deleted);
        queue.push({ w: deleted, d: d + 1 });
      }
    }
  }

  return deletes;
}
