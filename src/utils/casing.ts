/**
 * Copy the capitalisation pattern of `original` onto `corrected`.
 * Handles the two cases that matter while typing: a leading capital
 * ("Teh" -> "The") and all caps ("TEH" -> "THE").
 */
export function preserveCase(original: string, corrected: string): string {
  if (!original || !corrected) return corrected;

  const first = original[0];
  let result = corrected;
  if (first === first.toUpperCase() && first !== first.toLowerCase()) {
    result = corrected[0].toUpperCase() + corrected.slice(1);
  }
  if (original === original.toUpperCase() && original !== original.toLowerCase() && original.length > 1) {
    result = corrected.toUpperCase();
  }

  return result;
}

export interface WordParts {
  prefix: string;
  core: string;
  suffix: string;
}

/**
 * Split surrounding punctuation off a token: `"(teh,"` -> `(`, `teh`, `,`.
 * Returns null when there is no letter run to correct.
 */
export function splitWord(token: string): WordParts | null {
  const match = token.match(/^([^\p{L}]*)([\p{L}][\p{L}'’-]*[\p{L}]|[\p{L}])([^\p{L}]*)$/u);
  if (!match) return null;

  const [, prefix, core, suffix] = match;
  return { prefix, core, suffix };
}
