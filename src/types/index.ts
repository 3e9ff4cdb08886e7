/** A dictionary word and how common it is. */
export interface WordEntry {
  word: string;
  frequency: number;
}

/** One ranked correction candidate. */
export interface Suggestion {
  term: string;
  /** Edit distance from the query, never above the lookup bound. */
  distance: number;
  /** Corpus frequency, or the context-rescaled score when context was given. */
  frequency: number;
}

/** Sound-alike candidate from the Double Metaphone tier. */
export interface PhoneticSuggestion {
  term: string;
  /** Unbounded edit distance from the query. */
  distance: number;
  frequency: number;
}

/** The two tokens before the one being corrected, in reading order. */
export type LookupContext = readonly [prevPrev: string, prev: string];

/** Anything that can score a word given the two tokens before it. */
export interface ContextScorer {
  probability(word: string, prev: string, prevPrev: string): number;
}
