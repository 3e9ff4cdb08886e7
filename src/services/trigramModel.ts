/**
 * Trigram language model with three-level backoff.
 *
 * Gives P(word | prev, prevPrev) from raw counts, falling back to the bigram
 * estimate and then the unigram estimate when the longer history was never
 * seen. No discounting: each level is a plain ratio of counts.
 */

import type { ContextScorer } from '@/types';

/** Probability returned for a word the model has never seen. */
export const UNSEEN_PROBABILITY = 1e-9;

// Tokens come from a whitespace split, so a space can never occur inside one
const SEP = ' ';

function key(...tokens: string[]): string {
  return tokens.join(SEP);
}

export function tokenize(sentence: string): string[] {
  return sentence
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map((token) => token.toLowerCase());
}

export class TrigramModel implements ContextScorer {
  private readonly unigrams = new Map<string, number>();
  private readonly bigrams = new Map<string, number>();
  private readonly trigrams = new Map<string, number>();
  private total = 0;

  /**
   * Count every token, consecutive pair and consecutive triple in each
   * sentence. Counts accumulate across calls; build a new model to start
   * over. Returns the number of tokens consumed.
   */
  train(sentences: Iterable<string>): number {
    const startTime = performance.now();
    let consumed = 0;

    for (const sentence of sentences) {
      const words = tokenize(sentence);

      for (let i = 0; i < words.length; i++) {
        increment(this.unigrams, words[i]);
        if (i > 0) increment(this.bigrams, key(words[i - 1], words[i]));
        if (i > 1) increment(this.trigrams, key(words[i - 2], words[i - 1], words[i]));
      }

      consumed += words.length;
    }

    this.total += consumed;

    const elapsed = performance.now() - startTime;
    console.log(
      `[Trigram] Trained on ${consumed} tokens in ${elapsed.toFixed(0)}ms ` +
        `(${this.unigrams.size} unigrams, ${this.bigrams.size} bigrams, ${this.trigrams.size} trigrams)`
    );

    return consumed;
  }

  /**
   * Backed-off estimate of P(word | prev, prevPrev), always in (0, 1].
   */
  probability(word: string, prev: string, prevPrev: string): number {
    const w = word.toLowerCase();
    const p = prev.toLowerCase();
    const pp = prevPrev.toLowerCase();

    const trigramCount = this.trigrams.get(key(pp, p, w));
    if (trigramCount !== undefined) {
      const historyCount = this.bigrams.get(key(pp, p));
      if (historyCount !== undefined) return trigramCount / historyCount;
    }

    const bigramCount = this.bigrams.get(key(p, w));
    if (bigramCount !== undefined) {
      const prevCount = this.unigrams.get(p);
      if (prevCount !== undefined) return bigramCount / prevCount;
    }

    const unigramCount = this.unigrams.get(w);
    if (unigramCount !== undefined) return unigramCount / this.total;

    return UNSEEN_PROBABILITY;
  }

  unigramCount(word: string): number {
    return this.unigrams.get(word.toLowerCase()) ?? 0;
  }

  bigramCount(prev: string, word: string): number {
    return this.bigrams.get(key(prev.toLowerCase(), word.toLowerCase())) ?? 0;
  }

  trigramCount(prevPrev: string, prev: string, word: string): number {
    return this.trigrams.get(key(prevPrev.toLowerCase(), prev.toLowerCase(), word.toLowerCase())) ?? 0;
  }

  get totalTokens(): number {
    return this.total;
  }

  get vocabularySize(): number {
    return this.unigrams.size;
  }
}

function increment(counts: Map<string, number>, k: string): void {
  counts.set(k, (counts.get(k) ?? 0) + 1);
}
