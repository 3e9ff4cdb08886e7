/**
 * SymSpell correction index
 *
 * Deletion-based candidate lookup (SymSpell): every dictionary word is stored
 * under each string reachable by deleting up to K characters from it. A query
 * generates its own deletes, meets the dictionary words in the middle, and
 * only those candidates are verified with a true Damerau-Levenshtein distance.
 *
 * A Double Metaphone index is built alongside for sound-alike errors that fall
 * outside the edit-distance bound.
 *
 * The index only grows. Reloading a dictionary means building a new SymSpell
 * (see stores/engineStore).
 */

import { doubleMetaphone } from 'double-metaphone';
import { DEFAULT_ENGINE_CONFIG, MAX_SUPPORTED_EDIT_DISTANCE } from '@/constants/engineConfig';
import { generateDeletes } from './deleteVariants';
import { distance, unboundedDistance } from './editDistance';
import { SpellEngineError } from './engineErrors';
import type { ContextScorer, LookupContext, PhoneticSuggestion, Suggestion } from '@/types';

export interface SymSpellOptions {
  /**
   * Deepest delete stored per word. A lookup may ask for a larger bound; the
   * index then only holds candidates reachable through its stored deletes.
   */
  maxEditDistance?: number;
  /** Length window for phonetic candidates. */
  phoneticMaxLengthDelta?: number;
  contextModel?: ContextScorer | null;
}

function assertDistance(value: number, limit: number = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < 0 || value > limit) {
    const range = limit === Number.MAX_SAFE_INTEGER ? 'a non-negative integer' : `an integer in [0, ${limit}]`;
    throw new SpellEngineError('INVALID_DISTANCE', `expected ${range}, got ${value}`);
  }
}

function codePointLength(word: string): number {
  return Array.from(word).length;
}

/** Ascending distance, then descending frequency. */
export function compareSuggestions(a: Suggestion, b: Suggestion): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  return b.frequency - a.frequency;
}

/**
 * Apply a context probability to a frequency. Positive frequencies never
 * drop below 1, so a tiny probability cannot erase a candidate's weight.
 */
export function rescaleFrequency(frequency: number, probability: number): number {
  if (frequency <= 0) return 0;
  return Math.max(1, Math.floor(frequency * probability));
}

export class SymSpell {
  readonly maxEditDistance: number;
  private readonly phoneticMaxLengthDelta: number;

  // Full dictionary: word -> frequency
  private readonly words = new Map<string, number>();

  // Deletion index: deletion variant -> words it was derived from
  private readonly deletes = new Map<string, string[]>();

  // Phonetic index: metaphone code -> words sharing it
  private readonly phonetic = new Map<string, string[]>();

  private scorer: ContextScorer | null;

  constructor(options: SymSpellOptions = {}) {
    const maxEditDistance = options.maxEditDistance ?? DEFAULT_ENGINE_CONFIG.maxEditDistance;
    assertDistance(maxEditDistance, MAX_SUPPORTED_EDIT_DISTANCE);
    this.maxEditDistance = maxEditDistance;
    this.phoneticMaxLengthDelta = options.phoneticMaxLengthDelta ?? DEFAULT_ENGINE_CONFIG.phoneticMaxLengthDelta;
    this.scorer = options.contextModel ?? null;
  }

  /**
   * Add a word, or overwrite the frequency of one already present.
   * The caller is responsible for lowercasing.
   */
  insert(word: string, frequency: number): void {
    if (!Number.isSafeInteger(frequency) || frequency < 0) {
      throw new SpellEngineError('INVALID_FREQUENCY', `"${word}" has frequency ${frequency}`);
    }

    const known = this.words.has(word);
    this.words.set(word, frequency);

    // Variants and phonetic codes depend only on the word itself
    if (known) return;

    for (const del of generateDeletes(word, this.maxEditDistance)) {
      let sources = this.deletes.get(del);
      if (!sources) {
        sources = [];
        this.deletes.set(del, sources);
      }
      sources.push(word);
    }

    if (codePointLength(word) >= 2) {
      const [primary, alternate] = doubleMetaphone(word);
      if (primary) this.indexPhonetic(primary, word);
      if (alternate && alternate !== primary) this.indexPhonetic(alternate, word);
    }
  }

  /**
   * Ranked candidates for `input` within `maxDistance` edits.
   *
   * With a context and an attached model, each frequency is rescaled by
   * P(term | prev, prevPrev) before ranking. Ties in both distance and
   * frequency keep no particular order.
   */
  lookup(input: string, maxDistance: number = this.maxEditDistance, context?: LookupContext): Suggestion[] {
    assertDistance(maxDistance);

    const suggestions: Suggestion[] = [];
    const considered = new Set<string>([input]);

    const exact = this.words.get(input);
    if (exact !== undefined) {
      suggestions.push({ term: input, distance: 0, frequency: exact });
      if (maxDistance === 0) return this.rank(suggestions, context);
    }

    if (maxDistance > 0) {
      const keys = generateDeletes(input, maxDistance);
      // The input is itself a delete of any longer dictionary word
      if (input.length > 0) keys.add(input);

      for (const key of keys) {
        // A key can be a dictionary word in its own right ("helloo" -> "hello")
        this.consider(input, key, maxDistance, considered, suggestions);

        const sources = this.deletes.get(key);
        if (!sources) continue;
        for (const candidate of sources) {
          this.consider(input, candidate, maxDistance, considered, suggestions);
        }
      }
    }

    return this.rank(suggestions, context);
  }

  /**
   * Sound-alike candidates: words sharing a Double Metaphone code with the
   * input, most frequent first.
   */
  phoneticLookup(input: string): PhoneticSuggestion[] {
    if (codePointLength(input) < 2) return [];

    const [primary, alternate] = doubleMetaphone(input);
    const codes = alternate && alternate !== primary ? [primary, alternate] : [primary];
    const inputLength = codePointLength(input);
    const seen = new Set<string>([input]);
    const results: PhoneticSuggestion[] = [];

    for (const code of codes) {
      const candidates = this.phonetic.get(code);
      if (!candidates) continue;

      for (const candidate of candidates) {
        if (seen.has(candidate)) continue;
        seen.add(candidate);

        if (Math.abs(codePointLength(candidate) - inputLength) > this.phoneticMaxLengthDelta) continue;

        results.push({
          term: candidate,
          distance: unboundedDistance(input, candidate),
          frequency: this.words.get(candidate) ?? 0,
        });
      }
    }

    return results.sort((a, b) => b.frequency - a.frequency || a.distance - b.distance);
  }

  attachContextModel(model: ContextScorer | null): void {
    this.scorer = model;
  }

  get contextModel(): ContextScorer | null {
    return this.scorer;
  }

  contains(word: string): boolean {
    return this.words.has(word);
  }

  frequencyOf(word: string): number | undefined {
    return this.words.get(word);
  }

  get wordCount(): number {
    return this.words.size;
  }

  get deleteCount(): number {
    return this.deletes.size;
  }

  get phoneticCodeCount(): number {
    return this.phonetic.size;
  }

  private consider(
    input: string,
    candidate: string,
    maxDistance: number,
    considered: Set<string>,
    suggestions: Suggestion[]
  ): void {
    if (considered.has(candidate)) return;
    considered.add(candidate);

    const frequency = this.words.get(candidate);
    if (frequency === undefined) return;

    const dist = distance(input, candidate, maxDistance);
    if (dist >= 0) {
      suggestions.push({ term: candidate, distance: dist, frequency });
    }
  }

  private rank(suggestions: Suggestion[], context: LookupContext | undefined): Suggestion[] {
    if (context && this.scorer) {
      const [prevPrev, prev] = context;
      for (const suggestion of suggestions) {
        const p = this.scorer.probability(suggestion.term, prev, prevPrev);
        suggestion.frequency = rescaleFrequency(suggestion.frequency, p);
      }
    }
    return suggestions.sort(compareSuggestions);
  }

  private indexPhonetic(code: string, word: string): void {
    let entries = this.phonetic.get(code);
    if (!entries) {
      entries = [];
      this.phonetic.set(code, entries);
    }
    entries.push(word);
  }
}
