/**
 * Dictionary
 *
 * Feeds word lists into a SymSpell index and picks the single best correction
 * for a word. Reading files is left to the caller: everything here takes the
 * text content that was already read.
 *
 * Correction tiers:
 *   Tier 1: SymSpell edit-distance lookup (optionally context-reranked)
 *   Tier 2: Double Metaphone phonetic match, when enabled in config
 */

import fallbackWords from '@/data/fallbackDictionary.json';
import { resolveEngineConfig } from '@/constants/engineConfig';
import type { EngineConfig } from '@/constants/engineConfig';
import { SymSpell } from './symspellService';
import { TrigramModel } from './trigramModel';
import type { LookupContext, Suggestion, WordEntry } from '@/types';

export const FALLBACK_DICTIONARY: readonly WordEntry[] = fallbackWords;

export interface ParsedWordList {
  entries: WordEntry[];
  /** Entries whose frequency could not be read and fell back to 1. */
  defaulted: number;
}

export interface CorrectionResult {
  term: string;
  distance: number;
  source: 'symspell' | 'phonetic';
}

function isCommentOrBlank(line: string): boolean {
  return line.length === 0 || line.startsWith('#');
}

/**
 * Parse `word [frequency]` lines. A missing or unreadable frequency counts as 1.
 */
export function parseFrequencyList(text: string): ParsedWordList {
  const entries: WordEntry[] = [];
  let defaulted = 0;

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (isCommentOrBlank(trimmed)) continue;

    const [rawWord, rawFreq] = trimmed.split(/\s+/);
    const word = rawWord.toLowerCase();

    let frequency = 1;
    if (rawFreq !== undefined) {
      const parsed = /^\d+$/.test(rawFreq) ? Number(rawFreq) : NaN;
      if (Number.isSafeInteger(parsed)) {
        frequency = parsed;
      } else {
        defaulted++;
      }
    }

    entries.push({ word, frequency });
  }

  return { entries, defaulted };
}

/**
 * Parse a personal word list: one word per line, `#` comments allowed.
 */
export function parsePersonalWords(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim().toLowerCase())
    .filter((line) => !isCommentOrBlank(line));
}

export class Dictionary {
  readonly config: EngineConfig;
  readonly symspell: SymSpell;
  private readonly personal = new Set<string>();
  private trigrams: TrigramModel | null = null;

  constructor(config: Partial<EngineConfig> = {}) {
    this.config = resolveEngineConfig(config);
    this.symspell = new SymSpell({
      maxEditDistance: this.config.maxEditDistance,
      phoneticMaxLengthDelta: this.config.phoneticMaxLengthDelta,
    });
  }

  loadEntries(entries: Iterable<WordEntry>): number {
    const startTime = performance.now();
    let count = 0;

    for (const { word, frequency } of entries) {
      this.symspell.insert(word.toLowerCase(), frequency);
      count++;
    }

    const elapsed = performance.now() - startTime;
    console.log(`[Dictionary] Loaded ${count} words in ${elapsed.toFixed(0)}ms`);
    console.log(`[SymSpell] Deletion index: ${this.symspell.deleteCount} entries`);
    console.log(`[SymSpell] Phonetic index: ${this.symspell.phoneticCodeCount} entries`);

    return count;
  }

  loadFrequencyList(text: string): number {
    const { entries, defaulted } = parseFrequencyList(text);
    if (defaulted > 0) {
      console.warn(`[Dictionary] ${defaulted} lines had an unreadable frequency; defaulted to 1`);
    }
    return this.loadEntries(entries);
  }

  loadFallback(): number {
    const count = this.loadEntries(FALLBACK_DICTIONARY);
    console.log(`[Dictionary] Loaded fallback dictionary with ${count} common words`);
    return count;
  }

  loadPersonalWords(text: string): number {
    const words = parsePersonalWords(text);
    for (const word of words) this.addPersonalWord(word);
    console.log(`[Dictionary] Loaded ${words.length} personal words`);
    return words.length;
  }

  /**
   * Add a word the user wants kept. It is inserted with a high frequency so
   * it wins ties against ordinary words.
   */
  addPersonalWord(word: string): void {
    const lower = word.trim().toLowerCase();
    if (!lower) return;
    this.personal.add(lower);
    this.symspell.insert(lower, this.config.personalWordFrequency);
  }

  get personalWords(): string[] {
    return [...this.personal];
  }

  /**
   * Extend the attached context model, creating it on first use.
   */
  trainContext(sentences: Iterable<string>): TrigramModel {
    if (!this.trigrams) {
      this.trigrams = new TrigramModel();
      this.symspell.attachContextModel(this.trigrams);
    }
    this.trigrams.train(sentences);
    return this.trigrams;
  }

  get contextModel(): TrigramModel | null {
    return this.trigrams;
  }

  isKnownWord(word: string): boolean {
    return this.symspell.contains(word.toLowerCase());
  }

  get wordCount(): number {
    return this.symspell.wordCount;
  }

  lookup(word: string, context?: LookupContext): Suggestion[] {
    return this.symspell.lookup(word.toLowerCase(), this.config.maxEditDistance, context);
  }

  /**
   * The best replacement for `word`, or null when it should be left alone.
   */
  getCorrection(word: string, context?: LookupContext): CorrectionResult | null {
    const lower = word.toLowerCase();
    if (Array.from(lower).length < this.config.minCorrectionLength) return null;

    const [top] = this.lookup(lower, context);
    if (top) {
      if (top.term !== lower && top.distance <= this.config.maxEditDistance) {
        return { term: top.term, distance: top.distance, source: 'symspell' };
      }
      return null;
    }

    if (this.config.phoneticFallback && Array.from(lower).length > this.config.phoneticMinLength) {
      const [phonetic] = this.symspell.phoneticLookup(lower);
      if (phonetic) {
        return { term: phonetic.term, distance: phonetic.distance, source: 'phonetic' };
      }
    }

    return null;
  }
}
