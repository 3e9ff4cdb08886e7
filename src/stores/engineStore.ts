import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { Dictionary } from '@/services/dictionary';
import type { CorrectionResult } from '@/services/dictionary';
import { resolveEngineConfig } from '@/constants/engineConfig';
import type { EngineConfig } from '@/constants/engineConfig';
import type { LookupContext, Suggestion, WordEntry } from '@/types';

export type EngineStatus = 'idle' | 'loading' | 'ready' | 'error';

/** Everything needed to build a dictionary snapshot from scratch. */
export interface DictionarySource {
  /** Contents of a `word frequency` list. */
  frequencyList?: string;
  entries?: Iterable<WordEntry>;
  /** Contents of a personal word list. */
  personalWords?: string;
  /** Sentences for the context model. */
  corpus?: Iterable<string>;
}

export interface EngineState {
  config: EngineConfig;
  /**
   * Current snapshot. Replaced wholesale by reload; the only in-place change
   * is addPersonalWord, which inserts into it.
   */
  dictionary: Dictionary;
  status: EngineStatus;
  error: string | null;
  builtAt: number | null;
  wordCount: number;

  reload: (source?: DictionarySource) => boolean;
  addPersonalWord: (word: string) => void;
  lookup: (word: string, context?: LookupContext) => Suggestion[];
  getCorrection: (word: string, context?: LookupContext) => CorrectionResult | null;
}

export type EngineStore = StoreApi<EngineState>;

function buildDictionary(config: EngineConfig, source: DictionarySource): Dictionary {
  const dictionary = new Dictionary(config);

  if (source.frequencyList !== undefined) dictionary.loadFrequencyList(source.frequencyList);
  if (source.entries !== undefined) dictionary.loadEntries(source.entries);
  // No word list given: fall back to the bundled common words
  if (source.frequencyList === undefined && source.entries === undefined) dictionary.loadFallback();

  if (source.personalWords !== undefined) dictionary.loadPersonalWords(source.personalWords);
  if (source.corpus !== undefined) dictionary.trainContext(source.corpus);

  return dictionary;
}

/**
 * Create an engine store. Each store owns its own dictionary snapshot; a
 * reload builds the next snapshot off to the side and swaps it in with one
 * state update, so readers never see a half-built index.
 */
export function createEngineStore(overrides: Partial<EngineConfig> = {}): EngineStore {
  const config = resolveEngineConfig(overrides);

  return createStore<EngineState>()((set, get) => ({
    config,
    dictionary: new Dictionary(config),
    status: 'idle',
    error: null,
    builtAt: null,
    wordCount: 0,

    reload: (source = {}) => {
      set({ status: 'loading', error: null });
      const startTime = performance.now();

      try {
        const dictionary = buildDictionary(get().config, source);
        set({
          dictionary,
          status: 'ready',
          builtAt: Date.now(),
          wordCount: dictionary.wordCount,
        });
        const elapsed = performance.now() - startTime;
        console.log(`[EngineStore] Snapshot ready: ${dictionary.wordCount} words in ${elapsed.toFixed(0)}ms`);
        return true;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn('[EngineStore] Reload failed, keeping previous dictionary:', message);
        set({ status: 'error', error: message });
        return false;
      }
    },

    addPersonalWord: (word) => {
      const { dictionary } = get();
      dictionary.addPersonalWord(word);
      set({ wordCount: dictionary.wordCount });
    },

    lookup: (word, context) => get().dictionary.lookup(word, context),

    getCorrection: (word, context) => get().dictionary.getCorrection(word, context),
  }));
}
