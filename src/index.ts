export { distance, unboundedDistance, EXCEEDS_BOUND } from './services/editDistance';
export { generateDeletes } from './services/deleteVariants';
export { SymSpell, compareSuggestions, rescaleFrequency } from './services/symspellService';
export type { SymSpellOptions } from './services/symspellService';
export { TrigramModel, UNSEEN_PROBABILITY, tokenize } from './services/trigramModel';
export {
  Dictionary,
  FALLBACK_DICTIONARY,
  parseFrequencyList,
  parsePersonalWords,
} from './services/dictionary';
export type { CorrectionResult, ParsedWordList } from './services/dictionary';
export { Corrector } from './services/corrector';
export type { CorrectionEvent, UndoResult } from './services/corrector';
export { SpellEngineError, isSpellEngineError } from './services/engineErrors';
export type { SpellEngineErrorCode } from './services/engineErrors';
export { createEngineStore } from './stores/engineStore';
export type { DictionarySource, EngineState, EngineStatus, EngineStore } from './stores/engineStore';
export { DEFAULT_ENGINE_CONFIG, MAX_SUPPORTED_EDIT_DISTANCE, resolveEngineConfig } from './constants/engineConfig';
export type { EngineConfig } from './constants/engineConfig';
export { preserveCase, splitWord } from './utils/casing';
export type { WordParts } from './utils/casing';
export type { ContextScorer, LookupContext, PhoneticSuggestion, Suggestion, WordEntry } from './types';
