import { SpellEngineError } from '@/services/engineErrors';

export interface EngineConfig {
  /** Deepest delete variant stored in the index, and the default lookup bound. */
  maxEditDistance: number;
  enabledByDefault: boolean;
  /** How long a correction stays undoable. */
  undoTimeoutSeconds: number;
  /** Frequency given to personal words so they win ties against common words. */
  personalWordFrequency: number;
  /** Words shorter than this (in code points) are left alone. */
  minCorrectionLength: number;
  /** Try a Double Metaphone match when the edit-distance tier finds nothing. */
  phoneticFallback: boolean;
  /** Phonetic matching is skipped for words of this length or shorter. */
  phoneticMinLength: number;
  phoneticMaxLengthDelta: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  maxEditDistance: 2,
  enabledByDefault: true,
  undoTimeoutSeconds: 5,
  personalWordFrequency: 1_000_000,
  minCorrectionLength: 1,
  phoneticFallback: false,
  phoneticMinLength: 3,
  phoneticMaxLengthDelta: 3,
});

// Anything above this makes delete generation blow up for ordinary words.
export const MAX_SUPPORTED_EDIT_DISTANCE = 4;

function requireInteger(name: keyof EngineConfig, value: number, min: number, max = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new SpellEngineError('INVALID_CONFIG', `${name} must be an integer in [${min}, ${max}], got ${value}`);
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };

  requireInteger('maxEditDistance', config.maxEditDistance, 0, MAX_SUPPORTED_EDIT_DISTANCE);
  requireInteger('personalWordFrequency', config.personalWordFrequency, 1);
  requireInteger('minCorrectionLength', config.minCorrectionLength, 1);
  requireInteger('phoneticMinLength', config.phoneticMinLength, 0);
  requireInteger('phoneticMaxLengthDelta', config.phoneticMaxLengthDelta, 0);

  if (!Number.isFinite(config.undoTimeoutSeconds) || config.undoTimeoutSeconds < 0) {
    throw new SpellEngineError('INVALID_CONFIG', `undoTimeoutSeconds must be a non-negative number, got ${config.undoTimeoutSeconds}`);
  }

  return config;
}
