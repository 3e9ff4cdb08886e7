import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from '../engineConfig';
import { SpellEngineError, isSpellEngineError } from '@/services/engineErrors';

describe('resolveEngineConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(resolveEngineConfig()).toEqual({
      maxEditDistance: 2,
      enabledByDefault: true,
      undoTimeoutSeconds: 5,
      personalWordFrequency: 1_000_000,
      minCorrectionLength: 1,
      phoneticFallback: false,
      phoneticMinLength: 3,
      phoneticMaxLengthDelta: 3,
    });
  });

  it('applies overrides without touching the defaults', () => {
    const config = resolveEngineConfig({ maxEditDistance: 1, phoneticFallback: true });
    expect(config.maxEditDistance).toBe(1);
    expect(config.phoneticFallback).toBe(true);
    expect(DEFAULT_ENGINE_CONFIG.maxEditDistance).toBe(2);
  });

  it('accepts a zero edit distance', () => {
    expect(resolveEngineConfig({ maxEditDistance: 0 }).maxEditDistance).toBe(0);
  });

  it.each([
    { maxEditDistance: -1 },
    { maxEditDistance: 1.5 },
    { maxEditDistance: 5 },
    { personalWordFrequency: 0 },
    { minCorrectionLength: 0 },
    { phoneticMinLength: -2 },
    { undoTimeoutSeconds: -1 },
    { undoTimeoutSeconds: Number.NaN },
  ])('rejects %o', (overrides) => {
    expect(() => resolveEngineConfig(overrides)).toThrow(SpellEngineError);
  });

  it('reports the offending field', () => {
    let caught: unknown;
    try {
      resolveEngineConfig({ maxEditDistance: 7 });
    } catch (error) {
      caught = error;
    }

    expect(isSpellEngineError(caught)).toBe(true);
    if (isSpellEngineError(caught)) {
      expect(caught.code).toBe('INVALID_CONFIG');
      expect(caught.getUserMessage()).toBe(
        'Invalid engine configuration: maxEditDistance must be an integer in [0, 4], got 7'
      );
    }
  });
});

describe('SpellEngineError', () => {
  it('carries a name, code and user message', () => {
    const error = new SpellEngineError('INVALID_DISTANCE', 'expected an integer in [0, 2], got 3');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SpellEngineError');
    expect(error.message).toBe('Spell Engine Error: INVALID_DISTANCE (expected an integer in [0, 2], got 3)');
    expect(error.getUserMessage()).toBe(
      'Edit distance must be a non-negative integer within the index limit: expected an integer in [0, 2], got 3'
    );
  });

  it('describes frequency errors', () => {
    const error = new SpellEngineError('INVALID_FREQUENCY', '"x" has frequency -1');
    expect(error.getUserMessage()).toBe('Word frequency must be a non-negative integer: "x" has frequency -1');
  });

  it('is not confused with other errors', () => {
    expect(isSpellEngineError(new Error('nope'))).toBe(false);
  });
});
