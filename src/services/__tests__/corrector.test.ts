import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Corrector } from '@/services/corrector';
import { Dictionary } from '@/services/dictionary';
import type { EngineConfig } from '@/constants/engineConfig';

function makeDictionary(config: Partial<EngineConfig> = {}): Dictionary {
  const dictionary = new Dictionary(config);
  dictionary.loadEntries([
    { word: 'the', frequency: 1_000_000 },
    { word: 'quick', frequency: 500 },
    { word: 'brown', frequency: 200 },
    { word: 'fox', frequency: 10 },
    { word: 'for', frequency: 1000 },
    { word: "don't", frequency: 300 },
  ]);
  return dictionary;
}

describe('Corrector', () => {
  let corrector: Corrector;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    corrector = new Corrector(makeDictionary());
  });

  describe('completeWord', () => {
    it('corrects a misspelled word', () => {
      expect(corrector.completeWord('teh')).toEqual({
        original: 'teh',
        corrected: 'the',
        replacement: 'the',
        distance: 1,
        source: 'symspell',
      });
    });

    it('keeps surrounding punctuation and a leading capital', () => {
      const event = corrector.completeWord('(Teh,');
      expect(event?.corrected).toBe('The');
      expect(event?.replacement).toBe('(The,');
    });

    it('keeps all caps', () => {
      expect(corrector.completeWord('TEH')?.corrected).toBe('THE');
    });

    it('handles apostrophes inside a word', () => {
      expect(corrector.completeWord("dno't")?.corrected).toBe("don't");
    });

    it('returns null for correct words and for tokens without letters', () => {
      expect(corrector.completeWord('quick')).toBeNull();
      expect(corrector.completeWord('1234')).toBeNull();
      expect(corrector.completeWord('...')).toBeNull();
    });

    it('tracks the last two finished words as context', () => {
      corrector.completeWord('The');
      corrector.completeWord('quick');
      expect(corrector.contextWindow).toEqual(['the', 'quick']);

      corrector.completeWord('brwon');
      expect(corrector.contextWindow).toEqual(['quick', 'brown']);
    });

    it('uses the context window to pick between candidates', () => {
      const dictionary = makeDictionary();
      dictionary.trainContext(['the quick fox', 'the quick fox']);

      const withContext = new Corrector(dictionary);
      withContext.completeWord('the');
      withContext.completeWord('quick');
      expect(withContext.completeWord('fov')?.corrected).toBe('fox');

      const withoutContext = new Corrector(dictionary);
      expect(withoutContext.completeWord('fov')?.corrected).toBe('for');
    });

    it('does nothing while disabled', () => {
      expect(corrector.toggleEnabled()).toBe(false);
      expect(corrector.enabled).toBe(false);
      expect(corrector.completeWord('teh')).toBeNull();

      expect(corrector.toggleEnabled()).toBe(true);
      expect(corrector.completeWord('teh')?.corrected).toBe('the');
    });

    it('starts disabled when configured so', () => {
      const off = new Corrector(makeDictionary({ enabledByDefault: false }));
      expect(off.enabled).toBe(false);
    });
  });

  describe('undo', () => {
    it('restores the original word within the timeout', () => {
      corrector.completeWord('quick', 0);
      corrector.completeWord('teh', 1000);

      expect(corrector.undo(2000)).toEqual({ corrected: 'the', original: 'teh' });
      expect(corrector.contextWindow).toEqual(['quick', 'teh']);
    });

    it('only undoes once', () => {
      corrector.completeWord('teh', 1000);
      corrector.undo(1500);
      expect(corrector.undo(1600)).toBeNull();
    });

    it('expires after the configured timeout', () => {
      corrector.completeWord('teh', 1000);
      expect(corrector.undo(6000)).toBeNull();
    });

    it('honours a custom timeout', () => {
      const patient = new Corrector(makeDictionary({ undoTimeoutSeconds: 30 }));
      patient.completeWord('teh', 1000);
      expect(patient.undo(20_000)).toEqual({ corrected: 'the', original: 'teh' });
    });

    it('cannot undo once another word is finished', () => {
      corrector.completeWord('teh', 1000);
      corrector.completeWord('quick', 1100);
      expect(corrector.undo(1200)).toBeNull();
    });

    it('has nothing to undo when no correction happened', () => {
      corrector.completeWord('quick', 1000);
      expect(corrector.undo(1100)).toBeNull();
    });
  });

  it('resetContext clears the window and the undo buffer', () => {
    corrector.completeWord('quick', 0);
    corrector.completeWord('teh', 10);
    corrector.resetContext();

    expect(corrector.contextWindow).toEqual([]);
    expect(corrector.undo(20)).toBeNull();
  });
});
