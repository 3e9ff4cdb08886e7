/**
 * Corrector — per-word autocorrect decisions.
 *
 * Takes words one at a time as the user finishes them, keeps the last two
 * finished tokens as context for the next lookup, and remembers the most
 * recent correction so it can be undone for a short while. Capturing keys and
 * sending the replacement text is up to the host.
 */

import type { Dictionary } from './dictionary';
import type { LookupContext } from '@/types';
import { preserveCase, splitWord } from '@/utils/casing';

export interface CorrectionEvent {
  /** The word as typed, without surrounding punctuation. */
  original: string;
  /** The correction with the typed capitalisation applied. */
  corrected: string;
  /** Full token to put back, punctuation included. */
  replacement: string;
  distance: number;
  source: 'symspell' | 'phonetic';
}

export interface UndoResult {
  /** Text currently in place that should be removed. */
  corrected: string;
  /** Text to restore. */
  original: string;
}

interface UndoState {
  original: string;
  corrected: string;
  timestamp: number;
}

const CONTEXT_SIZE = 2;

export class Corrector {
  private enabledState: boolean;
  private window: string[] = [];
  private undoBuffer: UndoState | null = null;

  constructor(private readonly dictionary: Dictionary) {
    this.enabledState = dictionary.config.enabledByDefault;
  }

  get enabled(): boolean {
    return this.enabledState;
  }

  toggleEnabled(): boolean {
    this.enabledState = !this.enabledState;
    console.log(`[Corrector] Autocorrect ${this.enabledState ? 'enabled' : 'disabled'}`);
    return this.enabledState;
  }

  /** Previous tokens, oldest first, at most two. */
  get contextWindow(): readonly string[] {
    return [...this.window];
  }

  /**
   * Handle a finished word. Returns the correction to apply, or null when the
   * word should stay as typed.
   */
  completeWord(token: string, now: number = Date.now()): CorrectionEvent | null {
    // Once another word is finished the previous correction can't be undone
    this.undoBuffer = null;

    if (!this.enabledState) return null;

    const parts = splitWord(token);
    if (!parts) return null;

    const { prefix, core, suffix } = parts;
    const correction = this.dictionary.getCorrection(core, this.currentContext());
    if (!correction) {
      this.push(core.toLowerCase());
      return null;
    }

    const corrected = preserveCase(core, correction.term);
    this.undoBuffer = { original: core, corrected, timestamp: now };
    this.push(correction.term);

    console.log(`[Corrector] Corrected: '${core}' -> '${corrected}'`);

    return {
      original: core,
      corrected,
      replacement: prefix + corrected + suffix,
      distance: correction.distance,
      source: correction.source,
    };
  }

  /**
   * Revert the most recent correction if it is still within the undo window.
   */
  undo(now: number = Date.now()): UndoResult | null {
    const state = this.undoBuffer;
    if (!state) return null;

    this.undoBuffer = null;
    if (now - state.timestamp >= this.dictionary.config.undoTimeoutSeconds * 1000) {
      return null;
    }

    if (this.window.length > 0) {
      this.window[this.window.length - 1] = state.original.toLowerCase();
    }

    console.log(`[Corrector] Undo: '${state.corrected}' -> '${state.original}'`);
    return { corrected: state.corrected, original: state.original };
  }

  /** Forget the surrounding text, e.g. after Enter or a cursor jump. */
  resetContext(): void {
    this.window = [];
    this.undoBuffer = null;
  }

  private currentContext(): LookupContext | undefined {
    if (this.window.length === 0) return undefined;
    const prev = this.window[this.window.length - 1];
    const prevPrev = this.window.length > 1 ? this.window[this.window.length - 2] : '';
    return [prevPrev, prev];
  }

  private push(token: string): void {
    this.window.push(token);
    if (this.window.length > CONTEXT_SIZE) this.window.shift();
  }
}
