export type SpellEngineErrorCode = 'INVALID_DISTANCE' | 'INVALID_FREQUENCY' | 'INVALID_CONFIG';

export class SpellEngineError extends Error {
  constructor(
    public code: SpellEngineErrorCode,
    public detail: string
  ) {
    super(`Spell Engine Error: ${code} (${detail})`);
    this.name = 'SpellEngineError';
  }

  getUserMessage(): string {
    if (this.code === 'INVALID_DISTANCE') {
      return `Edit distance must be a non-negative integer within the index limit: ${this.detail}`;
    }

    if (this.code === 'INVALID_FREQUENCY') {
      return `Word frequency must be a non-negative integer: ${this.detail}`;
    }

    return `Invalid engine configuration: ${this.detail}`;
  }
}

export function isSpellEngineError(error: unknown): error is SpellEngineError {
  return error instanceof SpellEngineError;
}
