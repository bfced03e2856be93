// ============================================
// STRATA - Errors
// ============================================

export type StrataErrorCode =
  | 'DECLARATION'
  | 'DIFF'
  | 'GENERATION'
  | 'APPLY'
  | 'HISTORY_CONSISTENCY'
  | 'MIGRATION';

export class StrataError extends Error {
  readonly code: StrataErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: StrataErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'StrataError';
    this.code = code;
    this.details = details;
  }

  static is(error: unknown, code: StrataErrorCode): error is StrataError {
    return error instanceof StrataError && error.code === code;
  }
}

/** Invalid model declaration; raised by `describe()` and pre-write validation */
export class DeclarationError extends StrataError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('DECLARATION', message, details);
    this.name = 'DeclarationError';
  }
}

export class DiffError extends StrataError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('DIFF', message, details);
    this.name = 'DiffError';
  }
}

export class GenerationError extends StrataError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('GENERATION', message, details);
    this.name = 'GenerationError';
  }
}

/**
 * A unit's transaction failed and was rolled back.
 * Carries the failing sequence and the underlying database error text.
 */
export class ApplyError extends StrataError {
  readonly model: string;
  readonly sequence: number;
  readonly reason: string;

  constructor(model: string, sequence: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('APPLY', `Migration ${model} #${sequence} failed: ${reason}`, { model, sequence });
    this.name = 'ApplyError';
    this.model = model;
    this.sequence = sequence;
    this.reason = reason;
  }
}

export class HistoryConsistencyError extends StrataError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('HISTORY_CONSISTENCY', message, details);
    this.name = 'HistoryConsistencyError';
  }
}

/** Operator misuse: bad ranges, deleting applied units, a held lock */
export class MigrationError extends StrataError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('MIGRATION', message, details);
    this.name = 'MigrationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
