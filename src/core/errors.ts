/**
 * Error taxonomy for the signal engine.
 *
 * DataUnavailable and Scoring errors are recovered locally (defaults / neutral
 * score) and only logged. InsufficientData is never thrown: the backtest
 * engine returns it as a result variant. The remaining errors surface to the
 * caller of a cycle.
 */

export type EngineErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'SCORING_ERROR'
  | 'RECORD_NOT_FOUND'
  | 'PERSISTENCE_ERROR'
  | 'INVALID_RECORD'
  | 'NO_SCORABLE_ASSETS'
  | 'INVALID_STRATEGY';

export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: EngineErrorCode,
    public readonly context: Record<string, unknown> = {},
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

export class DataUnavailableError extends EngineError {
  constructor(public readonly asset: string, public readonly date: string, field: string) {
    super(`No ${field} for ${asset} on ${date}`, 'DATA_UNAVAILABLE', { asset, date, field });
    this.name = 'DataUnavailableError';
  }
}

export class ScoringError extends EngineError {
  constructor(message: string, public readonly asset: string, cause?: Error) {
    super(message, 'SCORING_ERROR', { asset }, cause);
    this.name = 'ScoringError';
  }
}

export class RecordNotFoundError extends EngineError {
  constructor(public readonly date: string) {
    super(`No prediction recorded for ${date}`, 'RECORD_NOT_FOUND', { date });
    this.name = 'RecordNotFoundError';
  }
}

export class PersistenceError extends EngineError {
  constructor(public readonly operation: string, cause?: Error, context: Record<string, unknown> = {}) {
    super(
      `Storage write failed during ${operation}${cause ? `: ${cause.message}` : ''}`,
      'PERSISTENCE_ERROR',
      { operation, ...context },
      cause
    );
    this.name = 'PersistenceError';
  }
}

export class InvalidRecordError extends EngineError {
  constructor(message: string, public readonly date: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_RECORD', { date, ...context });
    this.name = 'InvalidRecordError';
  }
}

export class NoScorableAssetsError extends EngineError {
  constructor(public readonly date: string) {
    super(`No asset has a feature snapshot for ${date}`, 'NO_SCORABLE_ASSETS', { date });
    this.name = 'NoScorableAssetsError';
  }
}

export class InvalidStrategyError extends EngineError {
  constructor(reason: string, public readonly violations: string[] = []) {
    super(`Invalid strategy: ${reason}`, 'INVALID_STRATEGY', { violations });
    this.name = 'InvalidStrategyError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
