import type { RiskErrorKind, SymbolError } from './types';

export class RiskError extends Error {
  readonly kind: RiskErrorKind;
  readonly details: Record<string, unknown> | undefined;

  constructor(kind: RiskErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RiskError';
    this.kind = kind;
    this.details = details;
  }
}

export class InsufficientDataError extends RiskError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INSUFFICIENT_DATA', message, details);
    this.name = 'InsufficientDataError';
  }
}

export class DataUnavailableError extends RiskError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DATA_UNAVAILABLE', message, details);
    this.name = 'DataUnavailableError';
  }
}

export class DivisionByZeroError extends RiskError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DIVISION_BY_ZERO', message, details);
    this.name = 'DivisionByZeroError';
  }
}

export class ConfigurationError extends RiskError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION', message, details);
    this.name = 'ConfigurationError';
  }
}

export class SeriesAlignmentError extends RiskError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SERIES_MISALIGNED', message, details);
    this.name = 'SeriesAlignmentError';
  }
}

export function isRiskError(error: unknown): error is RiskError {
  return error instanceof RiskError;
}

/**
 * Errors that did not come from this library are treated as provider failures
 */
export function toRiskError(error: unknown): RiskError {
  if (isRiskError(error)) return error;
  return new DataUnavailableError(error instanceof Error ? error.message : String(error));
}

/**
 * Downgrade anything thrown while processing a symbol to an error entry
 */
export function toSymbolError(symbol: string, error: unknown): SymbolError {
  const { kind, message } = toRiskError(error);
  return { symbol, kind, message };
}
