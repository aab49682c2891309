/**
 * Analysis Configuration
 * Defaults, environment overrides and validation of the analysis request.
 * Validation runs before any market data is fetched.
 */

import { ConfigurationError } from './errors';
import type { AnalysisConfig, AnalysisConfigInput } from './types';

// ============================================
// DEFAULTS
// ============================================

export const DEFAULT_PORTFOLIO = ['AAPL', 'GOOGL', 'MSFT', 'AMZN', 'TSLA'];

export const MARKET_INDICES: Record<string, string> = {
  '^GSPC': 'S&P 500',
  '^DJI': 'Dow Jones Industrial Average',
  '^IXIC': 'NASDAQ Composite',
  '^RUT': 'Russell 2000',
  '^VIX': 'CBOE Volatility Index',
};

export const DEFAULT_BENCHMARK = '^GSPC';
export const DEFAULT_ANALYSIS_PERIOD_DAYS = 365;
export const DEFAULT_RISK_FREE_RATE = 0.02;     // Annual
export const DEFAULT_VAR_CONFIDENCE = 0.95;     // 5th percentile of daily returns
export const TRADING_DAYS_PER_YEAR = 252;
export const MAX_PORTFOLIO_SIZE = 20;

export const DEFAULT_CACHE_TTL_SECONDS = 3600;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// ============================================
// ENVIRONMENT
// ============================================

export interface RuntimeSettings {
  benchmark: string;
  analysisPeriodDays: number;
  riskFreeRate: number;
  varConfidence: number;
  tradingDaysPerYear: number;
  cacheEnabled: boolean;
  cachePath: string | undefined;
  cacheTtlSeconds: number;
  requestTimeoutMs: number;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`, { name, raw });
  }
  return value;
}

/**
 * Resolve runtime settings from environment variables (see .env.example)
 */
export function loadRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  return {
    benchmark: env.BENCHMARK_SYMBOL?.trim().toUpperCase() || DEFAULT_BENCHMARK,
    analysisPeriodDays: readNumber(env, 'ANALYSIS_PERIOD_DAYS', DEFAULT_ANALYSIS_PERIOD_DAYS),
    riskFreeRate: readNumber(env, 'RISK_FREE_RATE', DEFAULT_RISK_FREE_RATE),
    varConfidence: readNumber(env, 'VAR_CONFIDENCE', DEFAULT_VAR_CONFIDENCE),
    tradingDaysPerYear: readNumber(env, 'TRADING_DAYS_PER_YEAR', TRADING_DAYS_PER_YEAR),
    cacheEnabled: env.PRICE_CACHE_ENABLED?.toLowerCase() !== 'false',
    cachePath: env.PRICE_CACHE_PATH || undefined,
    cacheTtlSeconds: readNumber(env, 'PRICE_CACHE_TTL_SECONDS', DEFAULT_CACHE_TTL_SECONDS),
    requestTimeoutMs: readNumber(env, 'REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
  };
}

// ============================================
// DATES
// ============================================

export function toIsoDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * Parse a YYYY-MM-DD string, rejecting impossible calendar dates
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return toIsoDate(date) === value ? date : null;
}

/**
 * Default window: the last `days` calendar days ending on `now`
 */
export function defaultDateRange(
  days: number = DEFAULT_ANALYSIS_PERIOD_DAYS,
  now: Date = new Date()
): { startDate: string; endDate: string } {
  const start = new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
  return { startDate: toIsoDate(start), endDate: toIsoDate(now) };
}

// ============================================
// VALIDATION
// ============================================

export function normalizeSymbols(symbols: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of symbols) {
    const symbol = raw.trim().toUpperCase();
    if (!symbol || seen.has(symbol)) continue;
    seen.add(symbol);
    out.push(symbol);
  }
  return out;
}

/**
 * Validate an analysis request and fill in defaults
 */
export function validateAnalysisConfig(
  input: AnalysisConfigInput,
  now: Date = new Date()
): AnalysisConfig {
  const symbols = normalizeSymbols(input.symbols);
  if (symbols.length === 0) {
    throw new ConfigurationError('Symbol list is empty');
  }
  if (symbols.length > MAX_PORTFOLIO_SIZE) {
    throw new ConfigurationError(
      `Too many symbols: ${symbols.length} (max ${MAX_PORTFOLIO_SIZE})`,
      { count: symbols.length, max: MAX_PORTFOLIO_SIZE }
    );
  }

  const range = defaultDateRange(DEFAULT_ANALYSIS_PERIOD_DAYS, now);
  const startDate = input.startDate ?? range.startDate;
  const endDate = input.endDate ?? range.endDate;
  const start = parseIsoDate(startDate);
  const end = parseIsoDate(endDate);

  if (!start) throw new ConfigurationError(`Invalid start date: ${startDate}`, { startDate });
  if (!end) throw new ConfigurationError(`Invalid end date: ${endDate}`, { endDate });
  if (start.getTime() >= end.getTime()) {
    throw new ConfigurationError(`Start date ${startDate} must be before end date ${endDate}`, {
      startDate,
      endDate,
    });
  }

  const benchmark = (input.benchmark ?? DEFAULT_BENCHMARK).trim().toUpperCase();
  if (!benchmark) {
    throw new ConfigurationError('Benchmark symbol is empty');
  }

  const riskFreeRate = input.riskFreeRate ?? DEFAULT_RISK_FREE_RATE;
  if (!Number.isFinite(riskFreeRate)) {
    throw new ConfigurationError(`Risk-free rate must be a finite number, got ${riskFreeRate}`);
  }

  const varConfidence = input.varConfidence ?? DEFAULT_VAR_CONFIDENCE;
  assertConfidence(varConfidence);

  const tradingDaysPerYear = input.tradingDaysPerYear ?? TRADING_DAYS_PER_YEAR;
  if (!Number.isInteger(tradingDaysPerYear) || tradingDaysPerYear <= 0) {
    throw new ConfigurationError(
      `Trading days per year must be a positive integer, got ${tradingDaysPerYear}`
    );
  }

  return { symbols, startDate, endDate, benchmark, riskFreeRate, varConfidence, tradingDaysPerYear };
}

export function assertConfidence(confidence: number): void {
  if (!(confidence > 0 && confidence < 1)) {
    throw new ConfigurationError(`VaR confidence must be in (0, 1), got ${confidence}`, { confidence });
  }
}
