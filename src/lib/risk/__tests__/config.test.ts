import { describe, expect, it } from 'vitest';

import {
  DEFAULT_ANALYSIS_PERIOD_DAYS,
  defaultDateRange,
  loadRuntimeSettings,
  normalizeSymbols,
  parseIsoDate,
  validateAnalysisConfig,
} from '../config';
import { ConfigurationError } from '../errors';
import type { AnalysisConfigInput } from '../types';

const now = new Date('2024-06-30T12:00:00Z');

describe('loadRuntimeSettings', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadRuntimeSettings({})).toEqual({
      benchmark: '^GSPC',
      analysisPeriodDays: 365,
      riskFreeRate: 0.02,
      varConfidence: 0.95,
      tradingDaysPerYear: 252,
      cacheEnabled: true,
      cachePath: undefined,
      cacheTtlSeconds: 3600,
      requestTimeoutMs: 30000,
    });
  });

  it('reads overrides', () => {
    const settings = loadRuntimeSettings({
      BENCHMARK_SYMBOL: ' ^ixic ',
      RISK_FREE_RATE: '0.045',
      PRICE_CACHE_ENABLED: 'FALSE',
      PRICE_CACHE_PATH: '/tmp/prices.sqlite',
      REQUEST_TIMEOUT_MS: '5000',
    });

    expect(settings.benchmark).toBe('^IXIC');
    expect(settings.riskFreeRate).toBe(0.045);
    expect(settings.cacheEnabled).toBe(false);
    expect(settings.cachePath).toBe('/tmp/prices.sqlite');
    expect(settings.requestTimeoutMs).toBe(5000);
  });

  it('rejects non-numeric values', () => {
    expect(() => loadRuntimeSettings({ VAR_CONFIDENCE: 'high' })).toThrow(ConfigurationError);
  });
});

describe('dates', () => {
  it('parses valid calendar dates only', () => {
    expect(parseIsoDate('2024-02-29')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
    expect(parseIsoDate('2023-02-29')).toBeNull();
    expect(parseIsoDate('2024-1-5')).toBeNull();
    expect(parseIsoDate('yesterday')).toBeNull();
  });

  it('defaults to the last year ending today', () => {
    expect(defaultDateRange(DEFAULT_ANALYSIS_PERIOD_DAYS, now)).toEqual({
      startDate: '2023-07-01',
      endDate: '2024-06-30',
    });
  });
});

describe('normalizeSymbols', () => {
  it('trims, upper-cases and de-duplicates in order', () => {
    expect(normalizeSymbols([' msft', 'AAPL', '', 'msft ', '^gspc'])).toEqual(['MSFT', 'AAPL', '^GSPC']);
  });
});

describe('validateAnalysisConfig', () => {
  it('fills in defaults', () => {
    expect(validateAnalysisConfig({ symbols: ['aapl'] }, now)).toEqual({
      symbols: ['AAPL'],
      startDate: '2023-07-01',
      endDate: '2024-06-30',
      benchmark: '^GSPC',
      riskFreeRate: 0.02,
      varConfidence: 0.95,
      tradingDaysPerYear: 252,
    });
  });

  const invalid: [string, AnalysisConfigInput][] = [
    ['an empty symbol list', { symbols: [] }],
    ['only blank symbols', { symbols: ['  ', ''] }],
    ['more than 20 symbols', { symbols: Array.from({ length: 21 }, (_, i) => `S${i}`) }],
    ['an impossible start date', { symbols: ['AAPL'], startDate: '2024-13-01' }],
    ['an unparseable end date', { symbols: ['AAPL'], endDate: 'soon' }],
    ['start equal to end', { symbols: ['AAPL'], startDate: '2024-01-01', endDate: '2024-01-01' }],
    ['start after end', { symbols: ['AAPL'], startDate: '2024-03-01', endDate: '2024-01-01' }],
    ['a blank benchmark', { symbols: ['AAPL'], benchmark: ' ' }],
    ['a non-finite risk-free rate', { symbols: ['AAPL'], riskFreeRate: NaN }],
    ['a confidence of 1', { symbols: ['AAPL'], varConfidence: 1 }],
    ['a confidence of 0', { symbols: ['AAPL'], varConfidence: 0 }],
    ['fractional trading days', { symbols: ['AAPL'], tradingDaysPerYear: 252.5 }],
    ['zero trading days', { symbols: ['AAPL'], tradingDaysPerYear: 0 }],
  ];

  it.each(invalid)('rejects %s', (_label, input) => {
    expect(() => validateAnalysisConfig(input, now)).toThrow(ConfigurationError);
  });

  it('accepts exactly 20 symbols', () => {
    const symbols = Array.from({ length: 20 }, (_, i) => `S${i}`);
    expect(validateAnalysisConfig({ symbols }, now).symbols).toHaveLength(20);
  });
});
