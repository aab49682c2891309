import type { MarketDataProvider } from '../lib/data-services/price-provider';
import { DataUnavailableError } from '../lib/risk/errors';
import { buildReturnSeries } from '../lib/risk/returns';
import type { PortfolioResult, PriceSeries, RiskMetricsRecord } from '../lib/risk/types';

/**
 * Consecutive January 2024 dates starting on the given day
 */
export function januaryDates(count: number, firstDay: number = 2): string[] {
  return Array.from({ length: count }, (_, i) => `2024-01-${String(firstDay + i).padStart(2, '0')}`);
}

export function priceSeries(symbol: string, prices: number[], firstDay: number = 2): PriceSeries {
  const dates = januaryDates(prices.length, firstDay);
  return { symbol, points: prices.map((price, i) => ({ date: dates[i], price })) };
}

/**
 * In-memory provider: known symbols resolve, anything else is unavailable.
 * A function value lets a test control timing or failures per symbol.
 */
export class FakeMarketDataProvider implements MarketDataProvider {
  readonly calls: string[] = [];

  constructor(private readonly data: Record<string, PriceSeries | (() => Promise<PriceSeries>)>) {}

  async getPriceSeries(symbol: string): Promise<PriceSeries> {
    this.calls.push(symbol);
    const entry = this.data[symbol];
    if (entry === undefined) {
      throw new DataUnavailableError(`${symbol}: no data`, { symbol });
    }
    return typeof entry === 'function' ? entry() : entry;
  }
}

// ============================================
// EXPORT FIXTURE
// ============================================

export const SAMPLE_PRICES = {
  aaplPrices: priceSeries('AAPL', [100, 110, 99]),
  benchPrices: priceSeries('^GSPC', [200, 202, 204, 206], 1),
};

const aaplRecord: RiskMetricsRecord = {
  symbol: 'AAPL',
  volatility: 0.3,
  beta: 1.25,
  sharpeRatio: null,
  valueAtRisk: -0.0123,
  maxDrawdown: -0.1,
  totalReturn: -0.01,
  observations: 2,
  varConfidence: 0.95,
  issues: [],
};

/**
 * A finished run over AAPL (analyzed) and BAD (failed when withErrors is set)
 */
export function sampleResult(options: { withErrors?: boolean; benchmarkFailed?: boolean } = {}): PortfolioResult {
  const { aaplPrices, benchPrices } = SAMPLE_PRICES;
  const prices = new Map<string, PriceSeries>();
  if (!options.benchmarkFailed) prices.set('^GSPC', benchPrices);
  prices.set('AAPL', aaplPrices);

  return {
    config: {
      symbols: ['AAPL', 'BAD'],
      startDate: '2024-01-01',
      endDate: '2024-01-31',
      benchmark: '^GSPC',
      riskFreeRate: 0.02,
      varConfidence: 0.95,
      tradingDaysPerYear: 252,
    },
    table: new Map([['AAPL', aaplRecord]]),
    errors: options.withErrors ? [{ symbol: 'BAD', kind: 'DATA_UNAVAILABLE', message: 'BAD: no data, try later' }] : [],
    benchmarkReturns: options.benchmarkFailed ? null : buildReturnSeries(benchPrices),
    benchmarkError: options.benchmarkFailed
      ? { symbol: '^GSPC', kind: 'DATA_UNAVAILABLE', message: '^GSPC: no data' }
      : null,
    prices,
    returns: new Map([['AAPL', buildReturnSeries(aaplPrices)]]),
  };
}
