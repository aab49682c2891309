/**
 * Market Data Provider
 * Supplies daily adjusted-close series for a symbol over a date range.
 *
 * - YahooMarketDataProvider: Yahoo Finance chart API (yahoo-finance2)
 * - CachedMarketDataProvider: cache-before-fetch over the SQLite price cache
 *
 * Set PRICE_CACHE_ENABLED=false in .env.local to always hit the network.
 */

import { DEFAULT_CACHE_TTL_SECONDS, DEFAULT_REQUEST_TIMEOUT_MS, type RuntimeSettings } from '../risk/config';
import { DataUnavailableError, isRiskError } from '../risk/errors';
import type { PricePoint, PriceSeries } from '../risk/types';
import { withLogging } from './logger';
import { cachePrices, configurePriceCache, getCachedPrices } from './sqlite-cache';

// ============================================
// TYPES
// ============================================

export interface MarketDataProvider {
  /**
   * Ordered daily series for [startDate, endDate] (YYYY-MM-DD, inclusive).
   * Rejects with DataUnavailableError when nothing usable comes back.
   */
  getPriceSeries(symbol: string, startDate: string, endDate: string): Promise<PriceSeries>;
}

export interface ChartQuote {
  date: Date;
  close: number | null;
  adjclose?: number | null;
}

/**
 * The slice of the Yahoo Finance client this module depends on
 */
export interface ChartClient {
  fetchDailyQuotes(symbol: string, period1: Date, period2: Date): Promise<ChartQuote[]>;
}

// ============================================
// HELPERS
// ============================================

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DataUnavailableError(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Map raw chart rows to a price series: adjusted close preferred, rows with
 * no usable price dropped, one point per date, ascending.
 */
export function quotesToPriceSeries(symbol: string, quotes: ChartQuote[]): PriceSeries {
  const byDate = new Map<string, number>();

  for (const q of quotes) {
    const price = q.adjclose ?? q.close;
    if (price == null || !Number.isFinite(price)) continue;
    byDate.set(q.date.toISOString().split('T')[0], price);
  }

  const points: PricePoint[] = Array.from(byDate, ([date, price]) => ({ date, price }));
  points.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  return { symbol, points };
}

// ============================================
// YAHOO FINANCE
// ============================================

/**
 * Lazily loads yahoo-finance2 so importing this module stays cheap
 */
export function createYahooChartClient(): ChartClient {
  let client: InstanceType<typeof import('yahoo-finance2').default> | null = null;

  return {
    async fetchDailyQuotes(symbol, period1, period2) {
      if (!client) {
        const YahooFinance = (await import('yahoo-finance2')).default;
        client = new YahooFinance({ suppressNotices: ['yahooSurvey'] });
      }

      const chart = await client.chart(symbol, { period1, period2, interval: '1d' });
      return chart.quotes.map(q => ({ date: q.date, close: q.close, adjclose: q.adjclose }));
    },
  };
}

export class YahooMarketDataProvider implements MarketDataProvider {
  private readonly client: ChartClient;
  private readonly timeoutMs: number;

  constructor(client: ChartClient = createYahooChartClient(), timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS) {
    this.client = client;
    this.timeoutMs = timeoutMs;
  }

  async getPriceSeries(symbol: string, startDate: string, endDate: string): Promise<PriceSeries> {
    return withLogging('yahoo', 'chart', { symbol, startDate, endDate }, async () => {
      // period2 is exclusive upstream; push it one day out so endDate is included
      const period1 = new Date(`${startDate}T00:00:00Z`);
      const period2 = new Date(new Date(`${endDate}T00:00:00Z`).getTime() + 24 * 60 * 60 * 1000);

      let quotes: ChartQuote[];
      try {
        quotes = await withTimeout(
          this.client.fetchDailyQuotes(symbol, period1, period2),
          this.timeoutMs,
          `Yahoo chart request for ${symbol}`
        );
      } catch (error) {
        if (isRiskError(error)) throw error;
        throw new DataUnavailableError(
          `${symbol}: ${error instanceof Error ? error.message : String(error)}`,
          { symbol, startDate, endDate }
        );
      }

      const series = quotesToPriceSeries(symbol, quotes);
      const inRange = series.points.filter(p => p.date >= startDate && p.date <= endDate);

      if (inRange.length === 0) {
        throw new DataUnavailableError(`${symbol}: no price data between ${startDate} and ${endDate}`, {
          symbol,
          startDate,
          endDate,
        });
      }

      return { symbol, points: inRange };
    });
  }
}

// ============================================
// CACHING
// ============================================

export class CachedMarketDataProvider implements MarketDataProvider {
  private readonly upstream: MarketDataProvider;
  private readonly ttlSeconds: number;
  private readonly source: string;

  constructor(upstream: MarketDataProvider, ttlSeconds: number = DEFAULT_CACHE_TTL_SECONDS, source: string = 'yahoo') {
    this.upstream = upstream;
    this.ttlSeconds = ttlSeconds;
    this.source = source;
  }

  async getPriceSeries(symbol: string, startDate: string, endDate: string): Promise<PriceSeries> {
    try {
      const cached = getCachedPrices(symbol, startDate, endDate, this.ttlSeconds);
      if (cached && cached.length > 0) {
        return await withLogging('cache', 'read', { symbol, startDate, endDate }, async () => ({ symbol, points: cached }));
      }
    } catch (cacheError) {
      // Cache read failed, continue with the upstream fetch
      console.warn(`[PriceProvider] Cache read failed for ${symbol}:`, cacheError);
    }

    const series = await this.upstream.getPriceSeries(symbol, startDate, endDate);

    try {
      cachePrices(symbol, startDate, endDate, series.points, this.source);
    } catch (cacheError) {
      // Cache write failed, but we still have the data
      console.warn(`[PriceProvider] Cache write failed for ${symbol}:`, cacheError);
    }

    return series;
  }
}

// ============================================
// FACTORY
// ============================================

/**
 * Build the provider stack described by the runtime settings
 */
export function createMarketDataProvider(
  settings: Pick<RuntimeSettings, 'cacheEnabled' | 'cachePath' | 'cacheTtlSeconds' | 'requestTimeoutMs'>,
  client?: ChartClient
): MarketDataProvider {
  const yahoo = new YahooMarketDataProvider(client, settings.requestTimeoutMs);

  if (!settings.cacheEnabled) {
    return yahoo;
  }

  if (settings.cachePath) {
    configurePriceCache(settings.cachePath);
  }
  return new CachedMarketDataProvider(yahoo, settings.cacheTtlSeconds);
}
