/**
 * Portfolio Aggregator
 * Fetch → returns → risk record for every configured symbol.
 * A failing symbol is recorded in the error list and never aborts the batch.
 */

import type { MarketDataProvider } from '../data-services/price-provider';
import { computeRiskMetrics } from './calculator';
import { validateAnalysisConfig } from './config';
import { RiskError, toSymbolError } from './errors';
import { buildReturnSeries } from './returns';
import type {
  AnalysisConfigInput,
  PortfolioResult,
  PriceSeries,
  ReturnSeries,
  RiskMetricsRecord,
  SymbolError,
} from './types';

export interface AnalyzeOptions {
  /** Symbols processed in parallel per batch (default 1: one after another) */
  concurrency?: number;
  /** Suppress per-symbol progress lines */
  quiet?: boolean;
  now?: Date;
}

type SymbolOutcome =
  | { ok: true; prices: PriceSeries; returns: ReturnSeries; record: RiskMetricsRecord }
  | { ok: false; error: SymbolError };

/**
 * Run the full analysis for a portfolio.
 * Only configuration errors reject the whole run. A failing benchmark costs
 * every symbol its beta; any other failure is isolated to its symbol.
 */
export async function analyzePortfolio(
  input: AnalysisConfigInput,
  provider: MarketDataProvider,
  options: AnalyzeOptions = {}
): Promise<PortfolioResult> {
  const config = validateAnalysisConfig(input, options.now);
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const log = (message: string) => {
    if (!options.quiet) console.log(`[RiskAnalysis] ${message}`);
  };

  log(`Analyzing ${config.symbols.length} symbol(s) vs ${config.benchmark} from ${config.startDate} to ${config.endDate}`);

  let benchmarkPrices: PriceSeries | null = null;
  let benchmarkReturns: ReturnSeries | null = null;
  let benchmarkError: SymbolError | null = null;
  let benchmark: ReturnSeries | RiskError;

  try {
    benchmarkPrices = await provider.getPriceSeries(config.benchmark, config.startDate, config.endDate);
    benchmarkReturns = buildReturnSeries(benchmarkPrices);
    benchmark = benchmarkReturns;
  } catch (error) {
    benchmarkError = toSymbolError(config.benchmark, error);
    benchmark = new RiskError(
      benchmarkError.kind,
      `Benchmark ${config.benchmark} unavailable: ${benchmarkError.message}`,
      { benchmark: config.benchmark }
    );
    log(`✗ benchmark ${config.benchmark} - ${benchmarkError.kind}: ${benchmarkError.message} (beta unavailable)`);
  }

  const analyzeSymbol = async (symbol: string): Promise<SymbolOutcome> => {
    try {
      const prices = await provider.getPriceSeries(symbol, config.startDate, config.endDate);
      const returns = buildReturnSeries(prices);
      const record = computeRiskMetrics(returns, benchmark, config);
      return { ok: true, prices, returns, record };
    } catch (error) {
      return { ok: false, error: toSymbolError(symbol, error) };
    }
  };

  const outcomes = new Map<string, SymbolOutcome>();

  for (let i = 0; i < config.symbols.length; i += concurrency) {
    const batch = config.symbols.slice(i, i + concurrency);
    const batchResults = await Promise.all(batch.map(analyzeSymbol));

    batch.forEach((symbol, j) => {
      const outcome = batchResults[j];
      outcomes.set(symbol, outcome);
      if (outcome.ok) {
        const issues = outcome.record.issues.map(issue => issue.metric).join(', ');
        log(`✓ ${symbol} (${outcome.record.observations} returns)${issues ? ` - unavailable: ${issues}` : ''}`);
      } else {
        log(`✗ ${symbol} - ${outcome.error.kind}: ${outcome.error.message}`);
      }
    });
  }

  const result: PortfolioResult = {
    config,
    table: new Map(),
    errors: [],
    benchmarkReturns,
    benchmarkError,
    prices: new Map(),
    returns: new Map(),
  };

  if (benchmarkPrices) {
    result.prices.set(config.benchmark, benchmarkPrices);
  }

  // Configured order, regardless of completion order
  for (const symbol of config.symbols) {
    const outcome = outcomes.get(symbol);
    if (!outcome) continue;
    if (outcome.ok) {
      result.table.set(symbol, outcome.record);
      result.prices.set(symbol, outcome.prices);
      result.returns.set(symbol, outcome.returns);
    } else {
      result.errors.push(outcome.error);
    }
  }

  log(`Completed: ${result.table.size} analyzed, ${result.errors.length} failed`);
  return result;
}
