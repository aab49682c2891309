/**
 * Per-symbol risk record assembly.
 * Runs each metric independently so one degenerate input (for example a
 * constant benchmark or a single return) only blanks the metric it affects.
 */

import { DEFAULT_RISK_FREE_RATE, DEFAULT_VAR_CONFIDENCE, TRADING_DAYS_PER_YEAR } from './config';
import { InsufficientDataError, isRiskError, RiskError } from './errors';
import {
  annualizedVolatility,
  beta,
  historicalVaR,
  maxDrawdown,
  sharpeRatio,
  totalReturn,
} from './metrics';
import { alignReturnSeries } from './returns';
import type { MetricIssue, MetricOptions, ReturnSeries, RiskMetricName, RiskMetricsRecord } from './types';

export const DEFAULT_METRIC_OPTIONS: MetricOptions = {
  riskFreeRate: DEFAULT_RISK_FREE_RATE,
  varConfidence: DEFAULT_VAR_CONFIDENCE,
  tradingDaysPerYear: TRADING_DAYS_PER_YEAR,
};

function attempt(
  metric: RiskMetricName,
  issues: MetricIssue[],
  observations: number,
  compute: () => number
): number | null {
  try {
    const value = compute();
    if (Number.isFinite(value)) return value;
    issues.push({
      metric,
      kind: 'INSUFFICIENT_DATA',
      message: `${metric} is undefined for ${observations} return observation(s)`,
    });
    return null;
  } catch (error) {
    if (!isRiskError(error)) throw error;
    issues.push({ metric, kind: error.kind, message: error.message });
    return null;
  }
}

/**
 * Compute the full risk record for one symbol against the benchmark.
 * Single-series metrics use the symbol's own history; beta uses the dates
 * both series share. When the benchmark itself failed, its error is passed
 * in place of the series and only beta is lost.
 */
export function computeRiskMetrics(
  stock: ReturnSeries,
  benchmark: ReturnSeries | RiskError,
  options: Partial<MetricOptions> = {}
): RiskMetricsRecord {
  const { riskFreeRate, varConfidence, tradingDaysPerYear } = { ...DEFAULT_METRIC_OPTIONS, ...options };
  const returns = stock.returns;
  const n = returns.length;

  if (n === 0) {
    throw new InsufficientDataError(`${stock.symbol}: no return observations`, {
      symbol: stock.symbol,
      observations: 0,
    });
  }

  const issues: MetricIssue[] = [];
  const aligned = benchmark instanceof RiskError ? benchmark : alignReturnSeries(stock, benchmark);

  const record: RiskMetricsRecord = {
    symbol: stock.symbol,
    volatility: attempt('volatility', issues, n, () => annualizedVolatility(returns, tradingDaysPerYear)),
    beta: attempt('beta', issues, n, () => {
      if (aligned instanceof RiskError) throw aligned;
      return beta(aligned.a, aligned.b);
    }),
    sharpeRatio: attempt('sharpeRatio', issues, n, () => sharpeRatio(returns, riskFreeRate, tradingDaysPerYear)),
    valueAtRisk: attempt('valueAtRisk', issues, n, () => historicalVaR(returns, varConfidence)),
    maxDrawdown: attempt('maxDrawdown', issues, n, () => maxDrawdown(returns)),
    totalReturn: attempt('totalReturn', issues, n, () => totalReturn(returns)),
    observations: n,
    varConfidence,
    issues,
  };

  Object.freeze(issues);
  return Object.freeze(record);
}
