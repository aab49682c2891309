/**
 * Risk Metric Calculator
 * Closed-form risk statistics over daily return arrays.
 * Every function is pure and independent of the others.
 */

import { assertConfidence, DEFAULT_VAR_CONFIDENCE, TRADING_DAYS_PER_YEAR } from './config';
import { DivisionByZeroError, InsufficientDataError, SeriesAlignmentError } from './errors';
import { cumulativeCurve } from './returns';
import { mean, percentile, sampleCovariance, sampleStd, sampleVariance } from './stats';

function requireObservations(returns: number[], min: number, metric: string): void {
  if (returns.length < min) {
    throw new InsufficientDataError(
      `${metric} needs at least ${min} return observation(s), got ${returns.length}`,
      { metric, observations: returns.length }
    );
  }
}

/**
 * Sample standard deviation of daily returns scaled by sqrt(trading days).
 * NaN with fewer than two observations.
 */
export function annualizedVolatility(
  returns: number[],
  tradingDaysPerYear: number = TRADING_DAYS_PER_YEAR
): number {
  if (returns.length < 2) return NaN;
  return sampleStd(returns) * Math.sqrt(tradingDaysPerYear);
}

/**
 * cov(stock, benchmark) / var(benchmark).
 * Both arrays must already be aligned to the same dates.
 */
export function beta(stockReturns: number[], benchmarkReturns: number[]): number {
  if (stockReturns.length !== benchmarkReturns.length) {
    throw new SeriesAlignmentError(
      `Beta inputs are not aligned: ${stockReturns.length} vs ${benchmarkReturns.length} observations`,
      { stock: stockReturns.length, benchmark: benchmarkReturns.length }
    );
  }
  requireObservations(benchmarkReturns, 2, 'Beta');

  const benchmarkVariance = sampleVariance(benchmarkReturns);
  if (benchmarkVariance === 0) {
    throw new DivisionByZeroError('Benchmark returns have zero variance');
  }
  return sampleCovariance(stockReturns, benchmarkReturns) / benchmarkVariance;
}

/**
 * (annualized mean return - risk-free rate) / annualized volatility
 */
export function sharpeRatio(
  returns: number[],
  riskFreeRate: number = 0,
  tradingDaysPerYear: number = TRADING_DAYS_PER_YEAR
): number {
  const volatility = annualizedVolatility(returns, tradingDaysPerYear);
  if (Number.isNaN(volatility)) return NaN;
  if (volatility === 0) {
    throw new DivisionByZeroError('Returns have zero volatility');
  }
  return (mean(returns) * tradingDaysPerYear - riskFreeRate) / volatility;
}

/**
 * Historical (empirical) Value-at-Risk: the return at the (1 - confidence)
 * percentile of the observed distribution. No distributional assumption.
 */
export function historicalVaR(
  returns: number[],
  confidence: number = DEFAULT_VAR_CONFIDENCE
): number {
  assertConfidence(confidence);
  requireObservations(returns, 1, 'VaR');
  return percentile(returns, 1 - confidence);
}

/**
 * Largest peak-to-trough decline of the cumulative value curve, as a
 * fraction in [-1, 0]. The curve starts from an initial value of 1.
 */
export function maxDrawdown(returns: number[]): number {
  requireObservations(returns, 1, 'Max drawdown');

  let peak = 1;
  let worst = 0;
  for (const value of cumulativeCurve(returns)) {
    if (value > peak) peak = value;
    const drawdown = value / peak - 1;
    if (drawdown < worst) worst = drawdown;
  }
  return worst;
}

export function totalReturn(returns: number[]): number {
  requireObservations(returns, 1, 'Total return');
  return returns.reduce((growth, r) => growth * (1 + r), 1) - 1;
}
