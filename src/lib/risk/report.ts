/**
 * Presentation data for the analysis: summary rows, risk ratings,
 * portfolio overview, correlation matrix and chart series.
 * Nothing here feeds back into the computation.
 */

import { alignReturnSeries, cumulativeCurve } from './returns';
import { pearsonCorrelation } from './stats';
import type { PortfolioResult, ReturnSeries, RiskMetricsRecord } from './types';

// ============================================
// SUMMARY TABLE
// ============================================

export interface SummaryRow {
  symbol: string;
  totalReturnPct: number | null;
  volatilityPct: number | null;
  beta: number | null;
  sharpeRatio: number | null;
  valueAtRiskPct: number | null;
  maxDrawdownPct: number | null;
}

export interface SummaryColumn {
  key: keyof SummaryRow;
  label: string;
}

function round(value: number | null, decimals: number): number | null {
  if (value === null) return null;
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function pct(value: number | null): number | null {
  return value === null ? null : round(value * 100, 2);
}

/**
 * "VaR 95% (%)" for a confidence of 0.95
 */
export function varLabel(confidence: number): string {
  return `VaR ${round(confidence * 100, 2)}% (%)`;
}

export function summaryColumns(varConfidence: number): SummaryColumn[] {
  return [
    { key: 'symbol', label: 'Symbol' },
    { key: 'totalReturnPct', label: 'Total Return (%)' },
    { key: 'volatilityPct', label: 'Volatility (%)' },
    { key: 'beta', label: 'Beta' },
    { key: 'sharpeRatio', label: 'Sharpe Ratio' },
    { key: 'valueAtRiskPct', label: varLabel(varConfidence) },
    { key: 'maxDrawdownPct', label: 'Max Drawdown (%)' },
  ];
}

export function toSummaryRow(record: RiskMetricsRecord): SummaryRow {
  return {
    symbol: record.symbol,
    totalReturnPct: pct(record.totalReturn),
    volatilityPct: pct(record.volatility),
    beta: round(record.beta, 3),
    sharpeRatio: round(record.sharpeRatio, 3),
    valueAtRiskPct: pct(record.valueAtRisk),
    maxDrawdownPct: pct(record.maxDrawdown),
  };
}

/**
 * One row per analyzed symbol, in configured order
 */
export function generateSummaryReport(result: PortfolioResult): SummaryRow[] {
  return Array.from(result.table.values(), toSummaryRow);
}

// ============================================
// RISK RATINGS
// ============================================

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';
export type SharpeQuality = 'POOR' | 'FAIR' | 'GOOD';

export const RISK_THRESHOLDS = {
  volatility: { low: 0.2, high: 0.3 },
  beta: { low: 0.8, high: 1.2 },
  sharpeRatio: { low: 0.5, high: 1.0 },
} as const;

export interface RiskRating {
  symbol: string;
  volatility: RiskLevel | null;
  beta: RiskLevel | null;
  sharpeRatio: SharpeQuality | null;
}

/**
 * LOW up to and including `low`, MEDIUM up to and including `high`, HIGH above
 */
function level(value: number | null, bounds: { low: number; high: number }): RiskLevel | null {
  if (value === null) return null;
  if (value > bounds.high) return 'HIGH';
  if (value > bounds.low) return 'MEDIUM';
  return 'LOW';
}

export function classifyRisk(record: RiskMetricsRecord): RiskRating {
  const sharpe = level(record.sharpeRatio, RISK_THRESHOLDS.sharpeRatio);
  return {
    symbol: record.symbol,
    volatility: level(record.volatility, RISK_THRESHOLDS.volatility),
    beta: level(record.beta, RISK_THRESHOLDS.beta),
    sharpeRatio: sharpe === null ? null : sharpe === 'HIGH' ? 'GOOD' : sharpe === 'MEDIUM' ? 'FAIR' : 'POOR',
  };
}

// ============================================
// PORTFOLIO OVERVIEW
// ============================================

export interface PortfolioOverview {
  analyzed: number;
  failed: number;
  avgTotalReturn: number | null;
  avgVolatility: number | null;
  avgBeta: number | null;
  avgSharpeRatio: number | null;
}

function average(values: (number | null)[]): number | null {
  const present = values.filter((v): v is number => v !== null);
  if (present.length === 0) return null;
  return present.reduce((sum, v) => sum + v, 0) / present.length;
}

/**
 * Equal-weighted averages over the symbols where each metric is available
 */
export function portfolioOverview(result: PortfolioResult): PortfolioOverview {
  const records = Array.from(result.table.values());
  return {
    analyzed: records.length,
    failed: result.errors.length,
    avgTotalReturn: average(records.map(r => r.totalReturn)),
    avgVolatility: average(records.map(r => r.volatility)),
    avgBeta: average(records.map(r => r.beta)),
    avgSharpeRatio: average(records.map(r => r.sharpeRatio)),
  };
}

// ============================================
// CORRELATION
// ============================================

export interface CorrelationMatrix {
  symbols: string[];
  values: (number | null)[][];
}

/**
 * Pairwise Pearson correlation of daily returns on shared dates
 */
export function correlationMatrix(result: PortfolioResult): CorrelationMatrix {
  const symbols = Array.from(result.returns.keys());
  const series = symbols.map(s => result.returns.get(s)).filter((s): s is ReturnSeries => s !== undefined);

  const values = series.map((a, i) =>
    series.map((b, j) => {
      if (i === j) return 1;
      const aligned = alignReturnSeries(a, b);
      const r = pearsonCorrelation(aligned.a, aligned.b);
      return Number.isFinite(r) ? r : null;
    })
  );

  return { symbols, values };
}

// ============================================
// CHART SERIES
// ============================================

export interface HistogramBin {
  from: number;
  to: number;
  count: number;
}

/**
 * Equal-width histogram of returns; the last bin is closed on the right
 */
export function returnsHistogram(returns: number[], bins: number = 30): HistogramBin[] {
  if (returns.length === 0 || bins < 1) return [];

  const min = Math.min(...returns);
  const max = Math.max(...returns);
  const width = max > min ? (max - min) / bins : 1;
  const out: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    from: min + i * width,
    to: min + (i + 1) * width,
    count: 0,
  }));

  for (const r of returns) {
    const index = Math.min(bins - 1, Math.floor((r - min) / width));
    out[index].count++;
  }
  return out;
}

export interface DrawdownPoint {
  date: string;
  value: number;     // Growth of 1 unit
  drawdown: number;  // Fraction below the running peak
}

export function drawdownCurve(series: ReturnSeries): DrawdownPoint[] {
  let peak = 1;
  return cumulativeCurve(series.returns).map((value, i) => {
    if (value > peak) peak = value;
    return { date: series.dates[i], value, drawdown: value / peak - 1 };
  });
}
