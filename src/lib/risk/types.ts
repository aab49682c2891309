/**
 * Risk Analysis Types
 * Shared shapes for price series, return series and per-symbol risk records
 */

// ============================================
// SERIES
// ============================================

export interface PricePoint {
  date: string;   // YYYY-MM-DD
  price: number;  // Adjusted close (falls back to close)
}

export interface PriceSeries {
  symbol: string;
  points: PricePoint[];
}

/**
 * Period-over-period fractional returns.
 * dates[i] is the date of the later price of each pair.
 */
export interface ReturnSeries {
  symbol: string;
  dates: string[];
  returns: number[];
}

export interface AlignedReturns {
  dates: string[];
  a: number[];
  b: number[];
}

// ============================================
// METRICS
// ============================================

export type RiskMetricName =
  | 'volatility'
  | 'beta'
  | 'sharpeRatio'
  | 'valueAtRisk'
  | 'maxDrawdown'
  | 'totalReturn';

export type RiskErrorKind =
  | 'INSUFFICIENT_DATA'
  | 'DATA_UNAVAILABLE'
  | 'DIVISION_BY_ZERO'
  | 'CONFIGURATION'
  | 'SERIES_MISALIGNED';

/**
 * A metric that could not be computed for an otherwise valid symbol
 */
export interface MetricIssue {
  metric: RiskMetricName;
  kind: RiskErrorKind;
  message: string;
}

export interface RiskMetricsRecord {
  symbol: string;
  volatility: number | null;    // Annualized, >= 0
  beta: number | null;
  sharpeRatio: number | null;
  valueAtRisk: number | null;   // Return at the lower tail, typically negative
  maxDrawdown: number | null;   // In [-1, 0]
  totalReturn: number | null;
  observations: number;         // Return observations used
  varConfidence: number;
  issues: MetricIssue[];
}

export interface MetricOptions {
  riskFreeRate: number;
  varConfidence: number;
  tradingDaysPerYear: number;
}

// ============================================
// PORTFOLIO
// ============================================

export interface AnalysisConfig {
  symbols: string[];
  startDate: string;
  endDate: string;
  benchmark: string;
  riskFreeRate: number;
  varConfidence: number;
  tradingDaysPerYear: number;
}

export type AnalysisConfigInput = Partial<Omit<AnalysisConfig, 'symbols'>> & {
  symbols: readonly string[];
};

export interface SymbolError {
  symbol: string;
  kind: RiskErrorKind;
  message: string;
}

export interface PortfolioResult {
  config: AnalysisConfig;
  table: Map<string, RiskMetricsRecord>;
  errors: SymbolError[];
  benchmarkReturns: ReturnSeries | null;
  /** Set when the benchmark could not be fetched or had too few prices; beta is then null everywhere */
  benchmarkError: SymbolError | null;
  prices: Map<string, PriceSeries>;
  returns: Map<string, ReturnSeries>;
}
