/**
 * Risk Module
 * Exports the return builder, metric calculator, aggregator and report helpers
 */

export { buildReturnSeries, alignReturnSeries, cumulativeCurve } from './returns';

export {
  annualizedVolatility,
  beta,
  sharpeRatio,
  historicalVaR,
  maxDrawdown,
  totalReturn,
} from './metrics';

export { computeRiskMetrics, DEFAULT_METRIC_OPTIONS } from './calculator';
export { analyzePortfolio } from './aggregator';

export {
  DEFAULT_PORTFOLIO,
  DEFAULT_BENCHMARK,
  MARKET_INDICES,
  MAX_PORTFOLIO_SIZE,
  loadRuntimeSettings,
  validateAnalysisConfig,
  defaultDateRange,
} from './config';

export {
  RiskError,
  InsufficientDataError,
  DataUnavailableError,
  DivisionByZeroError,
  ConfigurationError,
  SeriesAlignmentError,
  isRiskError,
  toRiskError,
  toSymbolError,
} from './errors';

export {
  generateSummaryReport,
  summaryColumns,
  classifyRisk,
  portfolioOverview,
  correlationMatrix,
  returnsHistogram,
  drawdownCurve,
  RISK_THRESHOLDS,
} from './report';

// Types
export type { AnalyzeOptions } from './aggregator';
export type { RuntimeSettings } from './config';
export type {
  SummaryRow,
  SummaryColumn,
  RiskRating,
  RiskLevel,
  SharpeQuality,
  PortfolioOverview,
  CorrelationMatrix,
  HistogramBin,
  DrawdownPoint,
} from './report';
export type {
  PricePoint,
  PriceSeries,
  ReturnSeries,
  AlignedReturns,
  RiskMetricName,
  RiskErrorKind,
  MetricIssue,
  RiskMetricsRecord,
  MetricOptions,
  AnalysisConfig,
  AnalysisConfigInput,
  SymbolError,
  PortfolioResult,
} from './types';
