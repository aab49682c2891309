/**
 * Tabular views of an analysis run, shared by the CSV and workbook writers
 */

import { generateSummaryReport, summaryColumns } from '../risk/report';
import type { PortfolioResult, PriceSeries, ReturnSeries, SymbolError } from '../risk/types';

export type CellValue = string | number | null | undefined;

export interface Table {
  headers: string[];
  rows: CellValue[][];
}

export function summaryTable(result: PortfolioResult): Table {
  const columns = summaryColumns(result.config.varConfidence);
  return {
    headers: columns.map(c => c.label),
    rows: generateSummaryReport(result).map(row => columns.map(c => row[c.key])),
  };
}

/**
 * Date + one column per symbol, dates ascending, undefined where a symbol has no value
 */
function wideTable(columns: { name: string; values: Map<string, number> }[]): Table {
  const dates = new Set<string>();
  for (const column of columns) {
    for (const date of column.values.keys()) dates.add(date);
  }

  return {
    headers: ['Date', ...columns.map(c => c.name)],
    rows: Array.from(dates)
      .sort()
      .map(date => [date, ...columns.map(c => c.values.get(date))]),
  };
}

export function returnsTable(series: ReturnSeries[]): Table {
  return wideTable(
    series.map(s => ({
      name: s.symbol,
      values: new Map(s.dates.map((date, i) => [date, s.returns[i]])),
    }))
  );
}

export function pricesTable(series: PriceSeries[]): Table {
  return wideTable(
    series.map(s => ({
      name: s.symbol,
      values: new Map(s.points.map(p => [p.date, p.price])),
    }))
  );
}

export function errorsTable(errors: SymbolError[]): Table {
  return {
    headers: ['Symbol', 'Error', 'Message'],
    rows: errors.map(e => [e.symbol, e.kind, e.message]),
  };
}

/**
 * Benchmark first (when it was usable), then each analyzed symbol
 */
export function analysisReturns(result: PortfolioResult): ReturnSeries[] {
  const series = new Map<string, ReturnSeries>();
  if (result.benchmarkReturns) {
    series.set(result.config.benchmark, result.benchmarkReturns);
  }
  for (const [symbol, returns] of result.returns) {
    series.set(symbol, returns);
  }
  return Array.from(series.values());
}

/**
 * Symbol failures plus the benchmark's, if it failed
 */
export function analysisErrors(result: PortfolioResult): SymbolError[] {
  return result.benchmarkError ? [result.benchmarkError, ...result.errors] : result.errors;
}
