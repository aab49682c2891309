/**
 * CSV Export
 *
 * Delimited-text output of an analysis run: the summary table, the wide
 * daily returns and price tables, and the per-symbol error list.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { PortfolioResult, PriceSeries, ReturnSeries, SymbolError } from '../risk/types';
import {
  analysisErrors,
  analysisReturns,
  errorsTable,
  pricesTable,
  returnsTable,
  summaryTable,
  type CellValue,
  type Table,
} from './tables';

/**
 * Escape a value for CSV format
 * Handles: commas, quotes, newlines
 */
export function escapeCSVValue(value: CellValue): string {
  if (value === null || value === undefined) {
    return '';
  }

  const stringValue = String(value);

  const needsEscaping = stringValue.includes(',') ||
    stringValue.includes('"') ||
    stringValue.includes('\n') ||
    stringValue.includes('\r');

  if (needsEscaping) {
    return `"${stringValue.replace(/"/g, '""')}"`;
  }

  return stringValue;
}

export function toCsv({ headers, rows }: Table): string {
  const lines = [headers, ...rows].map(row => row.map(escapeCSVValue).join(','));
  return lines.join('\n') + '\n';
}

// ============================================
// TABLES
// ============================================

export function summaryToCsv(result: PortfolioResult): string {
  return toCsv(summaryTable(result));
}

export function returnsToCsv(series: ReturnSeries[]): string {
  return toCsv(returnsTable(series));
}

export function pricesToCsv(series: PriceSeries[]): string {
  return toCsv(pricesTable(series));
}

export function errorsToCsv(errors: SymbolError[]): string {
  return toCsv(errorsTable(errors));
}

// ============================================
// FILES
// ============================================

/**
 * Write <base>.csv, <base>_returns.csv, <base>_prices.csv and, when any
 * symbol or the benchmark failed, <base>_errors.csv. Returns the paths written.
 */
export function writeAnalysisExport(
  result: PortfolioResult,
  baseName: string = 'portfolio_risk_data',
  outDir: string = process.cwd()
): string[] {
  if (!fs.existsSync(outDir)) {
    fs.mkdirSync(outDir, { recursive: true });
  }

  const errors = analysisErrors(result);
  const files: [string, string][] = [
    [`${baseName}.csv`, summaryToCsv(result)],
    [`${baseName}_returns.csv`, returnsToCsv(analysisReturns(result))],
    [`${baseName}_prices.csv`, pricesToCsv(Array.from(result.prices.values()))],
  ];
  if (errors.length > 0) {
    files.push([`${baseName}_errors.csv`, errorsToCsv(errors)]);
  }

  return files.map(([name, content]) => {
    const filePath = path.join(outDir, name);
    fs.writeFileSync(filePath, content, 'utf8');
    return filePath;
  });
}
