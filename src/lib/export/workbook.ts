/**
 * Excel Export
 * One workbook per run with Risk_Summary, Daily_Returns and Price_Data sheets
 * (plus Errors when anything failed).
 */

import * as fs from 'fs';
import * as path from 'path';

import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';

import type { PortfolioResult } from '../risk/types';
import {
  analysisErrors,
  analysisReturns,
  errorsTable,
  pricesTable,
  returnsTable,
  summaryTable,
  type Table,
} from './tables';

export const SHEET_NAMES = {
  summary: 'Risk_Summary',
  returns: 'Daily_Returns',
  prices: 'Price_Data',
  errors: 'Errors',
} as const;

function addSheet(workbook: Workbook, name: string, table: Table): void {
  const sheet = workbook.addWorksheet(name, { views: [{ state: 'frozen', ySplit: 1 }] });

  sheet.addRow(table.headers);
  sheet.getRow(1).font = { bold: true };

  for (const row of table.rows) {
    sheet.addRow(row.map(value => value ?? null));
  }

  table.headers.forEach((header, i) => {
    sheet.getColumn(i + 1).width = Math.max(12, header.length + 2);
  });
}

export function buildAnalysisWorkbook(result: PortfolioResult): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  addSheet(workbook, SHEET_NAMES.summary, summaryTable(result));
  addSheet(workbook, SHEET_NAMES.returns, returnsTable(analysisReturns(result)));
  addSheet(workbook, SHEET_NAMES.prices, pricesTable(Array.from(result.prices.values())));

  const errors = analysisErrors(result);
  if (errors.length > 0) {
    addSheet(workbook, SHEET_NAMES.errors, errorsTable(errors));
  }

  return workbook;
}

/**
 * Write <base>.xlsx into outDir and return its path
 */
export async function writeAnalysisWorkbook(
  result: PortfolioResult,
  baseName: string = 'portfolio_risk_analysis',
  outDir: string = process.cwd()
): Promise<string> {
  if (!fs.existsSync(outDir)) {
    fs.mkdirSync(outDir, { recursive: true });
  }

  const filePath = path.join(outDir, `${baseName}.xlsx`);
  await buildAnalysisWorkbook(result).xlsx.writeFile(filePath);
  return filePath;
}
