import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import ExcelJS from 'exceljs';
import { afterEach, describe, expect, it } from 'vitest';

import { sampleResult } from '../../../test/fixtures';
import { buildAnalysisWorkbook, writeAnalysisWorkbook } from '../workbook';

async function readBack(filePath: string) {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);
  return workbook;
}

describe('buildAnalysisWorkbook', () => {
  it('adds an Errors sheet only when something failed', () => {
    expect(buildAnalysisWorkbook(sampleResult()).worksheets.map(ws => ws.name)).toEqual([
      'Risk_Summary',
      'Daily_Returns',
      'Price_Data',
    ]);
    expect(buildAnalysisWorkbook(sampleResult({ benchmarkFailed: true })).worksheets.map(ws => ws.name)).toEqual([
      'Risk_Summary',
      'Daily_Returns',
      'Price_Data',
      'Errors',
    ]);
  });
});

describe('writeAnalysisWorkbook', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('writes sheets that read back with the analysis values', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'risk-workbook-'));
    dirs.push(dir);

    const filePath = await writeAnalysisWorkbook(sampleResult({ withErrors: true }), 'report', dir);
    expect(filePath).toBe(path.join(dir, 'report.xlsx'));

    const workbook = await readBack(filePath);
    expect(workbook.worksheets.map(ws => ws.name)).toEqual(['Risk_Summary', 'Daily_Returns', 'Price_Data', 'Errors']);

    const summary = workbook.getWorksheet('Risk_Summary');
    expect(summary?.getCell('A1').value).toBe('Symbol');
    expect(summary?.getCell('F1').value).toBe('VaR 95% (%)');
    expect(summary?.getCell('A2').value).toBe('AAPL');
    expect(summary?.getCell('B2').value).toBe(-1);
    expect(summary?.getCell('C2').value).toBe(30);
    expect(summary?.getCell('E2').value).toBeNull();
    expect(summary?.getCell('F2').value).toBe(-1.23);

    const returns = workbook.getWorksheet('Daily_Returns');
    expect(returns?.getCell('B1').value).toBe('^GSPC');
    expect(returns?.getCell('C1').value).toBe('AAPL');
    expect(returns?.getCell('A2').value).toBe('2024-01-02');
    expect(returns?.getCell('C2').value).toBeNull();
    expect(returns?.rowCount).toBe(4);

    const prices = workbook.getWorksheet('Price_Data');
    expect(prices?.getCell('A2').value).toBe('2024-01-01');
    expect(prices?.getCell('B2').value).toBe(200);
    expect(prices?.getCell('C3').value).toBe(100);
    expect(prices?.rowCount).toBe(5);

    const errors = workbook.getWorksheet('Errors');
    expect(errors?.getCell('A2').value).toBe('BAD');
    expect(errors?.getCell('B2').value).toBe('DATA_UNAVAILABLE');
  });
});
