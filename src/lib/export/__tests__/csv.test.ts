import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { afterEach, describe, expect, it } from 'vitest';

import { SAMPLE_PRICES, sampleResult } from '../../../test/fixtures';
import { errorsToCsv, escapeCSVValue, pricesToCsv, returnsToCsv, summaryToCsv, toCsv, writeAnalysisExport } from '../csv';

const { aaplPrices, benchPrices } = SAMPLE_PRICES;

describe('escapeCSVValue', () => {
  it('quotes values with separators, quotes or newlines', () => {
    expect(escapeCSVValue('plain')).toBe('plain');
    expect(escapeCSVValue('a,b')).toBe('"a,b"');
    expect(escapeCSVValue('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCSVValue('two\nlines')).toBe('"two\nlines"');
    expect(escapeCSVValue(null)).toBe('');
    expect(escapeCSVValue(undefined)).toBe('');
    expect(escapeCSVValue(-1.5)).toBe('-1.5');
  });
});

describe('tables', () => {
  it('writes a header and one line per row', () => {
    expect(toCsv({ headers: ['A', 'B'], rows: [[1, null], ['x,y', 2]] })).toBe('A,B\n1,\n"x,y",2\n');
  });

  it('renders the summary with percentage columns', () => {
    expect(summaryToCsv(sampleResult())).toBe(
      'Symbol,Total Return (%),Volatility (%),Beta,Sharpe Ratio,VaR 95% (%),Max Drawdown (%)\n' +
        'AAPL,-1,30,1.25,,-1.23,-10\n'
    );
  });

  it('lines up prices by date with blanks for missing days', () => {
    expect(pricesToCsv([benchPrices, aaplPrices])).toBe(
      'Date,^GSPC,AAPL\n' +
        '2024-01-01,200,\n' +
        '2024-01-02,202,100\n' +
        '2024-01-03,204,110\n' +
        '2024-01-04,206,99\n'
    );
  });

  it('writes returns on the date of the later price', () => {
    const csv = returnsToCsv([{ symbol: 'X', dates: ['2024-01-03', '2024-01-02'], returns: [0.5, -0.25] }]);
    expect(csv).toBe('Date,X\n2024-01-02,-0.25\n2024-01-03,0.5\n');
  });

  it('lists symbol errors', () => {
    expect(errorsToCsv(sampleResult({ withErrors: true }).errors)).toBe(
      'Symbol,Error,Message\nBAD,DATA_UNAVAILABLE,"BAD: no data, try later"\n'
    );
  });
});

describe('writeAnalysisExport', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function tempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'risk-export-'));
    dirs.push(dir);
    return dir;
  }

  it('writes summary, returns and prices files', () => {
    const dir = tempDir();
    const files = writeAnalysisExport(sampleResult(), 'report', dir);

    expect(files).toEqual([
      path.join(dir, 'report.csv'),
      path.join(dir, 'report_returns.csv'),
      path.join(dir, 'report_prices.csv'),
    ]);

    const returns = fs.readFileSync(path.join(dir, 'report_returns.csv'), 'utf8').split('\n');
    expect(returns[0]).toBe('Date,^GSPC,AAPL');
    expect(returns).toHaveLength(5);
  });

  it('adds an errors file when symbols failed', () => {
    const dir = path.join(tempDir(), 'nested');
    const files = writeAnalysisExport(sampleResult({ withErrors: true }), 'report', dir);

    expect(files).toHaveLength(4);
    expect(fs.readFileSync(path.join(dir, 'report_errors.csv'), 'utf8')).toBe(
      errorsToCsv(sampleResult({ withErrors: true }).errors)
    );
  });

  it('leaves the benchmark out of the returns and lists its failure', () => {
    const dir = tempDir();
    const files = writeAnalysisExport(sampleResult({ benchmarkFailed: true }), 'report', dir);

    expect(files).toHaveLength(4);
    expect(fs.readFileSync(path.join(dir, 'report_returns.csv'), 'utf8').split('\n')[0]).toBe('Date,AAPL');
    expect(fs.readFileSync(path.join(dir, 'report_prices.csv'), 'utf8').split('\n')[0]).toBe('Date,AAPL');
    expect(fs.readFileSync(path.join(dir, 'report_errors.csv'), 'utf8')).toBe(
      'Symbol,Error,Message\n^GSPC,DATA_UNAVAILABLE,^GSPC: no data\n'
    );
  });
});
