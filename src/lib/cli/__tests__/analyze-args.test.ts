import { describe, expect, it } from 'vitest';

import { parseAnalyzeArgs } from '../analyze-args';
import { loadRuntimeSettings } from '../../risk/config';
import { ConfigurationError } from '../../risk/errors';

const settings = loadRuntimeSettings({});
const now = new Date('2024-06-30T12:00:00Z');

describe('parseAnalyzeArgs', () => {
  it('falls back to settings and the default portfolio', () => {
    const options = parseAnalyzeArgs([], settings, now);

    expect(options.input).toEqual({
      symbols: ['AAPL', 'GOOGL', 'MSFT', 'AMZN', 'TSLA'],
      startDate: '2023-07-01',
      endDate: '2024-06-30',
      benchmark: '^GSPC',
      riskFreeRate: 0.02,
      varConfidence: 0.95,
      tradingDaysPerYear: 252,
    });
    expect(options.concurrency).toBe(1);
    expect(options.exportBase).toBeNull();
    expect(options.exportFormat).toBe('csv');
    expect(options.useCache).toBe(true);
    expect(options.showHelp).toBe(false);
  });

  it('applies every flag', () => {
    const options = parseAnalyzeArgs(
      [
        '--symbols', 'aapl,msft',
        '--start', '2024-01-01',
        '--end', '2024-03-31',
        '--benchmark', '^IXIC',
        '--risk-free', '0.04',
        '--var-confidence', '0.99',
        '--concurrency', '3',
        '--export', 'q1',
        '--export-format', 'XLSX',
        '--out-dir', 'reports',
        '--no-cache',
      ],
      settings,
      now
    );

    expect(options.input).toEqual({
      symbols: ['aapl', 'msft'],
      startDate: '2024-01-01',
      endDate: '2024-03-31',
      benchmark: '^IXIC',
      riskFreeRate: 0.04,
      varConfidence: 0.99,
      tradingDaysPerYear: 252,
    });
    expect(options.concurrency).toBe(3);
    expect(options.exportBase).toBe('q1');
    expect(options.exportFormat).toBe('xlsx');
    expect(options.outDir).toBe('reports');
    expect(options.useCache).toBe(false);
  });

  it('uses the configured analysis period for the default window', () => {
    const options = parseAnalyzeArgs([], { ...settings, analysisPeriodDays: 30 }, now);
    expect(options.input.startDate).toBe('2024-05-31');
  });

  it('recognizes --help', () => {
    expect(parseAnalyzeArgs(['--help'], settings, now).showHelp).toBe(true);
  });

  it.each([
    [['--verbose']],
    [['--symbols']],
    [['--start', '--end']],
    [['--risk-free', 'two percent']],
    [['--concurrency', '']],
    [['--export-format', 'pdf']],
  ])('rejects %j', argv => {
    expect(() => parseAnalyzeArgs(argv, settings, now)).toThrow(ConfigurationError);
  });
});
