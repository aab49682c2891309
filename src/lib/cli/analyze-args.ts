/**
 * Command-line parsing for scripts/analyze-portfolio.ts
 */

import { DEFAULT_PORTFOLIO, defaultDateRange, type RuntimeSettings } from '../risk/config';
import { ConfigurationError } from '../risk/errors';
import type { AnalysisConfigInput } from '../risk/types';

export type ExportFormat = 'csv' | 'xlsx';

const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'xlsx'];

export interface AnalyzeCliOptions {
  input: AnalysisConfigInput;
  concurrency: number;
  exportBase: string | null;
  exportFormat: ExportFormat;
  outDir: string;
  useCache: boolean;
  showHelp: boolean;
}

function parseNumberFlag(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`${flag} expects a number, got "${value ?? ''}"`, { flag, value });
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`${flag} expects a value`, { flag });
  }
  return value;
}

/**
 * Flags override runtime settings; runtime settings override built-in defaults
 */
export function parseAnalyzeArgs(
  argv: string[],
  settings: RuntimeSettings,
  now: Date = new Date()
): AnalyzeCliOptions {
  const range = defaultDateRange(settings.analysisPeriodDays, now);

  const options: AnalyzeCliOptions = {
    input: {
      symbols: DEFAULT_PORTFOLIO,
      startDate: range.startDate,
      endDate: range.endDate,
      benchmark: settings.benchmark,
      riskFreeRate: settings.riskFreeRate,
      varConfidence: settings.varConfidence,
      tradingDaysPerYear: settings.tradingDaysPerYear,
    },
    concurrency: 1,
    exportBase: null,
    exportFormat: 'csv',
    outDir: process.cwd(),
    useCache: settings.cacheEnabled,
    showHelp: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const nextArg = argv[i + 1];

    switch (arg) {
      case '--symbols':
        options.input.symbols = requireValue(arg, nextArg).split(',');
        i++;
        break;
      case '--start':
        options.input.startDate = requireValue(arg, nextArg);
        i++;
        break;
      case '--end':
        options.input.endDate = requireValue(arg, nextArg);
        i++;
        break;
      case '--benchmark':
        options.input.benchmark = requireValue(arg, nextArg);
        i++;
        break;
      case '--risk-free':
        options.input.riskFreeRate = parseNumberFlag(arg, nextArg);
        i++;
        break;
      case '--var-confidence':
        options.input.varConfidence = parseNumberFlag(arg, nextArg);
        i++;
        break;
      case '--concurrency':
        options.concurrency = parseNumberFlag(arg, nextArg);
        i++;
        break;
      case '--export':
        options.exportBase = requireValue(arg, nextArg);
        i++;
        break;
      case '--export-format': {
        const format = requireValue(arg, nextArg).toLowerCase();
        const known = EXPORT_FORMATS.find(f => f === format);
        if (!known) {
          throw new ConfigurationError(`--export-format expects one of ${EXPORT_FORMATS.join(', ')}, got "${format}"`, {
            flag: arg,
            value: format,
          });
        }
        options.exportFormat = known;
        i++;
        break;
      }
      case '--out-dir':
        options.outDir = requireValue(arg, nextArg);
        i++;
        break;
      case '--no-cache':
        options.useCache = false;
        break;
      case '--help':
        options.showHelp = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`, { arg });
    }
  }

  return options;
}
