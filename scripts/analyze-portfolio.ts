/**
 * Portfolio Risk Analysis
 * Fetches prices, computes risk metrics per symbol and prints the summary
 *
 * Run with: npx tsx scripts/analyze-portfolio.ts [options]
 */

// Load environment variables from .env.local
import { config } from 'dotenv';
config({ path: '.env.local' });

import { parseAnalyzeArgs } from '../src/lib/cli/analyze-args';
import { createMarketDataProvider } from '../src/lib/data-services/price-provider';
import { getApiStats } from '../src/lib/data-services/logger';
import { closeDatabase } from '../src/lib/data-services/sqlite-cache';
import { writeAnalysisExport } from '../src/lib/export/csv';
import { writeAnalysisWorkbook } from '../src/lib/export/workbook';
import {
  analyzePortfolio,
  classifyRisk,
  correlationMatrix,
  generateSummaryReport,
  isRiskError,
  loadRuntimeSettings,
  MARKET_INDICES,
  portfolioOverview,
  summaryColumns,
  type PortfolioResult,
} from '../src/lib/risk';

function formatCell(value: string | number | null): string {
  return value === null ? 'N/A' : String(value);
}

function formatPct(value: number | null): string {
  return value === null ? 'N/A' : `${(value * 100).toFixed(2)}%`;
}

function printSummary(result: PortfolioResult): void {
  const { config: analysis } = result;
  const indexName = MARKET_INDICES[analysis.benchmark] ?? analysis.benchmark;

  console.log('\n' + '='.repeat(60));
  console.log('RISK METRICS SUMMARY');
  console.log('='.repeat(60));
  console.log(`Benchmark: ${indexName}  Period: ${analysis.startDate} to ${analysis.endDate}`);
  console.log(`Risk-free rate: ${formatPct(analysis.riskFreeRate)}  Trading days/year: ${analysis.tradingDaysPerYear}\n`);

  const columns = summaryColumns(analysis.varConfidence);
  const rows = generateSummaryReport(result);
  const widths = columns.map(c => Math.max(c.label.length, ...rows.map(r => formatCell(r[c.key]).length)));

  console.log(columns.map((c, i) => c.label.padStart(widths[i])).join('  '));
  for (const row of rows) {
    console.log(columns.map((c, i) => formatCell(row[c.key]).padStart(widths[i])).join('  '));
  }

  const overview = portfolioOverview(result);
  console.log('\n' + '-'.repeat(60));
  console.log('PORTFOLIO OVERVIEW');
  console.log('-'.repeat(60));
  console.log(`  Avg Return:      ${formatPct(overview.avgTotalReturn)}`);
  console.log(`  Avg Volatility:  ${formatPct(overview.avgVolatility)}`);
  console.log(`  Avg Beta:        ${overview.avgBeta === null ? 'N/A' : overview.avgBeta.toFixed(3)}`);
  console.log(`  Avg Sharpe:      ${overview.avgSharpeRatio === null ? 'N/A' : overview.avgSharpeRatio.toFixed(3)}`);

  console.log('\nRisk ratings (volatility / beta / sharpe):');
  for (const record of result.table.values()) {
    const rating = classifyRisk(record);
    console.log(`  ${record.symbol.padEnd(8)} ${rating.volatility ?? 'N/A'} / ${rating.beta ?? 'N/A'} / ${rating.sharpeRatio ?? 'N/A'}`);
  }

  const matrix = correlationMatrix(result);
  if (matrix.symbols.length > 1) {
    console.log('\nReturn correlations:');
    console.log(' '.repeat(8) + matrix.symbols.map(s => s.padStart(8)).join(''));
    matrix.symbols.forEach((symbol, i) => {
      const cells = matrix.values[i].map(v => (v === null ? 'N/A' : v.toFixed(2)).padStart(8));
      console.log(symbol.padEnd(8) + cells.join(''));
    });
  }

  if (result.benchmarkError) {
    const { kind, message } = result.benchmarkError;
    console.log(`\n⚠ Benchmark ${analysis.benchmark} unavailable (${kind}: ${message}); beta was not computed`);
  }

  if (result.errors.length > 0) {
    console.log(`\nFailed symbols (${result.errors.length}):`);
    for (const error of result.errors) {
      console.log(`  ✗ ${error.symbol.padEnd(8)} ${error.kind}: ${error.message}`);
    }
  }
}

function printHelp(): void {
  console.log(`
Portfolio Risk Analysis - volatility, beta, Sharpe, VaR, drawdown, total return

Usage:
  npx tsx scripts/analyze-portfolio.ts [options]

Options:
  --symbols <list>         Comma-separated symbols (default: AAPL,GOOGL,MSFT,AMZN,TSLA)
  --start <YYYY-MM-DD>     Start date (default: one year ago)
  --end <YYYY-MM-DD>       End date (default: today)
  --benchmark <symbol>     Benchmark index (default: ^GSPC)
  --risk-free <rate>       Annual risk-free rate as a decimal (default: 0.02)
  --var-confidence <c>     VaR confidence in (0, 1) (default: 0.95)
  --concurrency <n>        Symbols fetched in parallel (default: 1)
  --export <base>          Write <base>.csv, <base>_returns.csv, <base>_prices.csv
  --export-format <fmt>    csv (default) or xlsx (one workbook: Risk_Summary,
                           Daily_Returns, Price_Data)
  --out-dir <dir>          Directory for exported files (default: cwd)
  --no-cache               Skip the SQLite price cache

Examples:
  npx tsx scripts/analyze-portfolio.ts --symbols AAPL,MSFT,NVDA --start 2024-01-01 --end 2024-12-31
  npx tsx scripts/analyze-portfolio.ts --benchmark ^IXIC --export portfolio_risk_data
  npx tsx scripts/analyze-portfolio.ts --export portfolio_risk_analysis --export-format xlsx
`);
}

// ============================================
// MAIN
// ============================================

async function main(): Promise<void> {
  try {
    const settings = loadRuntimeSettings();
    const cli = parseAnalyzeArgs(process.argv.slice(2), settings);

    if (cli.showHelp) {
      printHelp();
      return;
    }

    const runStart = new Date();
    const provider = createMarketDataProvider({ ...settings, cacheEnabled: cli.useCache });
    const result = await analyzePortfolio(cli.input, provider, { concurrency: cli.concurrency });

    printSummary(result);

    if (cli.exportBase) {
      const files = cli.exportFormat === 'xlsx'
        ? [await writeAnalysisWorkbook(result, cli.exportBase, cli.outDir)]
        : writeAnalysisExport(result, cli.exportBase, cli.outDir);
      console.log('\nExported:');
      files.forEach(f => console.log(`  ${f}`));
    }

    const stats = getApiStats(runStart);
    const hitRate = stats.cache_hit_rate === null ? 'N/A' : `${Math.round(stats.cache_hit_rate * 100)}%`;
    console.log(
      `\nPrice requests: ${stats.total_calls} (${stats.points_returned} points, cache hit rate ${hitRate}, avg ${stats.avg_latency_ms}ms)`
    );
    const failures = Object.entries(stats.failures_by_symbol);
    if (failures.length > 0) {
      console.log(`Failed requests: ${failures.map(([symbol, count]) => `${symbol} ×${count}`).join(', ')}`);
    }
  } catch (error) {
    if (isRiskError(error)) {
      console.error(`\n${error.name}: ${error.message}`);
    } else {
      console.error('\nError:', error);
    }
    process.exitCode = 1;
  } finally {
    closeDatabase();
  }
}

void main();
