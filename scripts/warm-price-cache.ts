/**
 * Cache Warming Script
 * Pre-fetches price data for symbols to populate the SQLite cache
 *
 * Usage:
 *   npx tsx scripts/warm-price-cache.ts [options]
 *
 * Options:
 *   --tickers <list>  Comma-separated list of tickers
 *   --days <n>        Calendar days of history to cache (default: 365)
 *   --stats           Show cache statistics only
 *   --clear           Clear all cached data
 */

import { config as loadEnv } from 'dotenv';
loadEnv({ path: '.env.local' });

import { CachedMarketDataProvider, YahooMarketDataProvider } from '../src/lib/data-services/price-provider';
import {
  clearAllCache,
  closeDatabase,
  configurePriceCache,
  getCachedTickers,
  getCacheStats,
  getTickerDateRange,
} from '../src/lib/data-services/sqlite-cache';
import { DEFAULT_PORTFOLIO, defaultDateRange, loadRuntimeSettings, MARKET_INDICES } from '../src/lib/risk/config';
import { ConfigurationError } from '../src/lib/risk/errors';

// ============================================
// CONFIGURATION
// ============================================

interface WarmConfig {
  tickers: string[];
  days: number;
  showStatsOnly: boolean;
  clearCache: boolean;
}

// ============================================
// CACHE OPERATIONS
// ============================================

function showCacheStats(): void {
  const stats = getCacheStats();

  console.log('\n' + '='.repeat(50));
  console.log('PRICE CACHE STATISTICS');
  console.log('='.repeat(50));

  console.log(`\nDatabase Size: ${stats.dbSizeMB} MB`);
  console.log(`Total Records: ${stats.totalRecords.toLocaleString()}`);
  console.log(`Unique Tickers: ${stats.uniqueTickers}`);
  console.log(`Date Range: ${stats.oldestDate || 'N/A'} to ${stats.newestDate || 'N/A'}`);

  const tickers = getCachedTickers();
  if (tickers.length > 0) {
    console.log(`\nCached Tickers (${tickers.length}):`);

    for (const ticker of tickers.slice(0, 20)) {
      const range = getTickerDateRange(ticker);
      console.log(`  ${ticker.padEnd(6)} ${range.count.toString().padStart(4)} days  ${range.oldest} to ${range.newest}`);
    }

    if (tickers.length > 20) {
      console.log(`  ... and ${tickers.length - 20} more`);
    }
  } else {
    console.log('\nNo tickers cached yet.');
  }

  console.log('');
}

async function warmCache(config: WarmConfig, provider: CachedMarketDataProvider): Promise<void> {
  console.log('\n' + '='.repeat(50));
  console.log('WARMING PRICE CACHE');
  console.log('='.repeat(50));

  const { startDate, endDate } = defaultDateRange(config.days);

  console.log(`\nConfiguration:`);
  console.log(`  Tickers: ${config.tickers.length}`);
  console.log(`  Date Range: ${startDate} to ${endDate}`);
  console.log('\nWarming cache...\n');

  let fetched = 0;
  let errors = 0;
  const startTime = Date.now();

  for (let i = 0; i < config.tickers.length; i++) {
    const ticker = config.tickers[i];
    const progress = `[${(i + 1).toString().padStart(3)}/${config.tickers.length}]`;

    try {
      const series = await provider.getPriceSeries(ticker, startDate, endDate);
      console.log(`${progress} ${ticker.padEnd(6)} OK (${series.points.length} days)`);
      fetched++;

      // Small delay between API calls to avoid rate limiting
      await new Promise(resolve => setTimeout(resolve, 100));
    } catch (error) {
      console.log(`${progress} ${ticker.padEnd(6)} ERROR: ${error instanceof Error ? error.message : 'Unknown'}`);
      errors++;
    }
  }

  console.log('\n' + '-'.repeat(50));
  console.log('SUMMARY');
  console.log('-'.repeat(50));
  console.log(`  Cached:   ${fetched}`);
  console.log(`  Errors:   ${errors}`);
  console.log(`  Duration: ${((Date.now() - startTime) / 1000).toFixed(1)}s`);

  showCacheStats();
}

// ============================================
// CLI ARGUMENT PARSING
// ============================================

function parseArgs(): WarmConfig {
  const args = process.argv.slice(2);
  const config: WarmConfig = {
    tickers: [...DEFAULT_PORTFOLIO, ...Object.keys(MARKET_INDICES)],
    days: loadRuntimeSettings().analysisPeriodDays,
    showStatsOnly: false,
    clearCache: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--tickers':
        if (nextArg) {
          config.tickers = nextArg.split(',').map(t => t.trim().toUpperCase()).filter(Boolean);
          i++;
        }
        break;
      case '--days':
        if (nextArg) {
          config.days = parseInt(nextArg, 10);
          if (!Number.isInteger(config.days) || config.days <= 0) {
            throw new ConfigurationError(`--days expects a positive whole number, got "${nextArg}"`);
          }
          i++;
        }
        break;
      case '--stats':
        config.showStatsOnly = true;
        break;
      case '--clear':
        config.clearCache = true;
        break;
      case '--help':
        printHelp();
        process.exit(0);
    }
  }

  return config;
}

function printHelp(): void {
  console.log(`
Cache Warming Script - Pre-fetch price data to SQLite cache

Usage:
  npx tsx scripts/warm-price-cache.ts [options]

Options:
  --tickers <list>   Comma-separated list of tickers (e.g., AAPL,MSFT,^GSPC)
  --days <n>         Calendar days of history to cache (default: 365)
  --stats            Show cache statistics only (no warming)
  --clear            Clear all cached data
`);
}

// ============================================
// MAIN
// ============================================

async function main(): Promise<void> {
  try {
    const config = parseArgs();
    const settings = loadRuntimeSettings();
    configurePriceCache(settings.cachePath);

    if (config.clearCache) {
      console.log('\nClearing all cached data...');
      clearAllCache();
      console.log('Cache cleared successfully.');
      showCacheStats();
      return;
    }

    if (config.showStatsOnly) {
      showCacheStats();
      return;
    }

    const provider = new CachedMarketDataProvider(
      new YahooMarketDataProvider(undefined, settings.requestTimeoutMs),
      settings.cacheTtlSeconds
    );
    await warmCache(config, provider);
  } catch (error) {
    console.error('\nError:', error);
    process.exitCode = 1;
  } finally {
    closeDatabase();
  }
}

void main();
