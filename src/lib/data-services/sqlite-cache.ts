/**
 * SQLite Price Cache
 * Persistent local cache for daily adjusted-close series
 *
 * Features:
 * - Stores prices by ticker and date
 * - Records which date ranges were fetched in full (coverage)
 * - Coverage expires after a TTL
 * - Statistics and cleanup utilities
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';

import type { PricePoint } from '../risk/types';

// ============================================
// TYPES
// ============================================

export interface CacheStats {
  totalRecords: number;
  uniqueTickers: number;
  oldestDate: string | null;
  newestDate: string | null;
  dbSizeBytes: number;
  dbSizeMB: string;
}

// ============================================
// DATABASE INITIALIZATION
// ============================================

const DEFAULT_DB_PATH = path.join(process.cwd(), 'data', 'price-cache.sqlite');

let dbPath = DEFAULT_DB_PATH;
let db: Database.Database | null = null;

/**
 * Point the cache at a different database file (':memory:' for tests).
 * Closes any open connection.
 */
export function configurePriceCache(filePath: string = DEFAULT_DB_PATH): void {
  closeDatabase();
  dbPath = filePath;
}

function getDb(): Database.Database {
  if (!db) {
    if (dbPath !== ':memory:') {
      const dataDir = path.dirname(dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    db = new Database(dbPath);

    if (dbPath !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }

    initializeSchema(db);
  }
  return db;
}

function initializeSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS price_data (
      ticker TEXT NOT NULL,
      date TEXT NOT NULL,
      price REAL NOT NULL,
      source TEXT DEFAULT 'yahoo',
      fetched_at TEXT DEFAULT CURRENT_TIMESTAMP,
      PRIMARY KEY (ticker, date)
    );

    CREATE INDEX IF NOT EXISTS idx_price_ticker_date ON price_data(ticker, date);

    CREATE TABLE IF NOT EXISTS price_coverage (
      ticker TEXT NOT NULL,
      from_date TEXT NOT NULL,
      to_date TEXT NOT NULL,
      fetched_at INTEGER NOT NULL,
      PRIMARY KEY (ticker, from_date, to_date)
    );
  `);
}

// ============================================
// DAILY PRICE CACHE
// ============================================

/**
 * Cached prices for a ticker, ascending by date.
 * Returns null unless a fetch covering the whole range is younger than ttlSeconds.
 */
export function getCachedPrices(
  ticker: string,
  fromDate: string,
  toDate: string,
  ttlSeconds: number,
  now: number = Date.now()
): PricePoint[] | null {
  const database = getDb();

  const coverage = database.prepare(`
    SELECT COUNT(*) as count
    FROM price_coverage
    WHERE ticker = ? AND from_date <= ? AND to_date >= ? AND fetched_at >= ?
  `).get(ticker, fromDate, toDate, now - ttlSeconds * 1000) as { count: number };

  if (coverage.count === 0) {
    return null;
  }

  const rows = database.prepare(`
    SELECT date, price
    FROM price_data
    WHERE ticker = ? AND date >= ? AND date <= ?
    ORDER BY date ASC
  `).all(ticker, fromDate, toDate) as PricePoint[];

  return rows;
}

/**
 * Store a fetched range and mark it as covered
 */
export function cachePrices(
  ticker: string,
  fromDate: string,
  toDate: string,
  points: PricePoint[],
  source: string = 'yahoo',
  now: number = Date.now()
): number {
  const database = getDb();

  const insertPrice = database.prepare(`
    INSERT OR REPLACE INTO price_data (ticker, date, price, source, fetched_at)
    VALUES (?, ?, ?, ?, datetime('now'))
  `);
  const insertCoverage = database.prepare(`
    INSERT OR REPLACE INTO price_coverage (ticker, from_date, to_date, fetched_at)
    VALUES (?, ?, ?, ?)
  `);

  const insertMany = database.transaction((rows: PricePoint[]) => {
    let count = 0;
    for (const row of rows) {
      insertPrice.run(ticker, row.date, row.price, source);
      count++;
    }
    insertCoverage.run(ticker, fromDate, toDate, now);
    return count;
  });

  return insertMany(points);
}

// ============================================
// CACHE MANAGEMENT
// ============================================

export function getCacheStats(): CacheStats {
  const database = getDb();

  const count = (database.prepare('SELECT COUNT(*) as count FROM price_data').get() as { count: number }).count;
  const tickers = (database.prepare('SELECT COUNT(DISTINCT ticker) as count FROM price_data').get() as { count: number }).count;
  const dateRange = database.prepare('SELECT MIN(date) as oldest, MAX(date) as newest FROM price_data').get() as {
    oldest: string | null;
    newest: string | null;
  };

  let dbSizeBytes = 0;
  if (dbPath !== ':memory:' && fs.existsSync(dbPath)) {
    dbSizeBytes = fs.statSync(dbPath).size;
  }

  return {
    totalRecords: count,
    uniqueTickers: tickers,
    oldestDate: dateRange.oldest,
    newestDate: dateRange.newest,
    dbSizeBytes,
    dbSizeMB: (dbSizeBytes / (1024 * 1024)).toFixed(2),
  };
}

export function getCachedTickers(): string[] {
  const rows = getDb().prepare('SELECT DISTINCT ticker FROM price_data ORDER BY ticker').all() as { ticker: string }[];
  return rows.map(r => r.ticker);
}

export function getTickerDateRange(ticker: string): { oldest: string | null; newest: string | null; count: number } {
  return getDb().prepare(`
    SELECT MIN(date) as oldest, MAX(date) as newest, COUNT(*) as count
    FROM price_data
    WHERE ticker = ?
  `).get(ticker) as { oldest: string | null; newest: string | null; count: number };
}

/**
 * Clear all cached data for a specific ticker
 */
export function clearTickerCache(ticker: string): number {
  const database = getDb();
  const result = database.prepare('DELETE FROM price_data WHERE ticker = ?').run(ticker);
  database.prepare('DELETE FROM price_coverage WHERE ticker = ?').run(ticker);
  return result.changes;
}

export function clearAllCache(): void {
  const database = getDb();
  database.exec('DELETE FROM price_data');
  database.exec('DELETE FROM price_coverage');
  database.exec('VACUUM');
}

/**
 * Close database connection (for cleanup)
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
