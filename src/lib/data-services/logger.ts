/**
 * Price Request Log
 * One entry per price-series request (network or cache) with the window
 * asked for, the points returned and the outcome. Keeps the last 1000.
 */

import { isRiskError } from '../risk/errors';
import type { PriceSeries, RiskErrorKind } from '../risk/types';

export type PriceSource = 'yahoo' | 'cache';

export interface PriceRequest {
    symbol: string;
    startDate: string;
    endDate: string;
}

export interface PriceRequestLogEntry extends PriceRequest {
    id: number;
    timestamp: Date;
    source: PriceSource;
    operation: string;
    latency_ms: number;
    points: number | null;   // null when the request failed
    error?: string;
    errorKind?: RiskErrorKind;
}

export interface PriceRequestStats {
    total_calls: number;
    failed_calls: number;
    cache_hits: number;
    cache_hit_rate: number | null;   // cache hits / successful calls
    points_returned: number;
    avg_latency_ms: number;
    calls_by_source: Record<PriceSource, number>;
    failures_by_symbol: Record<string, number>;
}

const MAX_LOG_ENTRIES = 1000;
const entries: PriceRequestLogEntry[] = [];

let quiet = false;
let nextId = 1;

/**
 * Silence console output (entries are still recorded)
 */
export function setQuietLogging(value: boolean): void {
    quiet = value;
}

function formatEntry(entry: PriceRequestLogEntry): string {
    const window = `${entry.startDate}..${entry.endDate}`;
    if (entry.points === null) {
        return `[API] ✗ ${entry.source}/${entry.operation} ${entry.symbol} ${window} - ${entry.latency_ms}ms - ${entry.error ?? 'failed'}`;
    }
    return `[API] ✓ ${entry.source}/${entry.operation} ${entry.symbol} ${window} - ${entry.points} pts - ${entry.latency_ms}ms`;
}

export function recordPriceRequest(entry: Omit<PriceRequestLogEntry, 'id' | 'timestamp'>): PriceRequestLogEntry {
    const logged: PriceRequestLogEntry = { id: nextId++, timestamp: new Date(), ...entry };

    entries.unshift(logged); // Newest first
    if (entries.length > MAX_LOG_ENTRIES) {
        entries.pop();
    }

    if (!quiet) console.log(formatEntry(logged));
    return logged;
}

/**
 * Time a price request and record its outcome. Errors are recorded and rethrown.
 */
export async function withLogging(
    source: PriceSource,
    operation: string,
    request: PriceRequest,
    fetch: () => Promise<PriceSeries>
): Promise<PriceSeries> {
    const startTime = Date.now();
    const base = { ...request, source, operation };

    try {
        const series = await fetch();
        recordPriceRequest({ ...base, latency_ms: Date.now() - startTime, points: series.points.length });
        return series;
    } catch (error) {
        recordPriceRequest({
            ...base,
            latency_ms: Date.now() - startTime,
            points: null,
            error: error instanceof Error ? error.message : String(error),
            errorKind: isRiskError(error) ? error.kind : undefined,
        });
        throw error;
    }
}

export function getRecentLogs(limit: number = 50): PriceRequestLogEntry[] {
    return entries.slice(0, limit);
}

/**
 * Aggregate the log, optionally only entries recorded at or after `since`
 * (pass the start time of a run to get that run's figures)
 */
export function getApiStats(since?: Date): PriceRequestStats {
    const stats: PriceRequestStats = {
        total_calls: 0,
        failed_calls: 0,
        cache_hits: 0,
        cache_hit_rate: null,
        points_returned: 0,
        avg_latency_ms: 0,
        calls_by_source: { yahoo: 0, cache: 0 },
        failures_by_symbol: {},
    };
    let totalLatency = 0;

    for (const entry of entries) {
        if (since && entry.timestamp < since) continue;

        stats.total_calls++;
        stats.calls_by_source[entry.source]++;
        totalLatency += entry.latency_ms;

        if (entry.points === null) {
            stats.failed_calls++;
            stats.failures_by_symbol[entry.symbol] = (stats.failures_by_symbol[entry.symbol] ?? 0) + 1;
            continue;
        }
        stats.points_returned += entry.points;
        if (entry.source === 'cache') stats.cache_hits++;
    }

    const successful = stats.total_calls - stats.failed_calls;
    if (successful > 0) stats.cache_hit_rate = stats.cache_hits / successful;
    if (stats.total_calls > 0) stats.avg_latency_ms = Math.round(totalLatency / stats.total_calls);

    return stats;
}

/**
 * Clear all entries (for testing)
 */
export function clearLogs(): void {
    entries.length = 0;
}
