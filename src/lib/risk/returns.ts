/**
 * Return Series Builder
 * Converts adjusted-close price series into period-over-period returns
 */

import { InsufficientDataError } from './errors';
import type { AlignedReturns, PriceSeries, ReturnSeries } from './types';

/**
 * Build fractional returns: r[i] = p[i] / p[i-1] - 1.
 * The first price has no reference and produces no return.
 */
export function buildReturnSeries(series: PriceSeries): ReturnSeries {
  const { symbol, points } = series;

  if (points.length < 2) {
    throw new InsufficientDataError(
      `${symbol}: need at least 2 prices to compute returns, got ${points.length}`,
      { symbol, points: points.length }
    );
  }

  const bad = points.find(p => !Number.isFinite(p.price) || p.price <= 0);
  if (bad) {
    throw new InsufficientDataError(`${symbol}: invalid price ${bad.price} on ${bad.date}`, {
      symbol,
      date: bad.date,
    });
  }

  const dates: string[] = [];
  const returns: number[] = [];

  for (let i = 1; i < points.length; i++) {
    dates.push(points[i].date);
    returns.push(points[i].price / points[i - 1].price - 1);
  }

  return { symbol, dates, returns };
}

/**
 * Intersect two return series on date, keeping date order
 */
export function alignReturnSeries(a: ReturnSeries, b: ReturnSeries): AlignedReturns {
  const lookup = new Map<string, number>();
  b.dates.forEach((date, i) => lookup.set(date, b.returns[i]));

  const aligned: AlignedReturns = { dates: [], a: [], b: [] };
  for (let i = 0; i < a.dates.length; i++) {
    const other = lookup.get(a.dates[i]);
    if (other === undefined) continue;
    aligned.dates.push(a.dates[i]);
    aligned.a.push(a.returns[i]);
    aligned.b.push(other);
  }
  return aligned;
}

/**
 * Growth of one unit invested: cum[i] = prod_{k<=i} (1 + r[k])
 */
export function cumulativeCurve(returns: number[]): number[] {
  const curve: number[] = [];
  let value = 1;
  for (const r of returns) {
    value *= 1 + r;
    curve.push(value);
  }
  return curve;
}
