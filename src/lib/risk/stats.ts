/**
 * Descriptive statistics over flat number arrays.
 * Variance and covariance use the sample (n - 1) denominator.
 */

export function mean(values: number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * NaN unless both arrays hold the same number (>= 2) of observations
 */
export function sampleCovariance(x: number[], y: number[]): number {
  const n = x.length;
  if (n !== y.length || n < 2) return NaN;

  const mx = mean(x);
  const my = mean(y);
  let sum = 0;
  for (let i = 0; i < n; i++) {
    sum += (x[i] - mx) * (y[i] - my);
  }
  return sum / (n - 1);
}

export function sampleVariance(values: number[]): number {
  return sampleCovariance(values, values);
}

export function sampleStd(values: number[]): number {
  return Math.sqrt(sampleVariance(values));
}

export function pearsonCorrelation(x: number[], y: number[]): number {
  const denom = sampleStd(x) * sampleStd(y);
  if (denom === 0) return NaN;
  return sampleCovariance(x, y) / denom;
}

/**
 * Empirical percentile with linear interpolation between order statistics
 * @param p - Fraction in [0, 1]
 */
export function percentile(values: number[], p: number): number {
  if (values.length === 0) return NaN;

  const sorted = [...values].sort((a, b) => a - b);
  const exactIndex = (sorted.length - 1) * p;
  const lowerIndex = Math.floor(exactIndex);
  const upperIndex = Math.ceil(exactIndex);

  if (lowerIndex === upperIndex) {
    return sorted[lowerIndex];
  }

  const weight = exactIndex - lowerIndex;
  return sorted[lowerIndex] * (1 - weight) + sorted[upperIndex] * weight;
}
