import { describe, expect, it } from 'vitest';

import { mean, pearsonCorrelation, percentile, sampleCovariance, sampleStd, sampleVariance } from '../stats';

describe('sample statistics', () => {
  it('uses the n - 1 denominator', () => {
    expect(mean([1, 2, 3])).toBe(2);
    expect(sampleVariance([1, 2, 3])).toBe(1);
    expect(sampleStd([2, 4, 6])).toBe(2);
    expect(sampleCovariance([1, 2, 3], [2, 4, 6])).toBe(2);
    expect(pearsonCorrelation([1, 2, 3], [2, 4, 6])).toBe(1);
  });

  it('gives NaN when there is not enough data', () => {
    expect(mean([])).toBeNaN();
    expect(sampleVariance([5])).toBeNaN();
    expect(pearsonCorrelation([1, 1, 1], [1, 2, 3])).toBeNaN();
  });

  it('refuses to pair arrays of different lengths', () => {
    expect(sampleCovariance([1, 2, 3], [2, 4])).toBeNaN();
    expect(sampleCovariance([1, 2], [2, 4, 6])).toBeNaN();
    expect(pearsonCorrelation([1, 2, 3, 4], [1, 2, 3])).toBeNaN();
  });
});

describe('percentile', () => {
  it('interpolates between order statistics', () => {
    expect(percentile([3, 1, 2], 0.5)).toBe(2);
    expect(percentile([4, 1, 3, 2], 0.25)).toBe(1.75);
    expect(percentile([4, 1, 3, 2], 0)).toBe(1);
    expect(percentile([4, 1, 3, 2], 1)).toBe(4);
  });

  it('returns NaN for no values', () => {
    expect(percentile([], 0.05)).toBeNaN();
  });
});
