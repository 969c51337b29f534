import { describe, expect, it } from 'vitest';
import {
  filterOutliersMad,
  mean,
  median,
  medianAbsoluteDeviation,
  pairedTTest,
  regularizedIncompleteBeta,
  sampleStandardDeviation,
  studentTTwoSidedP,
} from './stats.js';

describe('descriptive statistics', () => {
  it('computes mean and median', () => {
    expect(mean([])).toBeNull();
    expect(mean([1, 2, 6])).toBe(3);
    expect(median([5, 1, 3])).toBe(3);
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  it('uses the sample standard deviation', () => {
    expect(sampleStandardDeviation([1])).toBeNull();
    expect(sampleStandardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.13809, 5);
  });

  it('filters values beyond n MADs of the median', () => {
    const values = [10, 11, 12, 13, 40];
    expect(medianAbsoluteDeviation(values)).toBe(1);
    expect(filterOutliersMad(values, 3)).toEqual([10, 11, 12, 13]);
  });

  it('keeps everything when the MAD is zero', () => {
    expect(filterOutliersMad([5, 5, 5, 9], 3)).toEqual([5, 5, 5, 9]);
  });
});

describe('student t tail probability', () => {
  it('matches closed forms', () => {
    expect(regularizedIncompleteBeta(0.5, 1, 1)).toBeCloseTo(0.5, 10);
    expect(studentTTwoSidedP(1, 1)).toBeCloseTo(0.5, 8);
    expect(studentTTwoSidedP(0, 5)).toBeCloseTo(1, 10);
  });

  it('matches tabulated values', () => {
    expect(studentTTwoSidedP(2, 10)).toBeCloseTo(0.0734, 3);
    expect(studentTTwoSidedP(2.228, 10)).toBeCloseTo(0.05, 3);
  });
});

describe('pairedTTest', () => {
  it('reports difference, t statistic and effect size', () => {
    const result = pairedTTest([3, 4, 5, 6], [2, 2, 4, 4]);
    // differences 1, 2, 1, 2
    expect(result.n).toBe(4);
    expect(result.meanDifference).toBe(1.5);
    expect(result.standardDeviation).toBeCloseTo(0.57735, 5);
    expect(result.tStatistic).toBeCloseTo(5.19615, 5);
    expect(result.degreesOfFreedom).toBe(3);
    expect(result.effectSize).toBeCloseTo(2.59808, 5);
    expect(result.pValue).toBeGreaterThan(0.01);
    expect(result.pValue).toBeLessThan(0.02);
  });

  it('returns nulls below two pairs', () => {
    const result = pairedTTest([1], [2]);
    expect(result.tStatistic).toBeNull();
    expect(result.pValue).toBeNull();
  });

  it('handles identical sequences', () => {
    const result = pairedTTest([1, 2, 3], [1, 2, 3]);
    expect(result.tStatistic).toBe(0);
    expect(result.pValue).toBe(1);
    expect(result.effectSize).toBe(0);
  });

  it('rejects unpaired input', () => {
    expect(() => pairedTTest([1, 2], [1])).toThrow(RangeError);
  });
});
