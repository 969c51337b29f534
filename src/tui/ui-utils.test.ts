import { describe, expect, it } from 'vitest';
import { formatDelta, formatMae, formatPace, formatPValue, formatStatistic } from './format.js';
import { getBackScreen, stepIndex } from './navigation.js';

describe('format helpers', () => {
  it('formats errors and deltas', () => {
    expect(formatMae(4 / 3)).toBe('1.333');
    expect(formatMae(null)).toBe('n/a');
    expect(formatDelta(0.25)).toBe('+0.250');
    expect(formatDelta(-0.5)).toBe('-0.500');
    expect(formatDelta(0)).toBe('±0.000');
  });

  it('formats test statistics', () => {
    expect(formatPValue(0.0004)).toBe('<0.001');
    expect(formatPValue(0.0734)).toBe('0.073');
    expect(formatStatistic(Infinity)).toBe('∞');
    expect(formatStatistic(-2.5)).toBe('-2.50');
    expect(formatStatistic(null)).toBe('n/a');
  });

  it('formats a pace with its interval', () => {
    expect(formatPace(10, [6.08, 13.92])).toBe('10.00 [6.1, 13.9]');
  });
});

describe('navigation', () => {
  it('wraps the selected index', () => {
    expect(stepIndex(0, -1, 3)).toBe(2);
    expect(stepIndex(2, 1, 3)).toBe(0);
    expect(stepIndex(1, 1, 0)).toBe(0);
  });

  it('has nothing behind the loading screen', () => {
    expect(getBackScreen({ name: 'loading', message: 'x' })).toBeNull();
  });
});
