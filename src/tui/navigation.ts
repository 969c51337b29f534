import type { SeasonReport } from '../core/validation.js';

export type Screen =
  | { name: 'loading'; message: string }
  | { name: 'error'; message: string }
  | { name: 'report'; report: SeasonReport; selected: number }
  | { name: 'event'; report: SeasonReport; selected: number };

export function getBackScreen(screen: Screen): Screen | null {
  if (screen.name === 'event') {
    return { name: 'report', report: screen.report, selected: screen.selected };
  }
  return null;
}

// Wraps around in both directions; an empty list stays at 0.
export function stepIndex(index: number, delta: number, count: number): number {
  if (count <= 0) return 0;
  return (((index + delta) % count) + count) % count;
}
