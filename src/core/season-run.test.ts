import { describe, expect, it } from 'vitest';
import { DEFAULT_MODEL_CONFIG } from './config.js';
import { runSeason } from './season-run.js';
import type { EventData, SeasonDataset } from './types.js';

const event = (eventId: string, round: number, date: string): EventData => ({
  eventId,
  round,
  date,
  sessions: ['FP1', 'FP2', 'FP3', 'Q'],
  roster: [
    { competitorId: 'A', teamId: 't1' },
    { competitorId: 'B', teamId: 't2' },
  ],
  metrics: [
    { competitorId: 'A', sessionId: 'FP1', cleanLaps: 9, metrics: { straight: 1 } },
    { competitorId: 'B', sessionId: 'FP1', cleanLaps: 9, metrics: { straight: -1 } },
  ],
  qualifying: { A: 1, B: 2 },
});

const dataset: SeasonDataset = {
  season: 2026,
  regulationState: 'reset',
  standings: [
    { competitorId: 'A', teamId: 't1', rank: 1 },
    { competitorId: 'B', teamId: 't2', rank: 2 },
  ],
  teamTiers: { t1: 'top', t2: 'midfield' },
  events: [event('e1', 1, '2026-03-01'), event('e2', 2, '2026-03-08')],
};

describe('runSeason', () => {
  it('takes the regulation state from the dataset over the config file', () => {
    const run = runSeason(DEFAULT_MODEL_CONFIG, dataset);
    expect(run.config.regulationState).toBe('reset');
    expect(run.method.kind).toBe('zscore_normalized');
  });

  it('lets the command line override both', () => {
    const run = runSeason(DEFAULT_MODEL_CONFIG, dataset, {
      regulation: 'stable',
      method: 'simple_weighted',
    });
    expect(run.config.regulationState).toBe('stable');
    expect(run.method).toEqual({ kind: 'simple_weighted', weights: DEFAULT_MODEL_CONFIG.weights });
  });

  it('evaluates every event after the first', () => {
    const { report } = runSeason(DEFAULT_MODEL_CONFIG, dataset);
    expect(report.comparison.pairedEvents).toEqual(['e2']);
    expect(report.comparison.baseline.result.aggregateMae).toBe(0);
    expect(report.ablation.map((entry) => entry.category)).toEqual(
      Object.keys(DEFAULT_MODEL_CONFIG.weights),
    );
  });
});
