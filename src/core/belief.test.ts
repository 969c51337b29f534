import { describe, expect, it, vi } from 'vitest';
import {
  fuseObservations,
  rankBeliefs,
  runWeekend,
  seedBelief,
  updateBelief,
  type UpdateOptions,
} from './belief.js';
import type { Belief, CompetitorPrior, EvidenceObservation } from './types.js';

const options: UpdateOptions = { varianceFloor: 1e-6 };

function belief(mean: number, variance: number, competitorId = 'A'): Belief {
  return { competitorId, mean, variance, sessionIndex: 0 };
}

function evidence(value: number, variance: number, sessionId = 'fp1'): EvidenceObservation {
  return { competitorId: 'A', sessionId, value, variance };
}

const prior: CompetitorPrior = {
  competitorId: 'A',
  teamId: 't1',
  mean: 5,
  variance: 4,
  tierLabel: 'midfield',
  source: 'standings',
};

describe('updateBelief', () => {
  it('reproduces the worked fusion example', () => {
    const posterior = updateBelief(belief(5, 4), evidence(7, 1), 0.5, options);

    expect(posterior.mean).toBeCloseTo(6.333333333, 6);
    expect(posterior.variance).toBeCloseTo(1.333333333, 6);
    expect(posterior.sessionIndex).toBe(1);
  });

  it('passes the belief through at zero trust', () => {
    const posterior = updateBelief(belief(5, 4), evidence(7, 1), 0, options);
    expect(posterior).toEqual({ competitorId: 'A', mean: 5, variance: 4, sessionIndex: 1 });
  });

  it('passes the belief through without an observation', () => {
    const posterior = updateBelief(belief(5, 4), null, 0.8, options);
    expect(posterior).toEqual({ competitorId: 'A', mean: 5, variance: 4, sessionIndex: 1 });
  });

  it('keeps the posterior mean between prior and evidence and never widens', () => {
    for (const trust of [0, 0.1, 0.25, 0.5, 0.75, 1]) {
      for (const [priorMean, value] of [
        [5, 7],
        [12, 3],
        [8, 8.5],
      ] as const) {
        const start = belief(priorMean, 4);
        const posterior = updateBelief(start, evidence(value, 2), trust, options);
        expect(posterior.mean).toBeGreaterThanOrEqual(Math.min(priorMean, value));
        expect(posterior.mean).toBeLessThanOrEqual(Math.max(priorMean, value));
        expect(posterior.variance).toBeLessThanOrEqual(start.variance);
      }
    }
  });

  it('approaches the evidence under a vague prior at full trust', () => {
    const posterior = updateBelief(belief(5, 1e12), evidence(7, 1), 1, options);
    expect(posterior.mean).toBeCloseTo(7, 6);
    expect(posterior.variance).toBeCloseTo(1, 6);
  });

  it('rejects trust weights outside [0, 1]', () => {
    expect(() => updateBelief(belief(5, 4), evidence(7, 1), 1.2, options)).toThrow(RangeError);
    expect(() => updateBelief(belief(5, 4), evidence(7, 1), -0.1, options)).toThrow(RangeError);
  });

  it('clamps a degenerate evidence variance to the floor and logs it', () => {
    const logger = vi.fn();
    const posterior = updateBelief(belief(5, 4), evidence(7, 0), 1, { varianceFloor: 0.5, logger });

    // precision 0.25 + 1 / 0.5 = 2.25
    expect(posterior.variance).toBeCloseTo(1 / 2.25, 12);
    expect(posterior.mean).toBeCloseTo((5 * 0.25 + 7 * 2) / 2.25, 12);
    expect(logger).toHaveBeenCalledWith({
      type: 'variance-floor',
      competitorId: 'A',
      stage: 'evidence',
      variance: 0,
      clampedTo: 0.5,
    });
  });

  it('keeps the exact fused variance when it falls below the floor', () => {
    const logger = vi.fn();
    const posterior = updateBelief(belief(5, 0.5), evidence(7, 0.25), 1, {
      varianceFloor: 0.2,
      logger,
    });

    // precision 2 + 4 = 6
    expect(posterior.variance).toBeCloseTo(1 / 6, 12);
    expect(posterior.mean).toBeCloseTo((5 * 2 + 7 * 4) / 6, 12);
    expect(logger).not.toHaveBeenCalled();
  });

  it('clamps a zero prior variance when seeding', () => {
    const logger = vi.fn();
    const seeded = seedBelief({ ...prior, variance: 0 }, { varianceFloor: 0.5, logger });
    expect(seeded.variance).toBe(0.5);
    expect(logger).toHaveBeenCalledWith({
      type: 'variance-floor',
      competitorId: 'A',
      stage: 'prior',
      variance: 0,
      clampedTo: 0.5,
    });
  });
});

describe('fuseObservations', () => {
  it('matches two sequential updates with the combined precision', () => {
    const start = belief(10, 9);
    const first = evidence(13, 4, 'fp1');
    const second = evidence(8, 2.5, 'fp2');

    const sequential = updateBelief(
      updateBelief(start, first, 0.3, options),
      second,
      0.6,
      options,
    );
    const joint = fuseObservations(
      start,
      [
        { observation: first, trustWeight: 0.3 },
        { observation: second, trustWeight: 0.6 },
      ],
      options,
    );

    const combinedPrecision = 1 / 9 + 0.3 / 4 + 0.6 / 2.5;
    expect(joint.variance).toBeCloseTo(1 / combinedPrecision, 12);
    expect(sequential.variance).toBeCloseTo(joint.variance, 12);
    expect(sequential.mean).toBeCloseTo(joint.mean, 12);
    expect(sequential.sessionIndex).toBe(joint.sessionIndex);
  });

  it('does not depend on observation order', () => {
    const start = belief(10, 9);
    const a = evidence(13, 4);
    const b = evidence(8, 2.5);
    const ab = updateBelief(updateBelief(start, a, 0.3, options), b, 0.6, options);
    const ba = updateBelief(updateBelief(start, b, 0.6, options), a, 0.3, options);
    expect(ab.mean).toBeCloseTo(ba.mean, 12);
    expect(ab.variance).toBeCloseTo(ba.variance, 12);
  });
});

describe('runWeekend', () => {
  it('feeds each posterior forward as the next prior', () => {
    const outcome = runWeekend(
      prior,
      [
        { sessionId: 'FP1', observation: evidence(7, 1, 'FP1'), trustWeight: 0.5 },
        { sessionId: 'FP2', observation: null, trustWeight: 0.5 },
      ],
      options,
    );

    expect(outcome.observations).toBe(1);
    expect(outcome.trace).toHaveLength(2);
    expect(outcome.trace[0]?.prior).toEqual({ competitorId: 'A', mean: 5, variance: 4, sessionIndex: 0 });
    expect(outcome.trace[1]?.prior).toBe(outcome.trace[0]?.posterior);
    expect(outcome.trace[1]?.applied).toBe(false);
    expect(outcome.belief.mean).toBeCloseTo(6.333333333, 6);
    expect(outcome.belief.sessionIndex).toBe(2);
  });

  it('returns the seeded prior for an empty weekend', () => {
    const outcome = runWeekend(prior, [], options);
    expect(outcome.belief).toEqual({ competitorId: 'A', mean: 5, variance: 4, sessionIndex: 0 });
    expect(outcome.trace).toEqual([]);
  });

  it('seeds a belief at session index zero', () => {
    expect(seedBelief(prior, options).sessionIndex).toBe(0);
  });
});

describe('rankBeliefs', () => {
  it('orders by mean, then by lower variance', () => {
    const ranking = rankBeliefs(
      [belief(10, 4, 'A'), belief(12, 9, 'B'), belief(10, 1, 'C')],
      new Map([['B', 2]]),
    );

    expect(ranking.map((entry) => entry.competitorId)).toEqual(['B', 'C', 'A']);
    expect(ranking.map((entry) => entry.position)).toEqual([1, 2, 3]);
    expect(ranking[0]?.observations).toBe(2);
    expect(ranking[1]?.observations).toBe(0);
  });

  it('reports a 95% pace interval', () => {
    const [entry] = rankBeliefs([belief(10, 4, 'A')]);
    expect(entry?.interval[0]).toBeCloseTo(6.08, 10);
    expect(entry?.interval[1]).toBeCloseTo(13.92, 10);
  });
});
