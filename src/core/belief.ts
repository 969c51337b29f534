import type { PaceLogger } from './pace-logger.js';
import type { Belief, CompetitorId, CompetitorPrior, EvidenceObservation } from './types.js';

export type UpdateOptions = {
  varianceFloor: number;
  logger?: PaceLogger;
};

export type WeightedObservation = {
  observation: EvidenceObservation | null;
  trustWeight: number;
};

export type WeekendStep = WeightedObservation & { sessionId: string };

export type BeliefUpdate = {
  sessionId: string;
  trustWeight: number;
  observation: number | null;
  applied: boolean;
  prior: Belief;
  posterior: Belief;
};

export type WeekendOutcome = {
  belief: Belief;
  observations: number;
  trace: BeliefUpdate[];
};

export type RankedPrediction = {
  position: number;
  competitorId: CompetitorId;
  mean: number;
  variance: number;
  // 95% interval on the pace scale
  interval: [number, number];
  observations: number;
};

function assertTrustWeight(trustWeight: number): void {
  if (!Number.isFinite(trustWeight) || trustWeight < 0 || trustWeight > 1) {
    throw new RangeError(`Trust weight must lie in [0, 1], got ${trustWeight}`);
  }
}

function assertFinite(label: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new RangeError(`${label} must be finite, got ${value}`);
  }
}

// Supplied variances (prior, evidence) are held at or above the floor.
function floorVariance(
  variance: number,
  competitorId: CompetitorId,
  stage: string,
  { varianceFloor, logger }: UpdateOptions,
): number {
  if (Number.isFinite(variance) && variance >= varianceFloor) return variance;
  void logger?.({
    type: 'variance-floor',
    competitorId,
    stage,
    variance: Number.isFinite(variance) ? variance : String(variance),
    clampedTo: varianceFloor,
  });
  return varianceFloor;
}

// The fused variance is exact; it is replaced only when it is degenerate.
function guardPosterior(variance: number, competitorId: CompetitorId, options: UpdateOptions): number {
  if (Number.isFinite(variance) && variance > 0) return variance;
  return floorVariance(variance, competitorId, 'posterior', options);
}

export function seedBelief(prior: CompetitorPrior, options: UpdateOptions): Belief {
  assertFinite('Prior mean', prior.mean);
  return {
    competitorId: prior.competitorId,
    mean: prior.mean,
    variance: floorVariance(prior.variance, prior.competitorId, 'prior', options),
    sessionIndex: 0,
  };
}

/**
 * Fuses a belief with any number of independent observations in one step:
 * posterior precision is the prior precision plus the sum of λᵢ/σᵢ².
 * A single observation is the ordinary per-session update.
 */
export function fuseObservations(
  belief: Belief,
  items: WeightedObservation[],
  options: UpdateOptions,
): Belief {
  const priorPrecision = 1 / belief.variance;
  let precision = priorPrecision;
  let weightedSum = belief.mean * priorPrecision;
  let applied = 0;

  for (const { observation, trustWeight } of items) {
    assertTrustWeight(trustWeight);
    if (observation === null || trustWeight === 0) continue;
    assertFinite('Evidence value', observation.value);
    const variance = floorVariance(
      observation.variance,
      belief.competitorId,
      'evidence',
      options,
    );
    const effectivePrecision = trustWeight / variance;
    precision += effectivePrecision;
    weightedSum += observation.value * effectivePrecision;
    applied += 1;
  }

  const sessionIndex = belief.sessionIndex + items.length;
  if (applied === 0) {
    return { ...belief, sessionIndex };
  }
  return {
    competitorId: belief.competitorId,
    mean: weightedSum / precision,
    variance: guardPosterior(1 / precision, belief.competitorId, options),
    sessionIndex,
  };
}

export function updateBelief(
  belief: Belief,
  observation: EvidenceObservation | null,
  trustWeight: number,
  options: UpdateOptions,
): Belief {
  return fuseObservations(belief, [{ observation, trustWeight }], options);
}

/**
 * Folds a weekend's sessions into the prior, in order. Each posterior is the
 * next session's prior.
 */
export function runWeekend(
  prior: CompetitorPrior,
  steps: WeekendStep[],
  options: UpdateOptions,
): WeekendOutcome {
  const initial: WeekendOutcome = { belief: seedBelief(prior, options), observations: 0, trace: [] };
  return steps.reduce<WeekendOutcome>((state, step) => {
    const posterior = updateBelief(state.belief, step.observation, step.trustWeight, options);
    const applied = step.observation !== null && step.trustWeight > 0;
    return {
      belief: posterior,
      observations: state.observations + (applied ? 1 : 0),
      trace: [
        ...state.trace,
        {
          sessionId: step.sessionId,
          trustWeight: step.trustWeight,
          observation: step.observation?.value ?? null,
          applied,
          prior: state.belief,
          posterior,
        },
      ],
    };
  }, initial);
}

/**
 * Orders competitors fastest first: higher posterior mean, then lower
 * variance, then competitor id.
 */
export function rankBeliefs(
  beliefs: Iterable<Belief>,
  observations: ReadonlyMap<CompetitorId, number> = new Map(),
): RankedPrediction[] {
  return [...beliefs]
    .sort((a, b) => {
      if (b.mean !== a.mean) return b.mean - a.mean;
      if (a.variance !== b.variance) return a.variance - b.variance;
      return a.competitorId.localeCompare(b.competitorId);
    })
    .map((belief, index): RankedPrediction => {
      const halfWidth = 1.96 * Math.sqrt(belief.variance);
      return {
        position: index + 1,
        competitorId: belief.competitorId,
        mean: belief.mean,
        variance: belief.variance,
        interval: [belief.mean - halfWidth, belief.mean + halfWidth],
        observations: observations.get(belief.competitorId) ?? 0,
      };
    });
}
