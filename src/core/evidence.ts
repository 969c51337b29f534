import type { ScoringMethodName } from './config.js';
import { filterOutliersMad, mean, sampleStandardDeviation } from './stats.js';
import type {
  CompetitorId,
  EvidenceObservation,
  MetricCategory,
  SessionMetrics,
  TrackProfile,
} from './types.js';

export type MetricWeights = Record<MetricCategory, number>;

export type ScoringMethod =
  | { kind: 'simple_weighted'; weights: MetricWeights }
  | { kind: 'zscore_normalized'; weights: MetricWeights }
  | { kind: 'prior_only' };

export type ScoringOptions = {
  minCleanLaps: number;
  evidenceVariance: number;
  paceCenter: number;
  paceSpread: number;
  outlierMads: number | null;
  trackProfile?: TrackProfile;
};

export type FieldStatistics = Map<MetricCategory, { mean: number; std: number } | null>;

export function createScoringMethod(name: ScoringMethodName, weights: MetricWeights): ScoringMethod {
  switch (name) {
    case 'simple_weighted':
      return { kind: 'simple_weighted', weights: { ...weights } };
    case 'zscore_normalized':
      return { kind: 'zscore_normalized', weights: { ...weights } };
    case 'prior_only':
      return { kind: 'prior_only' };
  }
}

/** The same method with one category zeroed out. prior_only has nothing to remove. */
export function withoutCategory(method: ScoringMethod, category: MetricCategory): ScoringMethod {
  if (method.kind === 'prior_only') return method;
  return { ...method, weights: { ...method.weights, [category]: 0 } };
}

export function weightedCategories(method: ScoringMethod): MetricCategory[] {
  if (method.kind === 'prior_only') return [];
  return Object.entries(method.weights)
    .filter(([, weight]) => weight !== 0)
    .map(([category]) => category);
}

export function effectiveWeights(
  weights: MetricWeights,
  trackProfile?: TrackProfile,
): Array<[MetricCategory, number]> {
  return Object.entries(weights)
    .map(([category, weight]): [MetricCategory, number] => {
      const share = trackProfile?.[category];
      return [category, typeof share === 'number' ? weight * share : weight];
    })
    .filter(([, weight]) => weight !== 0);
}

export function isUsable(row: SessionMetrics, minCleanLaps: number): boolean {
  return Number.isFinite(row.cleanLaps) && row.cleanLaps >= minCleanLaps;
}

function readMetric(row: SessionMetrics, category: MetricCategory): number | null {
  const value = row.metrics[category];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Mean and sample standard deviation of each weighted category across the
 * usable rows of one session. Outliers (by MAD) are left out of the field
 * statistics but are still scored against them.
 */
export function computeFieldStatistics(
  rows: SessionMetrics[],
  categories: MetricCategory[],
  outlierMads: number | null,
): FieldStatistics {
  const stats: FieldStatistics = new Map();
  for (const category of categories) {
    const values = rows
      .map((row) => readMetric(row, category))
      .filter((value): value is number => value !== null);
    const kept = outlierMads === null ? values : filterOutliersMad(values, outlierMads);
    const avg = mean(kept);
    const std = sampleStandardDeviation(kept);
    stats.set(category, avg === null || std === null ? null : { mean: avg, std });
  }
  return stats;
}

function zScore(value: number | null, field: { mean: number; std: number } | null | undefined) {
  if (value === null || !field || field.std <= 0) return 0;
  return (value - field.mean) / field.std;
}

/**
 * Scores one competitor's session. Returns null when the method yields no
 * observation or the row is below the clean-lap threshold.
 */
export function scoreCompetitor(
  row: SessionMetrics,
  method: ScoringMethod,
  options: ScoringOptions,
  field?: FieldStatistics,
): EvidenceObservation | null {
  if (method.kind === 'prior_only') return null;
  if (!isUsable(row, options.minCleanLaps)) return null;

  let signal = 0;
  for (const [category, weight] of effectiveWeights(method.weights, options.trackProfile)) {
    const value = readMetric(row, category);
    if (method.kind === 'simple_weighted') {
      signal += weight * (value ?? 0);
    } else {
      signal += weight * zScore(value, field?.get(category));
    }
  }

  return {
    competitorId: row.competitorId,
    sessionId: row.sessionId,
    value: options.paceCenter + options.paceSpread * signal,
    variance: options.evidenceVariance,
  };
}

/**
 * Scores every competitor of one session. The first row per competitor wins;
 * each competitor maps to its observation or null.
 */
export function scoreSession(
  rows: SessionMetrics[],
  method: ScoringMethod,
  options: ScoringOptions,
): Map<CompetitorId, EvidenceObservation | null> {
  const unique = new Map<CompetitorId, SessionMetrics>();
  for (const row of rows) {
    if (!unique.has(row.competitorId)) unique.set(row.competitorId, row);
  }

  let field: FieldStatistics | undefined;
  if (method.kind === 'zscore_normalized') {
    const usable = [...unique.values()].filter((row) => isUsable(row, options.minCleanLaps));
    field = computeFieldStatistics(usable, weightedCategories(method), options.outlierMads);
  }

  const scored = new Map<CompetitorId, EvidenceObservation | null>();
  for (const [competitorId, row] of unique) {
    scored.set(competitorId, scoreCompetitor(row, method, options, field));
  }
  return scored;
}
