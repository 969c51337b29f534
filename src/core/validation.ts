import type { ModelConfig } from './config.js';
import {
  InsufficientHistoryError,
  InvalidGroundTruthError,
  PacecastError,
  toFailureRecord,
  UnpairedEventError,
} from './errors.js';
import { withoutCategory, type ScoringMethod } from './evidence.js';
import type { PaceLogger } from './pace-logger.js';
import { predictEvent, type EventPrediction } from './pipeline.js';
import { mean, pairedTTest, type PairedTestResult } from './stats.js';
import type {
  CompetitorId,
  EventData,
  FailureRecord,
  MetricCategory,
  SeasonDataset,
  WeekendFormat,
} from './types.js';

export type EventError = {
  eventId: string;
  format: WeekendFormat;
  mae: number;
};

export type ValidationResult = Readonly<{
  methodLabel: string;
  // chronological
  perEventErrors: readonly EventError[];
  aggregateMae: number | null;
  ablationLabel: string | null;
}>;

export type MethodRun = {
  result: ValidationResult;
  predictions: Map<string, EventPrediction>;
  // fitted trust scale per evaluated event
  trustScales: Map<string, number>;
  failures: FailureRecord[];
};

export type ValidationContext = {
  dataset: SeasonDataset;
  config: ModelConfig;
  logger?: PaceLogger;
};

export type TemporalSplit = {
  event: EventData;
  // events strictly earlier than `event`
  history: EventData[];
};

export type PositionError = {
  competitorId: CompetitorId;
  predicted: number;
  actual: number;
  error: number;
};

export type MethodComparison = {
  baseline: MethodRun;
  candidate: MethodRun;
  pairedEvents: string[];
  // differences are baseline minus candidate MAE; positive favours the candidate
  significance: PairedTestResult;
};

export type AblationEntry = {
  category: MetricCategory;
  result: ValidationResult;
  // ablated MAE minus full MAE; positive means the category helped
  maeDelta: number | null;
};

export type FormatSegment = {
  events: number;
  aggregateMae: number | null;
};

export type SeasonReport = {
  season: number;
  comparison: MethodComparison;
  ablation: AblationEntry[];
  segments: {
    baseline: Record<WeekendFormat, FormatSegment>;
    candidate: Record<WeekendFormat, FormatSegment>;
  };
  failures: FailureRecord[];
};

export function orderEvents(events: EventData[]): EventData[] {
  return [...events].sort((a, b) => {
    const byDate = Date.parse(a.date) - Date.parse(b.date);
    if (Number.isFinite(byDate) && byDate !== 0) return byDate;
    if (a.round !== b.round) return a.round - b.round;
    return a.eventId.localeCompare(b.eventId);
  });
}

/**
 * Walk-forward splits: every event is evaluated against only the events that
 * came before it. Events with too little history are excluded.
 */
export function temporalSplits(
  events: EventData[],
  minHistory: number,
): { splits: TemporalSplit[]; excluded: InsufficientHistoryError[] } {
  const ordered = orderEvents(events);
  const splits: TemporalSplit[] = [];
  const excluded: InsufficientHistoryError[] = [];
  ordered.forEach((event, index) => {
    if (index < minHistory) {
      excluded.push(new InsufficientHistoryError(event.eventId, index, minHistory));
      return;
    }
    splits.push({ event, history: ordered.slice(0, index) });
  });
  return { splits, excluded };
}

export function validateGroundTruth(eventId: string, truth: Record<CompetitorId, number>): void {
  const entries = Object.entries(truth);
  if (entries.length === 0) {
    throw new InvalidGroundTruthError(eventId, 'no finishing positions');
  }
  const seen = new Map<number, CompetitorId>();
  for (const [competitorId, position] of entries) {
    if (!Number.isInteger(position) || position < 1) {
      throw new InvalidGroundTruthError(
        eventId,
        `position ${position} of ${competitorId} is not a positive integer`,
      );
    }
    const holder = seen.get(position);
    if (holder !== undefined) {
      throw new InvalidGroundTruthError(
        eventId,
        `position ${position} is held by both ${holder} and ${competitorId}`,
      );
    }
    seen.set(position, competitorId);
  }
}

/**
 * Position vectors of the competitors present in both the prediction and the
 * ground truth, each re-ranked densely among that shared set.
 */
export function positionErrors(
  eventId: string,
  predictedOrder: CompetitorId[],
  truth: Record<CompetitorId, number>,
): PositionError[] {
  validateGroundTruth(eventId, truth);
  const predicted = predictedOrder.filter((competitorId) => competitorId in truth);
  if (predicted.length === 0) {
    throw new InvalidGroundTruthError(eventId, 'no competitors in common with the prediction');
  }
  const shared = new Set(predicted);
  const actualOrder = Object.entries(truth)
    .filter(([competitorId]) => shared.has(competitorId))
    .sort((a, b) => a[1] - b[1])
    .map(([competitorId]) => competitorId);
  const actualPosition = new Map(actualOrder.map((competitorId, index) => [competitorId, index + 1]));

  return predicted.map((competitorId, index) => {
    const actual = actualPosition.get(competitorId) ?? 0;
    return { competitorId, predicted: index + 1, actual, error: Math.abs(index + 1 - actual) };
  });
}

export function meanAbsoluteError(
  eventId: string,
  predictedOrder: CompetitorId[],
  truth: Record<CompetitorId, number>,
): number {
  const errors = positionErrors(eventId, predictedOrder, truth);
  return errors.reduce((acc, entry) => acc + entry.error, 0) / errors.length;
}

type EventEvaluation = { prediction: EventPrediction; mae: number };

function createEvaluator(context: ValidationContext, method: ScoringMethod) {
  const cache = new Map<string, EventEvaluation>();
  return (event: EventData, trustScale: number): EventEvaluation => {
    const key = `${event.eventId}|${trustScale}`;
    const cached = cache.get(key);
    if (cached) return cached;
    const prediction = predictEvent(event, {
      standings: context.dataset.standings,
      teamTiers: context.dataset.teamTiers,
      config: context.config,
      method,
      trustScale,
      logger: context.logger,
    });
    const order = prediction.ranking.map((entry) => entry.competitorId);
    const evaluation = { prediction, mae: meanAbsoluteError(event.eventId, order, event.qualifying) };
    cache.set(key, evaluation);
    return evaluation;
  };
}

/**
 * Picks the trust scale with the lowest mean MAE over the history events.
 * Ties go to the smaller scale. Only `history` is read.
 */
export function fitTrustScale(
  eventId: string,
  history: EventData[],
  grid: number[],
  evaluate: (event: EventData, trustScale: number) => { mae: number },
): number {
  let best: { scale: number; mae: number } | null = null;
  for (const scale of [...grid].sort((a, b) => a - b)) {
    const errors: number[] = [];
    for (const event of history) {
      try {
        errors.push(evaluate(event, scale).mae);
      } catch (err) {
        if (err instanceof InvalidGroundTruthError) continue;
        throw err;
      }
    }
    const avg = mean(errors);
    if (avg === null) {
      throw new InsufficientHistoryError(eventId, 0, 1);
    }
    if (!best || avg < best.mae) best = { scale, mae: avg };
  }
  return best?.scale ?? 1;
}

/**
 * Runs one scoring method over the season with walk-forward fitting and
 * collects per-event errors. Failing events are reported, not fatal.
 */
export function validateMethod(
  context: ValidationContext,
  method: ScoringMethod,
  ablationLabel: string | null = null,
): MethodRun {
  const { config, logger } = context;
  const evaluate = createEvaluator(context, method);
  const { splits, excluded } = temporalSplits(context.dataset.events, config.validation.minHistory);

  const failures: FailureRecord[] = [];
  const exclude = (eventId: string, error: unknown) => {
    const failure = toFailureRecord('event', eventId, error, eventId);
    failures.push(failure);
    void logger?.({ type: 'event-excluded', eventId, code: failure.code, method: method.kind });
  };
  for (const error of excluded) exclude(error.eventId, error);

  const perEventErrors: EventError[] = [];
  const predictions = new Map<string, EventPrediction>();
  const trustScales = new Map<string, number>();
  for (const { event, history } of splits) {
    try {
      const trustScale =
        method.kind === 'prior_only'
          ? 1
          : fitTrustScale(event.eventId, history, config.validation.trustScaleGrid, evaluate);
      const { prediction, mae } = evaluate(event, trustScale);
      void logger?.({ type: 'trust-fit', eventId: event.eventId, method: method.kind, trustScale });
      trustScales.set(event.eventId, trustScale);
      predictions.set(event.eventId, prediction);
      failures.push(...prediction.failures);
      perEventErrors.push({ eventId: event.eventId, format: prediction.plan.format, mae });
    } catch (err) {
      if (!(err instanceof PacecastError)) throw err;
      exclude(event.eventId, err);
    }
  }

  return {
    result: createValidationResult(method.kind, perEventErrors, ablationLabel),
    predictions,
    trustScales,
    failures,
  };
}

function createValidationResult(
  methodLabel: string,
  perEventErrors: EventError[],
  ablationLabel: string | null,
): ValidationResult {
  return Object.freeze({
    methodLabel,
    perEventErrors: Object.freeze(perEventErrors.map((entry) => Object.freeze({ ...entry }))),
    aggregateMae: mean(perEventErrors.map((entry) => entry.mae)),
    ablationLabel,
  });
}

// Drops the events outside `eventIds`, recording each as a failure.
function restrictRun(
  run: MethodRun,
  eventIds: ReadonlySet<string>,
  otherMethod: string,
  logger?: PaceLogger,
): MethodRun {
  const kept: EventError[] = [];
  const failures = [...run.failures];
  const predictions = new Map(run.predictions);
  const trustScales = new Map(run.trustScales);
  for (const entry of run.result.perEventErrors) {
    if (eventIds.has(entry.eventId)) {
      kept.push(entry);
      continue;
    }
    predictions.delete(entry.eventId);
    trustScales.delete(entry.eventId);
    failures.push(
      toFailureRecord(
        'event',
        entry.eventId,
        new UnpairedEventError(entry.eventId, otherMethod),
        entry.eventId,
      ),
    );
    void logger?.({
      type: 'event-excluded',
      eventId: entry.eventId,
      code: 'unpaired-event',
      method: run.result.methodLabel,
    });
  }
  return {
    result: createValidationResult(run.result.methodLabel, kept, run.result.ablationLabel),
    predictions,
    trustScales,
    failures,
  };
}

/**
 * Runs the baseline and the candidate and keeps only the events both could
 * evaluate, so aggregates, segments and the paired test share one event set.
 */
export function compareMethods(
  context: ValidationContext,
  candidate: ScoringMethod,
): MethodComparison {
  const baselineRun = validateMethod(context, { kind: 'prior_only' });
  const candidateRun = validateMethod(context, candidate);

  const candidateIds = new Set(candidateRun.result.perEventErrors.map((entry) => entry.eventId));
  const pairedEvents = baselineRun.result.perEventErrors
    .map((entry) => entry.eventId)
    .filter((eventId) => candidateIds.has(eventId));
  const shared = new Set(pairedEvents);

  const baseline = restrictRun(baselineRun, shared, candidate.kind, context.logger);
  const paired = restrictRun(candidateRun, shared, 'prior_only', context.logger);
  return {
    baseline,
    candidate: paired,
    pairedEvents,
    significance: pairedTTest(
      baseline.result.perEventErrors.map((entry) => entry.mae),
      paired.result.perEventErrors.map((entry) => entry.mae),
    ),
  };
}

/**
 * Re-runs the method once per metric category with that category's weight
 * zeroed, reporting how much worse (or better) the MAE gets.
 */
export function runAblation(
  context: ValidationContext,
  method: ScoringMethod,
  full: ValidationResult = validateMethod(context, method).result,
): AblationEntry[] {
  if (method.kind === 'prior_only') return [];
  return Object.keys(method.weights).map((category) => {
    const { result } = validateMethod(context, withoutCategory(method, category), category);
    const maeDelta =
      result.aggregateMae === null || full.aggregateMae === null
        ? null
        : result.aggregateMae - full.aggregateMae;
    return { category, result, maeDelta };
  });
}

export function segmentByFormat(result: ValidationResult): Record<WeekendFormat, FormatSegment> {
  const segment = (format: WeekendFormat): FormatSegment => {
    const errors = result.perEventErrors
      .filter((entry) => entry.format === format)
      .map((entry) => entry.mae);
    return { events: errors.length, aggregateMae: mean(errors) };
  };
  return { standard: segment('standard'), sprint: segment('sprint') };
}

function dedupeFailures(failures: FailureRecord[]): FailureRecord[] {
  const seen = new Set<string>();
  return failures.filter((failure) => {
    const key = `${failure.scope}|${failure.eventId ?? ''}|${failure.id}|${failure.code}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function evaluateSeason(context: ValidationContext, candidate: ScoringMethod): SeasonReport {
  void context.logger?.({
    type: 'run-start',
    season: context.dataset.season,
    events: context.dataset.events.length,
    method: candidate.kind,
  });
  const comparison = compareMethods(context, candidate);
  const ablation = runAblation(context, candidate, comparison.candidate.result);
  const report: SeasonReport = {
    season: context.dataset.season,
    comparison,
    ablation,
    segments: {
      baseline: segmentByFormat(comparison.baseline.result),
      candidate: segmentByFormat(comparison.candidate.result),
    },
    failures: dedupeFailures([...comparison.baseline.failures, ...comparison.candidate.failures]),
  };
  void context.logger?.({
    type: 'run-finish',
    season: context.dataset.season,
    baselineMae: comparison.baseline.result.aggregateMae,
    candidateMae: comparison.candidate.result.aggregateMae,
    pValue: comparison.significance.pValue,
  });
  return report;
}
