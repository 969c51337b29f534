import { rankBeliefs, runWeekend, type BeliefUpdate, type RankedPrediction } from './belief.js';
import type { ModelConfig } from './config.js';
import { MissingPriorInputError, toFailureRecord } from './errors.js';
import { scoreSession, type ScoringMethod, type ScoringOptions } from './evidence.js';
import type { PaceLogger } from './pace-logger.js';
import { initializePriors } from './prior.js';
import type {
  Belief,
  CompetitorId,
  CompetitorPrior,
  EventData,
  EvidenceObservation,
  FailureRecord,
  RosterEntry,
  StandingsEntry,
  TeamId,
  TierLabel,
} from './types.js';
import { classifyWeekend, type WeekendPlan } from './weekend.js';

export type EventContext = {
  standings: StandingsEntry[];
  teamTiers: Record<TeamId, TierLabel>;
  config: ModelConfig;
  method: ScoringMethod;
  // fitted multiplier on every trust weight
  trustScale?: number;
  logger?: PaceLogger;
};

export type EventPrediction = {
  eventId: string;
  plan: WeekendPlan;
  ranking: RankedPrediction[];
  priors: Map<CompetitorId, CompetitorPrior>;
  beliefs: Map<CompetitorId, Belief>;
  traces: Map<CompetitorId, BeliefUpdate[]>;
  failures: FailureRecord[];
};

export function scoringOptionsFor(config: ModelConfig, event: EventData): ScoringOptions {
  return {
    minCleanLaps: config.minCleanLaps,
    evidenceVariance: config.evidenceVariance,
    paceCenter: config.paceCenter,
    paceSpread: config.paceSpread,
    outlierMads: config.outlierMads,
    trackProfile: event.trackProfile,
  };
}

// Competitors seen in the session data but missing from the roster borrow
// their team from the standings, or fail.
function resolveParticipants(
  event: EventData,
  standings: StandingsEntry[],
): { roster: RosterEntry[]; failures: FailureRecord[] } {
  const roster = [...event.roster];
  const known = new Set(roster.map((entry) => entry.competitorId));
  const failures: FailureRecord[] = [];
  for (const row of event.metrics) {
    if (known.has(row.competitorId)) continue;
    known.add(row.competitorId);
    const entry = standings.find((candidate) => candidate.competitorId === row.competitorId);
    if (entry) {
      roster.push({ competitorId: entry.competitorId, teamId: entry.teamId });
      continue;
    }
    failures.push(
      toFailureRecord(
        'competitor',
        row.competitorId,
        new MissingPriorInputError(row.competitorId, 'not in standings and not on the roster'),
        event.eventId,
      ),
    );
  }
  return { roster, failures };
}

/**
 * Runs one event weekend: priors, weekend plan, per-session scoring and the
 * belief fold for every participant, then the predicted ranking.
 */
export function predictEvent(event: EventData, context: EventContext): EventPrediction {
  const { config, method, logger } = context;
  const participants = resolveParticipants(event, context.standings);
  const { priors, failures: priorFailures } = initializePriors(
    { standings: context.standings, teamTiers: context.teamTiers, roster: participants.roster },
    config.prior,
    logger,
  );

  const plan = classifyWeekend(event.sessions, {
    trustWeights: config.trustWeights,
    regulationState: config.regulationState,
    regulationScale: config.regulationScale,
    trustScale: context.trustScale,
  });

  const scoring = scoringOptionsFor(config, event);
  const scoredSessions = plan.steps.map((step) =>
    scoreSession(
      event.metrics.filter((row) => row.sessionId === step.sessionId),
      method,
      scoring,
    ),
  );

  const beliefs = new Map<CompetitorId, Belief>();
  const traces = new Map<CompetitorId, BeliefUpdate[]>();
  const observations = new Map<CompetitorId, number>();
  const eventPriors = new Map<CompetitorId, CompetitorPrior>();
  for (const { competitorId } of participants.roster) {
    const prior = priors.get(competitorId);
    if (!prior || eventPriors.has(competitorId)) continue;
    eventPriors.set(competitorId, prior);

    const steps = plan.steps.map((step, index) => {
      const observation: EvidenceObservation | null =
        scoredSessions[index]?.get(competitorId) ?? null;
      return { sessionId: step.sessionId, trustWeight: step.trustWeight, observation };
    });
    const outcome = runWeekend(prior, steps, { varianceFloor: config.varianceFloor, logger });
    beliefs.set(competitorId, outcome.belief);
    traces.set(competitorId, outcome.trace);
    observations.set(competitorId, outcome.observations);
  }

  const failures = [...participants.failures, ...priorFailures].map((failure) =>
    failure.eventId === undefined ? { ...failure, eventId: event.eventId } : failure,
  );

  return {
    eventId: event.eventId,
    plan,
    ranking: rankBeliefs(beliefs.values(), observations),
    priors: eventPriors,
    beliefs,
    traces,
    failures,
  };
}
