import type { PriorTransformConfig } from './config.js';
import { MissingPriorInputError, toFailureRecord } from './errors.js';
import type { PaceLogger } from './pace-logger.js';
import type {
  CompetitorId,
  CompetitorPrior,
  FailureRecord,
  RosterEntry,
  StandingsEntry,
  TeamId,
  TierLabel,
} from './types.js';

export type PriorInputs = {
  standings: StandingsEntry[];
  teamTiers: Record<TeamId, TierLabel>;
  roster: RosterEntry[];
};

export type PriorInitialization = {
  priors: Map<CompetitorId, CompetitorPrior>;
  failures: FailureRecord[];
};

type TierAggregate = { mean: number; variance: number };

const UNKNOWN_TIER = 'unknown';

function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function hasHistory(entry: StandingsEntry): boolean {
  return isFiniteNumber(entry.rank) || isFiniteNumber(entry.points);
}

// Rank wins when every established entry carries one; otherwise points decide.
export function orderStandings(entries: StandingsEntry[]): StandingsEntry[] {
  const byRank = entries.every((entry) => isFiniteNumber(entry.rank));
  return [...entries].sort((a, b) => {
    const diff = byRank
      ? (a.rank ?? 0) - (b.rank ?? 0)
      : (b.points ?? 0) - (a.points ?? 0);
    if (diff !== 0) return diff;
    return a.competitorId.localeCompare(b.competitorId);
  });
}

export function standingsMean(order: number, fieldSize: number, transform: PriorTransformConfig): number {
  if (fieldSize <= 1) return transform.topMean;
  const step = (transform.topMean - transform.bottomMean) / (fieldSize - 1);
  return transform.topMean - (order - 1) * step;
}

export function standingsVariance(
  seasons: number | null | undefined,
  transform: PriorTransformConfig,
): number {
  const history = isFiniteNumber(seasons) && seasons >= 0 ? seasons : 1;
  return Math.max(transform.minVariance, transform.baseVariance / (1 + history));
}

function aggregateTiers(priors: Iterable<CompetitorPrior>): Map<TierLabel, TierAggregate> {
  const grouped = new Map<TierLabel, CompetitorPrior[]>();
  for (const prior of priors) {
    if (prior.tierLabel === UNKNOWN_TIER) continue;
    const members = grouped.get(prior.tierLabel) ?? [];
    members.push(prior);
    grouped.set(prior.tierLabel, members);
  }
  const aggregates = new Map<TierLabel, TierAggregate>();
  for (const [tier, members] of grouped) {
    const mean = members.reduce((acc, member) => acc + member.mean, 0) / members.length;
    const variance = members.reduce((acc, member) => acc + member.variance, 0) / members.length;
    aggregates.set(tier, { mean, variance });
  }
  return aggregates;
}

function resolveRookiePrior(
  entry: RosterEntry,
  teamTiers: Record<TeamId, TierLabel>,
  aggregates: Map<TierLabel, TierAggregate>,
  transform: PriorTransformConfig,
): CompetitorPrior {
  const tier = teamTiers[entry.teamId];
  if (tier === undefined) {
    throw new MissingPriorInputError(
      entry.competitorId,
      `no standings history and team ${entry.teamId} has no tier`,
    );
  }
  const base = aggregates.get(tier) ?? transform.tierDefaults[tier];
  if (base === undefined) {
    throw new MissingPriorInputError(
      entry.competitorId,
      `tier ${tier} has no established members and no configured default`,
    );
  }
  return {
    competitorId: entry.competitorId,
    teamId: entry.teamId,
    mean: base.mean,
    variance: base.variance * transform.rookieVarianceMultiplier,
    tierLabel: tier,
    source: 'team-tier',
  };
}

/**
 * Builds one prior per competitor from the previous standings.
 *
 * Competitors with standings history get a mean from their field order and a
 * variance that shrinks with seasons of history. Roster competitors without
 * history inherit their team tier's aggregate with an inflated variance.
 * Unresolvable competitors are reported in `failures` and left out.
 */
export function initializePriors(
  { standings, teamTiers, roster }: PriorInputs,
  transform: PriorTransformConfig,
  logger?: PaceLogger,
): PriorInitialization {
  const seen = new Set<CompetitorId>();
  const established = standings.filter((entry) => {
    if (!hasHistory(entry) || seen.has(entry.competitorId)) return false;
    seen.add(entry.competitorId);
    return true;
  });
  const currentTeam = new Map(roster.map((entry) => [entry.competitorId, entry.teamId]));

  const priors = new Map<CompetitorId, CompetitorPrior>();
  const ordered = orderStandings(established);
  ordered.forEach((entry, index) => {
    const teamId = currentTeam.get(entry.competitorId) ?? entry.teamId;
    priors.set(entry.competitorId, {
      competitorId: entry.competitorId,
      teamId,
      mean: standingsMean(index + 1, ordered.length, transform),
      variance: standingsVariance(entry.seasons, transform),
      tierLabel: teamTiers[teamId] ?? UNKNOWN_TIER,
      source: 'standings',
    });
  });

  const aggregates = aggregateTiers(priors.values());
  const failures: FailureRecord[] = [];
  for (const entry of roster) {
    if (priors.has(entry.competitorId)) continue;
    try {
      priors.set(
        entry.competitorId,
        resolveRookiePrior(entry, teamTiers, aggregates, transform),
      );
    } catch (err) {
      if (!(err instanceof MissingPriorInputError)) throw err;
      failures.push(toFailureRecord('competitor', entry.competitorId, err));
      void logger?.({ type: 'prior-missing', competitorId: entry.competitorId, teamId: entry.teamId });
    }
  }

  return { priors, failures };
}
