export type CompetitorId = string;
export type TeamId = string;
export type TierLabel = string;

export type RegulationState = 'stable' | 'reset';

export type WeekendFormat = 'standard' | 'sprint';

export type SessionType =
  | 'practice-1'
  | 'practice-2'
  | 'practice-3'
  | 'sprint-qualifying'
  | 'sprint'
  | 'qualifying'
  | 'race';

// Sessions whose evidence may feed the belief chain.
export type EvidenceSessionType = Extract<
  SessionType,
  'practice-1' | 'practice-2' | 'practice-3' | 'sprint-qualifying'
>;

export type MetricCategory = string;

export type StandingsEntry = {
  competitorId: CompetitorId;
  teamId: TeamId;
  rank?: number | null;
  points?: number | null;
  // Completed seasons of standings history. Missing means one.
  seasons?: number | null;
};

export type RosterEntry = {
  competitorId: CompetitorId;
  teamId: TeamId;
};

export type CompetitorPrior = {
  readonly competitorId: CompetitorId;
  readonly teamId: TeamId;
  readonly mean: number;
  readonly variance: number;
  readonly tierLabel: TierLabel;
  readonly source: 'standings' | 'team-tier';
};

// One Feature Extractor row: aggregate metrics of a competitor in a session.
export type SessionMetrics = {
  competitorId: CompetitorId;
  sessionId: string;
  cleanLaps: number;
  metrics: Record<MetricCategory, number>;
};

export type EvidenceObservation = {
  readonly competitorId: CompetitorId;
  readonly sessionId: string;
  readonly value: number;
  readonly variance: number;
};

export type Belief = {
  readonly competitorId: CompetitorId;
  readonly mean: number;
  readonly variance: number;
  readonly sessionIndex: number;
};

export type TrackProfile = Partial<Record<MetricCategory, number>>;

export type EventData = {
  eventId: string;
  name?: string;
  round: number;
  date: string;
  sessions: string[];
  trackProfile?: TrackProfile;
  roster: RosterEntry[];
  metrics: SessionMetrics[];
  // competitorId -> qualifying position (1 = pole)
  qualifying: Record<CompetitorId, number>;
};

export type SeasonDataset = {
  season: number;
  regulationState?: RegulationState;
  standings: StandingsEntry[];
  teamTiers: Record<TeamId, TierLabel>;
  events: EventData[];
};

export type FailureScope = 'competitor' | 'event';

export type FailureRecord = {
  scope: FailureScope;
  id: string;
  code: string;
  message: string;
  eventId?: string;
};
