import type { ModelConfig } from './config.js';
import type { EvidenceSessionType, SessionType, WeekendFormat } from './types.js';

export type TrustSettings = Pick<ModelConfig, 'trustWeights' | 'regulationState' | 'regulationScale'> & {
  // Extra multiplier fitted by the validation harness. Defaults to 1.
  trustScale?: number;
};

export type SessionStep = {
  sessionId: string;
  sessionType: EvidenceSessionType;
  trustWeight: number;
};

export type WeekendPlan = {
  format: WeekendFormat;
  steps: SessionStep[];
  // expected sessions that were not available
  missing: EvidenceSessionType[];
  // identifiers that are not a known session
  ignored: string[];
};

const STANDARD_SEQUENCE: EvidenceSessionType[] = ['practice-1', 'practice-2', 'practice-3'];
const SPRINT_SEQUENCE: EvidenceSessionType[] = ['practice-1', 'sprint-qualifying'];

const SESSION_ALIASES: Record<string, SessionType> = {
  fp1: 'practice-1',
  practice1: 'practice-1',
  freepractice1: 'practice-1',
  fp2: 'practice-2',
  practice2: 'practice-2',
  freepractice2: 'practice-2',
  fp3: 'practice-3',
  practice3: 'practice-3',
  freepractice3: 'practice-3',
  sq: 'sprint-qualifying',
  ss: 'sprint-qualifying',
  sprintqualifying: 'sprint-qualifying',
  sprintshootout: 'sprint-qualifying',
  sprint: 'sprint',
  sprintrace: 'sprint',
  q: 'qualifying',
  quali: 'qualifying',
  qualifying: 'qualifying',
  r: 'race',
  race: 'race',
  grandprix: 'race',
};

export function normalizeSessionType(sessionId: string): SessionType | null {
  const key = sessionId.toLowerCase().replace(/[^a-z0-9]/g, '');
  return SESSION_ALIASES[key] ?? null;
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function resolveTrustWeight(sessionType: EvidenceSessionType, settings: TrustSettings): number {
  const base = settings.trustWeights[sessionType];
  const regulation = settings.regulationScale[settings.regulationState];
  return clamp01(base * regulation * (settings.trustScale ?? 1));
}

/**
 * Works out the weekend format from the available sessions and the ordered,
 * trust-weighted session sequence the belief chain consumes. Qualifying,
 * sprint and race sessions never enter the sequence.
 */
export function classifyWeekend(sessionIds: Iterable<string>, settings: TrustSettings): WeekendPlan {
  const available = new Map<SessionType, string>();
  const ignored: string[] = [];
  for (const sessionId of sessionIds) {
    const type = normalizeSessionType(sessionId);
    if (type === null) {
      ignored.push(sessionId);
      continue;
    }
    if (!available.has(type)) available.set(type, sessionId);
  }

  const format: WeekendFormat =
    available.has('sprint-qualifying') || available.has('sprint') ? 'sprint' : 'standard';
  const sequence = format === 'sprint' ? SPRINT_SEQUENCE : STANDARD_SEQUENCE;

  const steps: SessionStep[] = [];
  const missing: EvidenceSessionType[] = [];
  for (const sessionType of sequence) {
    const sessionId = available.get(sessionType);
    if (sessionId === undefined) {
      missing.push(sessionType);
      continue;
    }
    steps.push({ sessionId, sessionType, trustWeight: resolveTrustWeight(sessionType, settings) });
  }

  return { format, steps, missing, ignored };
}
