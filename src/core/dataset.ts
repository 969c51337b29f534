import { promises as fs } from 'node:fs';
import { z } from 'zod';
import { DatasetError } from './errors.js';
import type { SeasonDataset } from './types.js';

const idSchema = z.string().min(1);
const finite = z.number().finite();

const standingsEntrySchema = z.object({
  competitorId: idSchema,
  teamId: idSchema,
  rank: z.number().int().positive().nullable().optional(),
  points: finite.nullable().optional(),
  seasons: z.number().int().nonnegative().nullable().optional(),
});

const rosterEntrySchema = z.object({
  competitorId: idSchema,
  teamId: idSchema,
});

const sessionMetricsSchema = z.object({
  competitorId: idSchema,
  sessionId: idSchema,
  cleanLaps: z.number().int().nonnegative(),
  metrics: z.record(z.string(), finite),
});

const eventSchema = z.object({
  eventId: idSchema,
  name: z.string().optional(),
  round: z.number().int().nonnegative(),
  date: z.string().refine((value) => Number.isFinite(Date.parse(value)), {
    message: 'Expected an ISO date',
  }),
  sessions: z.array(idSchema),
  trackProfile: z.record(z.string(), z.number().nonnegative()).optional(),
  roster: z.array(rosterEntrySchema),
  metrics: z.array(sessionMetricsSchema).default([]),
  // positions are checked per event during validation, not here
  qualifying: z.record(z.string(), z.number()),
});

const seasonDatasetSchema = z
  .object({
    season: z.number().int(),
    regulationState: z.enum(['stable', 'reset']).optional(),
    standings: z.array(standingsEntrySchema),
    teamTiers: z.record(z.string(), z.string().min(1)),
    events: z.array(eventSchema),
  })
  .superRefine((dataset, ctx) => {
    const seen = new Set<string>();
    dataset.events.forEach((event, index) => {
      if (seen.has(event.eventId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate eventId ${event.eventId}`,
          path: ['events', index, 'eventId'],
        });
      }
      seen.add(event.eventId);
    });
  });

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

export function parseSeasonDataset(raw: unknown, source = 'input'): SeasonDataset {
  const parsed = seasonDatasetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DatasetError(source, parsed.error.issues.map(formatIssue));
  }
  return parsed.data;
}

export async function loadSeasonDataset(filePath: string): Promise<SeasonDataset> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DatasetError(filePath, [`unable to read file (${message})`]);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DatasetError(filePath, [`not valid JSON (${message})`]);
  }
  return parseSeasonDataset(raw, filePath);
}
