import { inspect } from 'node:util';
import type { FailureRecord, FailureScope } from './types.js';

export type ErrorCode =
  | 'missing-prior-input'
  | 'insufficient-history'
  | 'invalid-ground-truth'
  | 'config'
  | 'dataset'
  | 'unpaired-event';

export class PacecastError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MissingPriorInputError extends PacecastError {
  readonly competitorId: string;

  constructor(competitorId: string, reason: string) {
    super('missing-prior-input', `No prior for ${competitorId}: ${reason}`);
    this.competitorId = competitorId;
  }
}

export class InsufficientHistoryError extends PacecastError {
  readonly eventId: string;
  readonly available: number;

  constructor(eventId: string, available: number, required: number) {
    super(
      'insufficient-history',
      `Event ${eventId} has ${available} earlier event(s); ${required} required for fitting.`,
    );
    this.eventId = eventId;
    this.available = available;
  }
}

export class InvalidGroundTruthError extends PacecastError {
  constructor(eventId: string, reason: string) {
    super('invalid-ground-truth', `Ground truth for ${eventId} is invalid: ${reason}`);
  }
}

export class UnpairedEventError extends PacecastError {
  constructor(eventId: string, otherMethod: string) {
    super(
      'unpaired-event',
      `Event ${eventId} left out of the comparison: ${otherMethod} could not evaluate it`,
    );
  }
}

export class ConfigError extends PacecastError {
  constructor(message: string) {
    super('config', message);
  }
}

export class DatasetError extends PacecastError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super('dataset', `Invalid dataset ${source}: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function toFailureRecord(
  scope: FailureScope,
  id: string,
  error: unknown,
  eventId?: string,
): FailureRecord {
  const code = error instanceof PacecastError ? error.code : 'unexpected';
  const message = error instanceof Error ? error.message : formatUnknownError(error);
  const record: FailureRecord = { scope, id, code, message };
  return eventId === undefined ? record : { ...record, eventId };
}

export function formatUnknownError(error: unknown): string {
  if (!error) return 'Unknown error';
  if (typeof error === 'string') return error;
  if (error instanceof PacecastError) return `${error.message} • code ${error.code}`;
  if (error instanceof Error) {
    const parts = [error.message || 'Error'];
    if ('code' in error && typeof error.code === 'string') parts.push(`code ${error.code}`);
    return parts.join(' • ');
  }
  if (typeof error === 'object' && 'message' in error) {
    const message = error.message;
    if (typeof message === 'string' && message.trim().length > 0) return message;
  }
  try {
    const json = JSON.stringify(error);
    if (json && json !== '{}') return json;
  } catch {
    // fall through to inspect for cyclic values
  }
  if (typeof error === 'object') {
    return inspect(error, { depth: 3, breakLength: 120, maxArrayLength: 20 });
  }
  return String(error);
}
