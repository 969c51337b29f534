import fs from 'node:fs';
import path from 'node:path';

export type PaceEventType =
  | 'run-start'
  | 'run-finish'
  | 'variance-floor'
  | 'prior-missing'
  | 'event-excluded'
  | 'trust-fit';

export type PaceLogEvent = { type: PaceEventType } & Record<string, unknown>;

// Core modules only ever call this; where the events go is the caller's choice.
export type PaceLogger = (event: PaceLogEvent) => void | Promise<void>;

type CreatePaceLoggerOptions = {
  dataDir: string;
  now?: () => Date;
  mkdir?: typeof fs.promises.mkdir;
  appendFile?: typeof fs.promises.appendFile;
};

const LOGGED_EVENT_TYPES = new Set<string>([
  'run-start',
  'run-finish',
  'variance-floor',
  'prior-missing',
  'event-excluded',
  'trust-fit',
]);

export function createPaceLogger({
  dataDir,
  now = () => new Date(),
  mkdir = fs.promises.mkdir,
  appendFile = fs.promises.appendFile,
}: CreatePaceLoggerOptions): { logPath: string; logger: PaceLogger } {
  const logDir = path.join(dataDir, 'logs');
  const logPath = path.join(logDir, 'pacecast.log');

  const logger = async (event: PaceLogEvent) => {
    if (!LOGGED_EVENT_TYPES.has(event.type)) return;
    const line = `${JSON.stringify({ time: now().toISOString(), ...event })}\n`;
    try {
      await mkdir(logDir, { recursive: true });
      await appendFile(logPath, line, 'utf-8');
    } catch {
      // A failed log write never fails the run.
    }
  };

  return { logPath, logger };
}
