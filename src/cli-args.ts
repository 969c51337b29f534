import type { ScoringMethodName } from './core/config.js';
import type { RegulationState } from './core/types.js';

export type CliArgs = {
  datasetPath: string;
  method?: Exclude<ScoringMethodName, 'prior_only'>;
  regulation?: RegulationState;
};

export const USAGE =
  'Usage: pacecast <dataset.json> [--method simple_weighted|zscore_normalized] [--regulation stable|reset]';

const METHODS = ['simple_weighted', 'zscore_normalized'] as const;
const REGULATIONS = ['stable', 'reset'] as const;

function pick<T extends string>(flag: string, value: string | undefined, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`--${flag} expects one of ${allowed.join(', ')}`);
  }
  return match;
}

// Accepts `--flag value` and `--flag=value`.
export function parseCliArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags = new Map<string, string | undefined>();
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const eq = arg.indexOf('=');
    if (eq >= 0) {
      flags.set(arg.slice(2, eq), arg.slice(eq + 1));
      continue;
    }
    flags.set(arg.slice(2), argv[i + 1]);
    i += 1;
  }

  for (const name of flags.keys()) {
    if (name !== 'method' && name !== 'regulation') {
      throw new Error(`Unknown option --${name}`);
    }
  }
  const [datasetPath, ...extra] = positional;
  if (!datasetPath || extra.length > 0) {
    throw new Error('Expected exactly one dataset path');
  }

  const args: CliArgs = { datasetPath };
  if (flags.has('method')) args.method = pick('method', flags.get('method'), METHODS);
  if (flags.has('regulation')) {
    args.regulation = pick('regulation', flags.get('regulation'), REGULATIONS);
  }
  return args;
}
