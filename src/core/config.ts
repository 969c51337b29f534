import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { getConfigDir } from './xdg.js';

const CONFIG_FILENAME = 'config.json';

const scoringMethodNameSchema = z.enum(['simple_weighted', 'zscore_normalized', 'prior_only']);
const regulationStateSchema = z.enum(['stable', 'reset']);
const unitInterval = z.number().min(0).max(1);
const positive = z.number().positive();

const tierPriorSchema = z.object({
  mean: z.number().finite(),
  variance: positive,
});

const modelConfigSchema = z.object({
  scoringMethod: scoringMethodNameSchema,
  regulationState: regulationStateSchema,
  minCleanLaps: z.number().int().nonnegative(),
  trustWeights: z.object({
    'practice-1': unitInterval,
    'practice-2': unitInterval,
    'practice-3': unitInterval,
    'sprint-qualifying': unitInterval,
  }),
  regulationScale: z.object({
    stable: z.number().nonnegative(),
    reset: z.number().nonnegative(),
  }),
  varianceFloor: positive,
  evidenceVariance: positive,
  weights: z.record(z.string(), z.number().finite()),
  paceCenter: z.number().finite(),
  paceSpread: z.number().finite(),
  outlierMads: positive.nullable(),
  prior: z
    .object({
      topMean: z.number().finite(),
      bottomMean: z.number().finite(),
      baseVariance: positive,
      minVariance: positive,
      rookieVarianceMultiplier: z.number().min(1),
      tierDefaults: z.record(z.string(), tierPriorSchema),
    })
    .refine((prior) => prior.topMean > prior.bottomMean, {
      message: 'topMean must be greater than bottomMean',
      path: ['topMean'],
    }),
  validation: z.object({
    minHistory: z.number().int().min(1),
    trustScaleGrid: z.array(z.number().nonnegative()).min(1),
  }),
});

export type ScoringMethodName = z.infer<typeof scoringMethodNameSchema>;
export type ModelConfig = z.infer<typeof modelConfigSchema>;
export type TrustWeightTable = ModelConfig['trustWeights'];
export type PriorTransformConfig = ModelConfig['prior'];

export const DEFAULT_MODEL_CONFIG: ModelConfig = {
  scoringMethod: 'zscore_normalized',
  regulationState: 'stable',
  minCleanLaps: 5,
  trustWeights: {
    'practice-1': 0.3,
    'practice-2': 0.3,
    'practice-3': 0.3,
    'sprint-qualifying': 0.8,
  },
  regulationScale: { stable: 0.5, reset: 1.0 },
  varianceFloor: 1e-6,
  evidenceVariance: 4,
  weights: {
    slowCorner: 0.15,
    mediumCorner: 0.3,
    highCorner: 0.15,
    straight: 0.2,
    throttle: 0.1,
    consistency: 0.1,
  },
  paceCenter: 12.5,
  paceSpread: 3.75,
  outlierMads: 3,
  prior: {
    topMean: 20,
    bottomMean: 5,
    baseVariance: 36,
    minVariance: 9,
    rookieVarianceMultiplier: 1.5,
    tierDefaults: {
      top: { mean: 17, variance: 16 },
      midfield: { mean: 11, variance: 25 },
      backmarker: { mean: 7, variance: 36 },
    },
  },
  validation: {
    minHistory: 1,
    trustScaleGrid: [0, 0.25, 0.5, 1, 1.5, 2],
  },
};

const overridesSchema = z
  .object({
    scoringMethod: scoringMethodNameSchema,
    regulationState: regulationStateSchema,
    minCleanLaps: z.number(),
    trustWeights: z
      .object({
        'practice-1': z.number(),
        'practice-2': z.number(),
        'practice-3': z.number(),
        'sprint-qualifying': z.number(),
      })
      .partial()
      .strict(),
    regulationScale: z.object({ stable: z.number(), reset: z.number() }).partial().strict(),
    varianceFloor: z.number(),
    evidenceVariance: z.number(),
    weights: z.record(z.string(), z.number()),
    paceCenter: z.number(),
    paceSpread: z.number(),
    outlierMads: z.number().nullable(),
    prior: z
      .object({
        topMean: z.number(),
        bottomMean: z.number(),
        baseVariance: z.number(),
        minVariance: z.number(),
        rookieVarianceMultiplier: z.number(),
        tierDefaults: z.record(z.string(), tierPriorSchema),
      })
      .partial(),
    validation: z
      .object({
        minHistory: z.number(),
        trustScaleGrid: z.array(z.number()),
      })
      .partial(),
  })
  .partial()
  .strict();

export type ModelConfigOverrides = z.infer<typeof overridesSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function mergeModelConfig(
  base: ModelConfig,
  overrides: ModelConfigOverrides,
): ModelConfig {
  const merged = {
    ...base,
    ...overrides,
    trustWeights: { ...base.trustWeights, ...overrides.trustWeights },
    regulationScale: { ...base.regulationScale, ...overrides.regulationScale },
    weights: { ...base.weights, ...overrides.weights },
    prior: {
      ...base.prior,
      ...overrides.prior,
      tierDefaults: { ...base.prior.tierDefaults, ...overrides.prior?.tierDefaults },
    },
    validation: { ...base.validation, ...overrides.validation },
  };
  const parsed = modelConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid model configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseModelConfigOverrides(raw: unknown): ModelConfigOverrides {
  const parsed = overridesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration file: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function getModelConfigPath(appName: string): string {
  return path.join(getConfigDir(appName), CONFIG_FILENAME);
}

export async function readModelConfig(
  appName: string,
  configPath: string = getModelConfigPath(appName),
): Promise<ModelConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return DEFAULT_MODEL_CONFIG;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `Configuration file ${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return mergeModelConfig(DEFAULT_MODEL_CONFIG, parseModelConfigOverrides(parsed));
}
