import { mergeModelConfig, type ModelConfig } from './config.js';
import { createScoringMethod, type ScoringMethod } from './evidence.js';
import type { PaceLogger } from './pace-logger.js';
import type { RegulationState, SeasonDataset } from './types.js';
import { evaluateSeason, type SeasonReport } from './validation.js';

export type SeasonRunOptions = {
  method?: ModelConfig['scoringMethod'];
  regulation?: RegulationState;
  logger?: PaceLogger;
};

export type SeasonRun = {
  config: ModelConfig;
  method: ScoringMethod;
  report: SeasonReport;
};

/**
 * Resolves the effective configuration for one dataset and evaluates it.
 * Regulation state comes from the command line, then the dataset, then the
 * configuration file.
 */
export function runSeason(
  base: ModelConfig,
  dataset: SeasonDataset,
  options: SeasonRunOptions = {},
): SeasonRun {
  const config = mergeModelConfig(base, {
    regulationState: options.regulation ?? dataset.regulationState ?? base.regulationState,
    scoringMethod: options.method ?? base.scoringMethod,
  });
  const method = createScoringMethod(config.scoringMethod, config.weights);
  const report = evaluateSeason({ dataset, config, logger: options.logger }, method);
  return { config, method, report };
}
