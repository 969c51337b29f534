import { promises as fs } from 'node:fs';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_MODEL_CONFIG,
  getModelConfigPath,
  mergeModelConfig,
  readModelConfig,
} from './config.js';
import { ConfigError } from './errors.js';

const originalEnv = { ...process.env };

afterEach(() => {
  process.env = { ...originalEnv };
});

function setTempConfigHome(base: string) {
  process.env.XDG_CONFIG_HOME = base;
  process.env.APPDATA = base;
  process.env.HOME = base;
}

async function writeConfig(contents: string) {
  const configPath = getModelConfigPath('pacecast');
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, contents, 'utf-8');
}

describe('model config', () => {
  it('returns the defaults when the file is missing', async () => {
    const base = path.join(tmpdir(), `pacecast-config-${Date.now()}-missing`);
    setTempConfigHome(base);

    const cfg = await readModelConfig('pacecast');
    expect(cfg).toEqual(DEFAULT_MODEL_CONFIG);
  });

  it('merges overrides over the defaults', async () => {
    const base = path.join(tmpdir(), `pacecast-config-${Date.now()}-merge`);
    setTempConfigHome(base);
    await writeConfig(
      JSON.stringify({
        regulationState: 'reset',
        trustWeights: { 'sprint-qualifying': 0.9 },
        weights: { straight: 0.5 },
        prior: { tierDefaults: { rookie: { mean: 6, variance: 40 } } },
      }),
    );

    const cfg = await readModelConfig('pacecast');
    expect(cfg.regulationState).toBe('reset');
    expect(cfg.trustWeights).toEqual({
      'practice-1': 0.3,
      'practice-2': 0.3,
      'practice-3': 0.3,
      'sprint-qualifying': 0.9,
    });
    expect(cfg.weights.straight).toBe(0.5);
    expect(cfg.weights.mediumCorner).toBe(0.3);
    expect(cfg.prior.tierDefaults.rookie).toEqual({ mean: 6, variance: 40 });
    expect(cfg.prior.tierDefaults.top).toEqual({ mean: 17, variance: 16 });
    expect(cfg.prior.topMean).toBe(20);
  });

  it('rejects out-of-range values', async () => {
    const base = path.join(tmpdir(), `pacecast-config-${Date.now()}-range`);
    setTempConfigHome(base);
    await writeConfig(JSON.stringify({ trustWeights: { 'practice-1': 1.5 } }));

    await expect(readModelConfig('pacecast')).rejects.toThrow(
      /Invalid model configuration: trustWeights\.practice-1/,
    );
  });

  it('rejects unknown keys', async () => {
    const base = path.join(tmpdir(), `pacecast-config-${Date.now()}-unknown`);
    setTempConfigHome(base);
    await writeConfig(JSON.stringify({ trustWeight: 0.4 }));

    await expect(readModelConfig('pacecast')).rejects.toThrow(/Invalid configuration file/);
  });

  it('rejects malformed JSON', async () => {
    const base = path.join(tmpdir(), `pacecast-config-${Date.now()}-json`);
    setTempConfigHome(base);
    await writeConfig('{ "regulationState": ');

    await expect(readModelConfig('pacecast')).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('mergeModelConfig', () => {
  it('keeps the prior mean transform decreasing', () => {
    expect(() =>
      mergeModelConfig(DEFAULT_MODEL_CONFIG, { prior: { topMean: 4 } }),
    ).toThrow('Invalid model configuration: prior.topMean: topMean must be greater than bottomMean');
  });

  it('does not mutate the base config', () => {
    mergeModelConfig(DEFAULT_MODEL_CONFIG, { weights: { straight: 0 } });
    expect(DEFAULT_MODEL_CONFIG.weights.straight).toBe(0.2);
  });
});
