import { describe, expect, it } from 'vitest';
import { parseCliArgs } from './cli-args.js';

describe('parseCliArgs', () => {
  it('reads the dataset path alone', () => {
    expect(parseCliArgs(['season.json'])).toEqual({ datasetPath: 'season.json' });
  });

  it('reads both flag spellings', () => {
    expect(
      parseCliArgs(['--method', 'simple_weighted', 'season.json', '--regulation=reset']),
    ).toEqual({ datasetPath: 'season.json', method: 'simple_weighted', regulation: 'reset' });
  });

  it('rejects unknown methods and options', () => {
    expect(() => parseCliArgs(['season.json', '--method', 'prior_only'])).toThrow(
      '--method expects one of simple_weighted, zscore_normalized',
    );
    expect(() => parseCliArgs(['season.json', '--verbose=1'])).toThrow('Unknown option --verbose');
  });

  it('requires exactly one dataset', () => {
    expect(() => parseCliArgs([])).toThrow('Expected exactly one dataset path');
    expect(() => parseCliArgs(['a.json', 'b.json'])).toThrow('Expected exactly one dataset path');
  });
});
