import { describe, expect, it } from 'vitest';
import { CliUsageError, parseArgs } from '../../../src/cli/args.js';

describe('parseArgs', () => {
  it('falls back to help', () => {
    expect(parseArgs([])).toEqual({ command: 'help' });
    expect(parseArgs(['--help'])).toEqual({ command: 'help' });
  });

  it('parses a single stage run', () => {
    expect(parseArgs(['run', '--stage', '3', '--year', '2023'])).toEqual({
      command: 'run',
      stages: [3],
      year: 2023,
      court: undefined,
      overrides: {},
      resetCheckpoint: false,
    });
  });

  it('parses a stage list with options and a court', () => {
    const parsed = parseArgs([
      'run',
      '--stages=2, 3',
      '--year',
      '2022',
      '--court',
      'ZASCA',
      '--chunk-size',
      '800',
      '--overlap=80',
      '--model',
      'claude-3-haiku-20240307',
      '--reset-checkpoint',
    ]);

    expect(parsed).toEqual({
      command: 'run',
      stages: [2, 3],
      year: 2022,
      court: 'ZASCA',
      overrides: { chunkSize: 800, overlap: 80, model: 'claude-3-haiku-20240307' },
      resetCheckpoint: true,
    });
  });

  it('expands run-all to every stage', () => {
    const parsed = parseArgs(['run-all', '--year', '2021', '--min-reportability', '60']);

    expect(parsed).toMatchObject({
      command: 'run',
      stages: [1, 2, 3, 4, 5, 6, 7, 8],
      overrides: { minReportability: 60 },
    });
  });

  it('rejects bad run arguments', () => {
    expect(() => parseArgs(['run', '--year', '2023'])).toThrow('run requires --stage N or --stages 1,2,3');
    expect(() => parseArgs(['run', '--stage', '1', '--stages', '1,2', '--year', '2023'])).toThrow(
      'Use either --stage or --stages, not both'
    );
    expect(() => parseArgs(['run', '--stage', '1'])).toThrow('--year is required');
    expect(() => parseArgs(['run', '--stage', 'two', '--year', '2023'])).toThrow(
      '--stage must be an integer, got "two"'
    );
    expect(() => parseArgs(['run', '--stage', '1', '--year'])).toThrow('--year requires a value');
  });

  it('rejects a stage selection on run-all', () => {
    expect(() => parseArgs(['run-all', '--stage', '3', '--year', '2023'])).toThrow(
      'run-all runs every stage; use run --stages to pick some'
    );
    expect(() => parseArgs(['run-all', '--stages=1,2', '--year', '2023'])).toThrow(CliUsageError);
  });

  it('rejects years out of range', () => {
    expect(() => parseArgs(['run', '--stage', '1', '--year', '-5'])).toThrow(
      '--year must be between 1800 and 2100, got -5'
    );
    expect(() => parseArgs(['run-all', '--year', '23'])).toThrow('--year must be between 1800 and 2100, got 23');
    expect(parseArgs(['run', '--stage', '1', '--year', '1995'])).toMatchObject({ year: 1995 });
  });

  it('parses the classification command', () => {
    expect(parseArgs(['classify-practice-areas'])).toEqual({
      command: 'classify-practice-areas',
      batchSize: 20,
      force: false,
      model: undefined,
    });
    expect(parseArgs(['classify-practice-areas', '--batch-size', '5', '--force'])).toMatchObject({
      batchSize: 5,
      force: true,
    });
  });

  it('joins the search query from positional words', () => {
    expect(parseArgs(['search', 'unfair', 'dismissal', '--limit', '3'])).toEqual({
      command: 'search',
      query: 'unfair dismissal',
      limit: 3,
      court: undefined,
    });
    expect(() => parseArgs(['search'])).toThrow('search requires a query');
  });

  it('requires a positive search limit and batch size', () => {
    expect(() => parseArgs(['search', 'bail', '--limit', '0'])).toThrow('--limit must be a positive integer, got 0');
    expect(() => parseArgs(['search', 'bail', '--limit', '-3'])).toThrow('--limit must be a positive integer, got -3');
    expect(() => parseArgs(['classify-practice-areas', '--batch-size', '0'])).toThrow(
      '--batch-size must be a positive integer, got 0'
    );
  });

  it('names the valid commands for an unknown one', () => {
    expect(() => parseArgs(['scrape'])).toThrow(CliUsageError);
    expect(() => parseArgs(['scrape'])).toThrow(/^Unknown command: scrape\. Valid commands: list, run, run-all/);
  });
});
