/**
 * Command-line parsing for the three CLIs
 */

import { config, ConfigurationError } from '@epiparam/shared';
import { parseArgs as parsePipelineArgs } from '../../services/pipeline-runner/src/lib/args';
import {
  iterationBudget,
  parseArgs as parseRefinerArgs,
} from '../../services/prompt-refiner/src/lib/args';
import { parseArgs as parseEvaluatorArgs } from '../../services/evaluator/src/lib/args';

describe('pipeline-runner arguments', () => {
  it('applies defaults', () => {
    expect(parsePipelineArgs(['--folder', 'papers'])).toEqual({
      folder: 'papers',
      output: 'output',
      rag: false,
      ragN: config.ragN,
      explanations: false,
      format: 'csv',
      configDir: config.configDir,
      cacheDir: config.textCacheDir,
      metrics: false,
      verbose: false,
      help: false,
    });
  });

  it('reads every flag', () => {
    const args = parsePipelineArgs([
      '--folder', 'papers',
      '--output', 'out',
      '--rag',
      '--rag-n', '3',
      '--explanations',
      '--format', 'xlsx',
      '--metrics',
    ]);

    expect(args).toMatchObject({
      folder: 'papers',
      output: 'out',
      rag: true,
      ragN: 3,
      explanations: true,
      format: 'xlsx',
      metrics: true,
    });
  });

  it.each([
    [[], '--folder is required'],
    [['--folder'], '--folder requires a value'],
    [['--folder', 'p', '--rag-n', '0'], '--rag-n must be a positive integer, got "0"'],
    [['--folder', 'p', '--format', 'json'], '--format must be csv or xlsx, got "json"'],
    [['--folder', 'p', '--bogus'], 'Unknown argument: --bogus'],
  ])('rejects %p', (argv, message) => {
    expect(() => parsePipelineArgs(argv)).toThrow(ConfigurationError);
    expect(() => parsePipelineArgs(argv)).toThrow(message);
  });

  it('allows --help without a folder', () => {
    expect(parsePipelineArgs(['--help']).help).toBe(true);
  });
});

describe('prompt-refiner arguments', () => {
  it('requires the folder and the truth table', () => {
    expect(() => parseRefinerArgs(['--folder', 'papers'])).toThrow('--truth is required');
    expect(() => parseRefinerArgs(['--truth', 'truth.csv'])).toThrow('--folder is required');
  });

  it('reads every flag', () => {
    const args = parseRefinerArgs([
      '--folder', 'papers',
      '--truth', 'truth.csv',
      '--results', 'runs.csv',
      '--iterations', '4',
      '--tolerance', '0.5',
      '--parameter', 'Case fatality rate',
      '--interactive',
    ]);

    expect(args).toMatchObject({
      folder: 'papers',
      truth: 'truth.csv',
      results: 'runs.csv',
      iterations: 4,
      tolerance: 0.5,
      parameter: 'Case fatality rate',
      interactive: true,
    });
  });

  it('rejects a non-positive iteration count', () => {
    expect(() =>
      parseRefinerArgs(['--folder', 'p', '--truth', 't', '--iterations', '0'])
    ).toThrow('--iterations must be a positive integer, got "0"');
  });

  it('derives the iteration budget', () => {
    expect(iterationBudget({ iterations: null, interactive: false })).toBe(1);
    expect(iterationBudget({ iterations: null, interactive: true })).toBe(Number.POSITIVE_INFINITY);
    expect(iterationBudget({ iterations: 3, interactive: true })).toBe(3);
  });
});

describe('evaluator arguments', () => {
  it('parses iteration mode', () => {
    expect(parseEvaluatorArgs(['--results', 'runs.csv', '--iteration', '2'])).toEqual({
      kind: 'iteration',
      results: 'runs.csv',
      iteration: 2,
      parameter: null,
    });
  });

  it('parses extraction mode', () => {
    expect(
      parseEvaluatorArgs(['--extracted', 'out.csv', '--truth', 'truth.csv', '--tolerance', '2'])
    ).toEqual({ kind: 'extraction', extracted: 'out.csv', truth: 'truth.csv', tolerance: 2 });
  });

  it('parses help', () => {
    expect(parseEvaluatorArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it.each([
    [[], 'Either --results or --extracted is required'],
    [['--results', 'r.csv'], '--iteration <n> is required with --results'],
    [['--extracted', 'e.csv'], '--truth <csv> is required with --extracted'],
    [['--results', 'r.csv', '--extracted', 'e.csv'], 'Use either --results or --extracted, not both'],
  ])('rejects %p', (argv, message) => {
    expect(() => parseEvaluatorArgs(argv)).toThrow(message);
  });
});
