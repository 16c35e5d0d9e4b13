/**
 * Command-line flags for the prompt refiner.
 */

import { config, ConfigurationError } from '@epiparam/shared';

export interface RefinerArgs {
  folder: string;
  results: string;
  truth: string;
  /** null when --iterations was not given */
  iterations: number | null;
  tolerance: number;
  interactive: boolean;
  parameter: string | null;
  configDir: string;
  cacheDir: string;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage: prompt-refiner --folder <dir> --truth <csv> [options]

  --folder <dir>        Folder of labelled PDF articles (required)
  --truth <csv>         Ground-truth table (required)
  --results <csv>       Cumulative results table (default: refinement_results.csv)
  --iterations <n>      Iterations to run (default: 1, unlimited with --interactive)
  --tolerance <x>       Absolute tolerance for numeric matches (default: ${config.tolerance})
  --interactive         Ask before every further iteration
  --parameter <name>    Refine only this parameter
  --config-dir <dir>    Prompt and parameter files (default: ${config.configDir})
  --cache-dir <dir>     Extracted text cache (default: ${config.textCacheDir})
  --verbose             Debug logging
  --help                Show this message`;

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(args: string[]): RefinerArgs {
  const result: RefinerArgs = {
    folder: '',
    results: 'refinement_results.csv',
    truth: '',
    iterations: null,
    tolerance: config.tolerance,
    interactive: false,
    parameter: null,
    configDir: config.configDir,
    cacheDir: config.textCacheDir,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--folder') {
      result.folder = requireValue(args, i++, arg);
    } else if (arg === '--results') {
      result.results = requireValue(args, i++, arg);
    } else if (arg === '--truth') {
      result.truth = requireValue(args, i++, arg);
    } else if (arg === '--iterations') {
      const value = requireValue(args, i++, arg);
      const iterations = Number(value);
      if (!Number.isInteger(iterations) || iterations < 1) {
        throw new ConfigurationError(`--iterations must be a positive integer, got "${value}"`);
      }
      result.iterations = iterations;
    } else if (arg === '--tolerance') {
      const value = requireValue(args, i++, arg);
      const tolerance = Number(value);
      if (!Number.isFinite(tolerance) || tolerance < 0) {
        throw new ConfigurationError(`--tolerance must be a non-negative number, got "${value}"`);
      }
      result.tolerance = tolerance;
    } else if (arg === '--interactive') {
      result.interactive = true;
    } else if (arg === '--parameter') {
      result.parameter = requireValue(args, i++, arg);
    } else if (arg === '--config-dir') {
      result.configDir = requireValue(args, i++, arg);
    } else if (arg === '--cache-dir') {
      result.cacheDir = requireValue(args, i++, arg);
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else {
      throw new ConfigurationError(`Unknown argument: ${arg}`);
    }
  }

  if (!result.help) {
    if (!result.folder) throw new ConfigurationError('--folder is required');
    if (!result.truth) throw new ConfigurationError('--truth is required');
  }
  return result;
}

/**
 * Iterations to run: the given count, otherwise one (or no limit when the
 * operator decides interactively).
 */
export function iterationBudget(args: Pick<RefinerArgs, 'iterations' | 'interactive'>): number {
  if (args.iterations !== null) return args.iterations;
  return args.interactive ? Number.POSITIVE_INFINITY : 1;
}
