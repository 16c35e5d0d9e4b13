/**
 * Command-line flags for the evaluator.
 */

import { config, ConfigurationError } from '@epiparam/shared';

export type EvaluatorArgs =
  | {
      kind: 'iteration';
      results: string;
      iteration: number;
      parameter: string | null;
    }
  | {
      kind: 'extraction';
      extracted: string;
      truth: string;
      tolerance: number;
    }
  | { kind: 'help' };

export const USAGE = `Usage:
  evaluator --results <csv> --iteration <n> [--parameter <name>]
      Metrics of one refinement iteration and the changes since iteration n-1
  evaluator --extracted <csv> --truth <csv> [--tolerance <x>]
      Score a pipeline result table against ground truth`;

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(args: string[]): EvaluatorArgs {
  const values = new Map<string, string>();
  const valueFlags = ['--results', '--iteration', '--parameter', '--extracted', '--truth', '--tolerance'];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    }
    if (!valueFlags.includes(arg)) {
      throw new ConfigurationError(`Unknown argument: ${arg}`);
    }
    values.set(arg, requireValue(args, i++, arg));
  }

  const results = values.get('--results');
  const extracted = values.get('--extracted');

  if (results !== undefined && extracted !== undefined) {
    throw new ConfigurationError('Use either --results or --extracted, not both');
  }

  if (results !== undefined) {
    const raw = values.get('--iteration');
    const iteration = Number(raw);
    if (raw === undefined || !Number.isInteger(iteration)) {
      throw new ConfigurationError('--iteration <n> is required with --results');
    }
    return { kind: 'iteration', results, iteration, parameter: values.get('--parameter') ?? null };
  }

  if (extracted !== undefined) {
    const truth = values.get('--truth');
    if (truth === undefined) {
      throw new ConfigurationError('--truth <csv> is required with --extracted');
    }
    const raw = values.get('--tolerance');
    const tolerance = raw === undefined ? config.tolerance : Number(raw);
    if (!Number.isFinite(tolerance) || tolerance < 0) {
      throw new ConfigurationError(`--tolerance must be a non-negative number, got "${raw}"`);
    }
    return { kind: 'extraction', extracted, truth, tolerance };
  }

  throw new ConfigurationError('Either --results or --extracted is required');
}
