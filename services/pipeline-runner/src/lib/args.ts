/**
 * Command-line flags for the extraction pipeline.
 */

import { config, ConfigurationError, type TabularFormat } from '@epiparam/shared';

export interface PipelineArgs {
  folder: string;
  output: string;
  rag: boolean;
  ragN: number;
  explanations: boolean;
  format: TabularFormat;
  configDir: string;
  cacheDir: string;
  metrics: boolean;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage: pipeline-runner --folder <dir> [options]

  --folder <dir>        Folder of PDF articles (required)
  --output <dir>        Output folder (default: output)
  --rag                 Use retrieved chunks instead of the full text
  --rag-n <k>           Chunks retrieved per parameter (default: ${config.ragN})
  --explanations        Write Stage 1 responses to explanations.txt
  --format <csv|xlsx>   Result file format (default: csv)
  --config-dir <dir>    Prompt and parameter files (default: ${config.configDir})
  --cache-dir <dir>     Extracted text cache (default: ${config.textCacheDir})
  --metrics             Write Prometheus metrics to metrics.prom
  --verbose             Debug logging
  --help                Show this message`;

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`${flag} requires a value`);
  }
  return value;
}

export function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseArgs(args: string[]): PipelineArgs {
  const result: PipelineArgs = {
    folder: '',
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
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--folder') {
      result.folder = requireValue(args, i++, arg);
    } else if (arg === '--output') {
      result.output = requireValue(args, i++, arg);
    } else if (arg === '--rag') {
      result.rag = true;
    } else if (arg === '--rag-n') {
      result.ragN = parsePositiveInt(requireValue(args, i++, arg), arg);
    } else if (arg === '--explanations') {
      result.explanations = true;
    } else if (arg === '--format') {
      const format = requireValue(args, i++, arg);
      if (format !== 'csv' && format !== 'xlsx') {
        throw new ConfigurationError(`--format must be csv or xlsx, got "${format}"`);
      }
      result.format = format;
    } else if (arg === '--config-dir') {
      result.configDir = requireValue(args, i++, arg);
    } else if (arg === '--cache-dir') {
      result.cacheDir = requireValue(args, i++, arg);
    } else if (arg === '--metrics') {
      result.metrics = true;
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else {
      throw new ConfigurationError(`Unknown argument: ${arg}`);
    }
  }

  if (!result.folder && !result.help) {
    throw new ConfigurationError('--folder is required');
  }
  return result;
}
