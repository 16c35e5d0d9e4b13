/**
 * Evaluator
 *
 * Prints confusion-matrix metrics for a refinement iteration or for a
 * pipeline result table.
 */

import {
  logger,
  ConfigurationError,
  CumulativeTable,
  readCsvFile,
} from '@epiparam/shared';
import { parseArgs, USAGE } from './lib/args';
import {
  evaluateExtraction,
  evaluateIteration,
  renderIterationReport,
  renderScoreReport,
} from './lib/report';

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  switch (args.kind) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'iteration': {
      const table = new CumulativeTable(args.results);
      if (!table.exists()) {
        throw new ConfigurationError(`Results table not found: ${args.results}`);
      }
      const report = evaluateIteration(await table.read(), args.iteration, args.parameter);
      console.log(renderIterationReport(report));
      return 0;
    }
    case 'extraction': {
      const report = evaluateExtraction(
        await readCsvFile(args.extracted),
        await readCsvFile(args.truth),
        args.tolerance
      );
      console.log(renderScoreReport(report));
      return 0;
    }
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`\n${error.message}\n\n${USAGE}`);
    } else {
      logger.error('Evaluation failed', error);
    }
    process.exitCode = 1;
  });
