/**
 * Prompt Refiner
 *
 * Iteratively rewrites the extraction prompt of a parameter and scores each
 * version against ground truth. Results accumulate in one CSV across runs.
 */

import {
  logger,
  config,
  setLogLevel,
  createRunContext,
  runWithContextAsync,
  loadPromptLibrary,
  loadRefinerConfig,
  OpenAiChatCompleter,
  RetryingChatCompleter,
  PdfTextProvider,
  CachedTextProvider,
  InteractiveStopSignal,
  ConfigurationError,
  formatMetricsReport,
} from '@epiparam/shared';
import { iterationBudget, parseArgs, USAGE } from './lib/args';
import { runRefinement } from './lib/run';

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.verbose) {
    setLogLevel('debug');
  }

  const library = loadPromptLibrary(args.configDir);
  const refinerConfig = loadRefinerConfig(args.configDir);
  const retryPolicy = { maxAttempts: config.maxAttempts, backoffBaseMs: config.backoffBaseMs };

  const chat = new RetryingChatCompleter(new OpenAiChatCompleter({ config }), retryPolicy);
  const refiner = new RetryingChatCompleter(
    new OpenAiChatCompleter({ config, model: config.llmModelRefiner }),
    retryPolicy
  );

  const states = await runWithContextAsync(createRunContext(), () =>
    runRefinement(
      {
        folder: args.folder,
        results: args.results,
        truth: args.truth,
        budget: iterationBudget(args),
        tolerance: args.tolerance,
        parameter: args.parameter,
      },
      library,
      refinerConfig,
      {
        chat,
        refiner,
        textProvider: new CachedTextProvider(new PdfTextProvider(), args.cacheDir),
        operatorSignal: args.interactive ? new InteractiveStopSignal() : undefined,
      }
    )
  );

  for (const state of states) {
    const last = state.history[state.history.length - 1];
    console.log(`\n${state.parameterName}: iteration ${state.iteration}`);
    if (last) {
      console.log(formatMetricsReport(last.metrics));
    }
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      logger.error('Configuration error', error);
      console.error(`\n${error.message}\n\n${USAGE}`);
    } else {
      logger.error('Prompt refinement failed', error);
    }
    process.exitCode = 1;
  });
