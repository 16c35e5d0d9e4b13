/**
 * Pipeline Runner
 *
 * Extracts the configured parameters from every PDF of a folder and writes
 * the result table.
 */

import {
  logger,
  config,
  setLogLevel,
  createRunContext,
  runWithContextAsync,
  loadPromptLibrary,
  OpenAiChatCompleter,
  RetryingChatCompleter,
  OpenAiEmbedder,
  PdfTextProvider,
  CachedTextProvider,
  ConfigurationError,
} from '@epiparam/shared';
import { parseArgs, USAGE } from './lib/args';
import { runPipeline } from './lib/run';

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
  const chat = new RetryingChatCompleter(new OpenAiChatCompleter({ config }), {
    maxAttempts: config.maxAttempts,
    backoffBaseMs: config.backoffBaseMs,
  });
  const textProvider = new CachedTextProvider(new PdfTextProvider(), args.cacheDir);
  const embedder = args.rag ? new OpenAiEmbedder({ config }) : undefined;

  await runWithContextAsync(createRunContext(), () =>
    runPipeline(args, library, { chat, textProvider, embedder })
  );
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
      logger.error('Pipeline failed', error);
    }
    process.exitCode = 1;
  });
