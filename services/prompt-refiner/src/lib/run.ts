/**
 * Refinement Run
 *
 * Runs the refinement loop for each configured parameter over the labelled
 * documents that have both a PDF and a ground-truth row.
 */

import {
  logger,
  config,
  ConfigurationError,
  listPdfFiles,
  documentIdFromPath,
  loadGroundTruth,
  ExtractionEngine,
  CumulativeTable,
  RefinementLoop,
  IterationBudget,
  AnyStopSignal,
  type ChatCompleter,
  type GroundTruthRecord,
  type LabelledDocument,
  type PromptLibrary,
  type PromptState,
  type RefinerConfig,
  type RefinerParameter,
  type StopSignal,
  type TextProvider,
} from '@epiparam/shared';

export interface RefinementOptions {
  folder: string;
  results: string;
  truth: string;
  budget: number;
  tolerance: number;
  parameter: string | null;
  structuredOutput?: boolean;
}

export interface RefinementDependencies {
  /** Extraction model */
  chat: ChatCompleter;
  /** Model that writes candidate prompts */
  refiner: ChatCompleter;
  textProvider: TextProvider;
  /** Operator signal asked after the budget check */
  operatorSignal?: StopSignal;
}

export function selectParameters(
  refinerConfig: RefinerConfig,
  name: string | null
): readonly RefinerParameter[] {
  if (name === null) return refinerConfig.parameters;
  const selected = refinerConfig.parameters.filter((p) => p.name === name);
  if (selected.length === 0) {
    throw new ConfigurationError(`Parameter "${name}" is not configured for refinement`);
  }
  return selected;
}

export function labelledDocuments(
  parameterName: string,
  truth: readonly GroundTruthRecord[],
  pdfFiles: readonly string[]
): LabelledDocument[] {
  const pdfById = new Map(pdfFiles.map((filePath) => [documentIdFromPath(filePath), filePath]));
  const documents: LabelledDocument[] = [];

  for (const record of truth) {
    if (record.parameterName !== parameterName) continue;
    const filePath = pdfById.get(record.documentId);
    if (!filePath) {
      logger.warn('Ground truth row has no PDF', { documentId: record.documentId, parameterName });
      continue;
    }
    documents.push({ documentId: record.documentId, filePath, trueValue: record.trueValue });
  }
  return documents;
}

export async function runRefinement(
  options: RefinementOptions,
  library: PromptLibrary,
  refinerConfig: RefinerConfig,
  deps: RefinementDependencies
): Promise<PromptState[]> {
  const parameters = selectParameters(refinerConfig, options.parameter);
  const truth = await loadGroundTruth(
    options.truth,
    parameters.map((p) => ({ parameterName: p.name, column: p.truthColumn }))
  );
  const pdfFiles = listPdfFiles(options.folder);
  const table = new CumulativeTable(options.results);

  const engine = new ExtractionEngine({
    chat: deps.chat,
    prompts: { systemPrompt: library.systemPrompt, refinePrompt: library.refinePrompt },
    structuredOutput: options.structuredOutput ?? config.structuredOutput,
    maxContextChars: config.maxContextChars,
  });

  const states: PromptState[] = [];
  for (const parameter of parameters) {
    const documents = labelledDocuments(parameter.name, truth, pdfFiles);
    if (documents.length === 0) {
      logger.warn('No labelled documents for parameter, skipping', { parameterName: parameter.name });
      continue;
    }

    const budget = new IterationBudget(options.budget);
    const stopSignal = deps.operatorSignal ? new AnyStopSignal(budget, deps.operatorSignal) : budget;

    const loop = new RefinementLoop({
      parameter,
      documents,
      textProvider: deps.textProvider,
      engine,
      refinePrompt: library.refinePrompt,
      refiner: deps.refiner,
      modelName: deps.chat.model,
      retrievalInstructions: refinerConfig.retrievalInstructions,
      table,
      stopSignal,
      tolerance: options.tolerance,
    });
    states.push(await loop.run());
  }
  return states;
}
