/**
 * Prompt Refinement Loop
 *
 * INIT -> GENERATE_CANDIDATE -> APPLY -> EVALUATE -> DECIDE
 *   DECIDE -> GENERATE_CANDIDATE (continue) | STOP
 *
 * Every iteration extracts one parameter from the labelled documents with a
 * candidate Stage 1 prompt, scores the results and appends them to the
 * cumulative table.
 */

import { logger } from '../logger';
import { withChildContext } from '../context';
import { DocumentReadError, errorMessage } from '../errors';
import { recoveredErrorsCounter } from '../metrics';
import type { ChatCompleter } from '../llm/types';
import type { TextProvider } from '../documents/types';
import type { ExtractionEngine } from '../extraction/engine';
import type { CumulativeTable } from '../output/cumulative-table';
import type { RefinerParameter } from '../prompts/library';
import { buildCandidatePrompt, buildRefinementMetaPrompt } from '../templates';
import { classify, outcomeLabel } from '../evaluation/confusion';
import { aggregate } from '../evaluation/metrics';
import type { PromptState, RefinementRow, TrueValue } from '../types';
import { buildPromptHistory, lastIteration, lastPrompt } from './history';
import type { StopSignal } from './stop-signal';

export type RefinementState =
  | 'INIT'
  | 'GENERATE_CANDIDATE'
  | 'APPLY'
  | 'EVALUATE'
  | 'DECIDE'
  | 'STOP';

const TRANSITIONS: Record<RefinementState, readonly RefinementState[]> = {
  INIT: ['GENERATE_CANDIDATE'],
  GENERATE_CANDIDATE: ['APPLY'],
  APPLY: ['EVALUATE'],
  EVALUATE: ['DECIDE'],
  DECIDE: ['GENERATE_CANDIDATE', 'STOP'],
  STOP: [],
};

export class IllegalTransitionError extends Error {
  constructor(from: RefinementState, to: RefinementState) {
    super(`Illegal refinement transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export interface LabelledDocument {
  documentId: string;
  filePath: string;
  trueValue: TrueValue;
}

export interface RefinementLoopOptions {
  parameter: RefinerParameter;
  /** Labelled documents; processed in document id order */
  documents: readonly LabelledDocument[];
  textProvider: TextProvider;
  engine: ExtractionEngine;
  /** Stage 2 prompt used for every iteration */
  refinePrompt: string;
  /** Model that writes candidate prompts */
  refiner: ChatCompleter;
  /** Name recorded in the model_name column */
  modelName: string;
  retrievalInstructions: string;
  table: CumulativeTable;
  stopSignal: StopSignal;
  tolerance: number;
}

export function defaultBasePrompt(parameter: RefinerParameter): string {
  if (parameter.basePrompt) return parameter.basePrompt;
  return parameter.description
    ? `Extract the ${parameter.name} (${parameter.description}) from the document text.`
    : `Extract the ${parameter.name} from the document text.`;
}

export class RefinementLoop {
  private current: RefinementState = 'INIT';
  private readonly documents: LabelledDocument[];
  private readonly texts = new Map<string, { text: string; note?: string }>();
  private recorded: RefinementRow[] = [];

  constructor(private readonly options: RefinementLoopOptions) {
    this.documents = [...options.documents].sort((a, b) =>
      a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0
    );
  }

  get state(): RefinementState {
    return this.current;
  }

  transition(next: RefinementState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    logger.debug('Refinement state change', { from: this.current, to: next });
    this.current = next;
  }

  async run(): Promise<PromptState> {
    const { parameter } = this.options;

    return withChildContext({ parameterName: parameter.name }, async () => {
      let promptState = await this.init();

      for (;;) {
        this.transition('GENERATE_CANDIDATE');
        const candidate = await this.generateCandidate(promptState);

        this.transition('APPLY');
        const iteration = promptState.iteration + 1;
        const rows = await this.apply(candidate, iteration);

        this.transition('EVALUATE');
        promptState = await this.evaluate(promptState, candidate, iteration, rows);

        this.transition('DECIDE');
        if (await this.options.stopSignal.shouldStop(promptState)) {
          this.transition('STOP');
          break;
        }
      }

      logger.info('Refinement finished', {
        iterations: promptState.history.length,
        lastIteration: promptState.iteration,
      });
      return promptState;
    });
  }

  private async init(): Promise<PromptState> {
    const { parameter, table } = this.options;
    this.recorded = (await table.read()).filter((row) => row.parameter_name === parameter.name);

    const iteration = lastIteration(this.recorded, parameter.name);
    const promptText =
      lastPrompt(this.recorded, parameter.name) ??
      buildCandidatePrompt(
        this.options.retrievalInstructions,
        parameter.name,
        defaultBasePrompt(parameter)
      );

    logger.info('Refinement starting', {
      startIteration: iteration + 1,
      recordedRows: this.recorded.length,
      documents: this.documents.length,
    });

    return { parameterName: parameter.name, promptText, iteration, history: [] };
  }

  /**
   * With no recorded history the starting prompt is applied as is.
   * Otherwise the refiner model proposes a new one; if that call fails the
   * current prompt is reused.
   */
  private async generateCandidate(state: PromptState): Promise<string> {
    const { parameter, refiner, retrievalInstructions } = this.options;
    if (this.recorded.length === 0) {
      return state.promptText;
    }

    const metaPrompt = buildRefinementMetaPrompt(
      parameter.name,
      buildPromptHistory(this.recorded, parameter.name)
    );
    try {
      const suggestion = await refiner.complete([{ role: 'user', content: metaPrompt }]);
      return buildCandidatePrompt(retrievalInstructions, parameter.name, suggestion);
    } catch (error) {
      recoveredErrorsCounter.inc({ kind: 'service_call' });
      logger.warn('Candidate prompt generation failed, reusing current prompt', {
        error: errorMessage(error),
      });
      return state.promptText;
    }
  }

  private async documentText(document: LabelledDocument): Promise<{ text: string; note?: string }> {
    const cached = this.texts.get(document.documentId);
    if (cached) return cached;

    let entry: { text: string; note?: string };
    try {
      entry = { text: (await this.options.textProvider.getText(document.filePath)).fullText };
    } catch (error) {
      if (!(error instanceof DocumentReadError)) throw error;
      recoveredErrorsCounter.inc({ kind: error.code });
      logger.warn('Document unreadable, recording Not found', {
        documentId: document.documentId,
        error: error.message,
      });
      entry = { text: '', note: `Document could not be read: ${error.message}` };
    }
    this.texts.set(document.documentId, entry);
    return entry;
  }

  private async apply(candidate: string, iteration: number): Promise<RefinementRow[]> {
    const { parameter, engine, refinePrompt, modelName, tolerance } = this.options;
    const rows: RefinementRow[] = [];

    for (const document of this.documents) {
      const { text, note } = await this.documentText(document);
      const outcome = await engine.extract(
        {
          documentId: document.documentId,
          units: [{ context: text, parameters: [parameter], note }],
        },
        [parameter],
        { systemPrompt: candidate, refinePrompt }
      );
      const extracted = outcome.results[0]?.extractedValue ?? '';
      const label = classify(document.trueValue, extracted, tolerance);

      rows.push({
        prompt_text: candidate,
        model_name: modelName,
        parameter_name: parameter.name,
        document_id: document.documentId,
        extracted_value: extracted,
        true_value: String(document.trueValue),
        outcome_label: outcomeLabel(label),
        confusion_label: label,
        iteration,
      });
    }
    return rows;
  }

  private async evaluate(
    state: PromptState,
    candidate: string,
    iteration: number,
    rows: RefinementRow[]
  ): Promise<PromptState> {
    const labels = rows.flatMap((row) => (row.confusion_label ? [row.confusion_label] : []));
    const metrics = aggregate(labels);

    await this.options.table.append(rows);
    this.recorded.push(...rows);

    logger.info('Refinement iteration scored', {
      iteration,
      counts: metrics.counts,
      accuracy: metrics.accuracy,
    });

    return {
      parameterName: state.parameterName,
      promptText: candidate,
      iteration,
      history: [...state.history, { iteration, metrics }],
    };
  }
}
