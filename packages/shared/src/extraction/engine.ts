/**
 * Two-Stage Extraction Engine
 *
 * Stage 1 asks for free-text reasoning about every parameter of a context
 * unit. Stage 2 formats that reasoning into one value per parameter.
 * Nothing here throws for a single document: failed calls and unparseable
 * responses become "Not found" results with a note.
 */

import { logger } from '../logger';
import { withChildContext } from '../context';
import { errorMessage, ParseError, ServiceCallError } from '../errors';
import { extractionResultsCounter, recoveredErrorsCounter } from '../metrics';
import {
  NOT_FOUND,
  type ExtractionMode,
  type ExtractionPrompts,
  type ExtractionResult,
  type ParameterSpec,
} from '../types';
import {
  buildStage1Messages,
  buildStage2Messages,
  buildStructuredOutputSchema,
} from '../templates';
import type { ChatCompleter } from '../llm/types';
import { parseStructuredResponse, type ParsedValue } from './structured-response';
import type { ContextUnit, ExtractionOutcome, ExtractionRequest } from './types';

export interface ExtractionEngineOptions {
  chat: ChatCompleter;
  prompts: ExtractionPrompts;
  /** Request a JSON-schema constrained Stage 2 response */
  structuredOutput?: boolean;
  /** Stage 1 context is cut to this many characters */
  maxContextChars?: number;
  /** Label for metrics */
  mode?: ExtractionMode;
}

function errorKind(error: unknown): string {
  return error instanceof ServiceCallError || error instanceof ParseError ? error.code : 'unexpected';
}

export class ExtractionEngine {
  private readonly chat: ChatCompleter;
  private readonly prompts: ExtractionPrompts;
  private readonly structuredOutput: boolean;
  private readonly maxContextChars: number;
  private readonly mode: ExtractionMode;

  constructor(options: ExtractionEngineOptions) {
    this.chat = options.chat;
    this.prompts = Object.freeze({ ...options.prompts });
    this.structuredOutput = options.structuredOutput ?? true;
    this.maxContextChars = options.maxContextChars ?? Number.POSITIVE_INFINITY;
    this.mode = options.mode ?? 'twostage';
  }

  /**
   * Run both stages for every context unit of a document. Returns exactly one
   * result per entry of `parameters`, in that order.
   */
  async extract(
    request: ExtractionRequest,
    parameters: readonly ParameterSpec[],
    prompts: ExtractionPrompts = this.prompts
  ): Promise<ExtractionOutcome> {
    const requested = new Set(parameters.map((p) => p.name));
    const byName = new Map<string, ExtractionResult>();
    const explanations: string[] = [];

    for (const unit of request.units) {
      const unitParameters = unit.parameters.filter(
        (p) => requested.has(p.name) && !byName.has(p.name)
      );
      if (unitParameters.length === 0) continue;

      const { results, explanation } = await this.extractUnit(
        request.documentId,
        { ...unit, parameters: unitParameters },
        prompts
      );
      if (explanation !== null) {
        explanations.push(explanation);
      }
      for (const result of results) {
        byName.set(result.parameterName, result);
      }
    }

    const results = parameters.map(
      (p) =>
        byName.get(p.name) ??
        this.notFound(request.documentId, p.name, null, 'No context was provided for this parameter')
    );

    for (const result of results) {
      extractionResultsCounter.inc({
        mode: this.mode,
        outcome: result.extractedValue === NOT_FOUND ? 'not_found' : 'found',
      });
    }

    return { documentId: request.documentId, results, explanations };
  }

  private async extractUnit(
    documentId: string,
    unit: ContextUnit,
    prompts: ExtractionPrompts
  ): Promise<{ results: ExtractionResult[]; explanation: string | null }> {
    const parameterName = unit.parameters.length === 1 ? unit.parameters[0].name : undefined;

    return withChildContext({ documentId, parameterName }, async () => {
      const allNotFound = (explanation: string | null, note: string) =>
        unit.parameters.map((p) => this.notFound(documentId, p.name, explanation, note));

      if (!unit.context.trim()) {
        const note = unit.note ?? 'No document text available';
        logger.warn('Skipping extraction for empty context', { note });
        return { results: allNotFound(null, note), explanation: null };
      }

      // Stage 1: discovery
      let context = unit.context;
      if (context.length > this.maxContextChars) {
        logger.debug('Truncating Stage 1 context', {
          originalChars: context.length,
          maxChars: this.maxContextChars,
        });
        context = context.slice(0, this.maxContextChars);
      }

      let stage1: string;
      try {
        stage1 = await this.chat.complete(
          buildStage1Messages(prompts.systemPrompt, context, unit.parameters)
        );
      } catch (error) {
        return { results: allNotFound(null, this.recover('Stage 1', error)), explanation: null };
      }
      if (!stage1.trim()) {
        return {
          results: allNotFound(null, this.recover('Stage 1', new ServiceCallError('chat', 'empty response'))),
          explanation: null,
        };
      }

      // Stage 2: formatting
      let stage2: string;
      try {
        stage2 = await this.chat.complete(
          buildStage2Messages(prompts.refinePrompt, stage1, unit.parameters),
          this.structuredOutput
            ? { responseFormat: buildStructuredOutputSchema(unit.parameters) }
            : undefined
        );
      } catch (error) {
        return { results: allNotFound(stage1, this.recover('Stage 2', error)), explanation: stage1 };
      }

      let parsed: Map<string, ParsedValue>;
      try {
        parsed = parseStructuredResponse(stage2, unit.parameters);
      } catch (error) {
        return { results: allNotFound(stage1, this.recover('Stage 2 parse', error)), explanation: stage1 };
      }

      const results = unit.parameters.map((p) => {
        const value = parsed.get(p.name);
        if (!value) {
          return this.notFound(documentId, p.name, stage1, 'No value parsed');
        }
        if (value.note) {
          recoveredErrorsCounter.inc({ kind: 'parse' });
          logger.warn('Parameter missing from structured response', {
            parameterName: p.name,
            note: value.note,
          });
        }
        return Object.freeze({
          documentId,
          parameterName: p.name,
          rawExplanation: stage1,
          extractedValue: value.value,
          confidenceNotes: value.note,
        });
      });

      logger.debug('Context unit extracted', {
        parameters: unit.parameters.length,
        found: results.filter((r) => r.extractedValue !== NOT_FOUND).length,
      });

      return { results, explanation: stage1 };
    });
  }

  private recover(stage: string, error: unknown): string {
    const note = `${stage} failed: ${errorMessage(error)}`;
    recoveredErrorsCounter.inc({ kind: errorKind(error) });
    logger.warn('Extraction step failed, recording Not found', { stage, error: errorMessage(error) });
    return note;
  }

  private notFound(
    documentId: string,
    parameterName: string,
    rawExplanation: string | null,
    note: string
  ): ExtractionResult {
    return Object.freeze({
      documentId,
      parameterName,
      rawExplanation,
      extractedValue: NOT_FOUND,
      confidenceNotes: note,
    });
  }
}
