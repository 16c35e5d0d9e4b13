/**
 * Result Aggregator
 *
 * Collects per-document outcomes into a table with exactly one row per
 * (document, parameter) pair, and exports it through a tabular sink.
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import { NOT_FOUND, type ExtractionMode, type ExtractionResult, type ParameterSpec } from '../types';
import type { ExtractionOutcome } from '../extraction/types';
import type { Sheet, TableRow, TabularSink } from './tabular';

export const LONG_COLUMNS = ['document_id', 'parameter_name', 'extracted_value', 'confidence_notes'];
export const WIDE_DOCUMENT_COLUMN = 'Paper';

export function resultsBaseName(mode: ExtractionMode): string {
  return `${mode}_results`;
}

export class ResultAggregator {
  private readonly parameters: readonly ParameterSpec[];
  private readonly outcomes = new Map<string, readonly ExtractionResult[]>();
  private readonly explanations = new Map<string, string[]>();

  constructor(parameters: readonly ParameterSpec[]) {
    this.parameters = parameters;
  }

  /**
   * Record one document. Missing parameters become "Not found" rows and
   * results for unknown parameters are dropped, so the row shape never changes.
   */
  add(outcome: ExtractionOutcome): void {
    if (this.outcomes.has(outcome.documentId)) {
      throw new Error(`Document ${outcome.documentId} was already aggregated`);
    }

    const byName = new Map(outcome.results.map((r) => [r.parameterName, r]));
    const unknown = outcome.results.filter(
      (r) => !this.parameters.some((p) => p.name === r.parameterName)
    );
    if (unknown.length > 0) {
      logger.warn('Dropping results for unconfigured parameters', {
        documentId: outcome.documentId,
        parameters: unknown.map((r) => r.parameterName),
      });
    }

    const rows = this.parameters.map(
      (p) =>
        byName.get(p.name) ??
        Object.freeze({
          documentId: outcome.documentId,
          parameterName: p.name,
          rawExplanation: null,
          extractedValue: NOT_FOUND,
          confidenceNotes: 'No result produced',
        })
    );

    this.outcomes.set(outcome.documentId, Object.freeze(rows));
    this.explanations.set(outcome.documentId, [...outcome.explanations]);
  }

  get documentIds(): string[] {
    return [...this.outcomes.keys()];
  }

  /** Document order of insertion, then parameter order */
  get results(): ExtractionResult[] {
    return [...this.outcomes.values()].flat();
  }

  longSheet(): Sheet {
    const rows: TableRow[] = this.results.map((r) => ({
      document_id: r.documentId,
      parameter_name: r.parameterName,
      extracted_value: r.extractedValue,
      confidence_notes: r.confidenceNotes ?? '',
    }));
    return { name: 'results', columns: LONG_COLUMNS, rows };
  }

  /** One row per document, one column per parameter */
  wideSheet(): Sheet {
    const rows: TableRow[] = [...this.outcomes.entries()].map(([documentId, results]) => {
      const row: TableRow = { [WIDE_DOCUMENT_COLUMN]: documentId };
      for (const result of results) {
        row[result.parameterName] = result.extractedValue;
      }
      return row;
    });
    return {
      name: 'wide',
      columns: [WIDE_DOCUMENT_COLUMN, ...this.parameters.map((p) => p.name)],
      rows,
    };
  }

  async export(sink: TabularSink, outputDir: string, mode: ExtractionMode): Promise<string[]> {
    return sink.write(path.join(outputDir, resultsBaseName(mode)), [this.longSheet(), this.wideSheet()]);
  }

  async writeExplanations(filePath: string): Promise<void> {
    await writeExplanations(filePath, this.explanations);
  }
}

/**
 * Stage 1 responses keyed by document, in document order.
 */
export async function writeExplanations(
  filePath: string,
  explanations: ReadonlyMap<string, readonly string[]>
): Promise<void> {
  const blocks: string[] = [];
  for (const [documentId, texts] of explanations) {
    const body = texts.length > 0 ? texts.join('\n\n') : '(no explanation)';
    blocks.push(`=== ${documentId} ===\n${body}\n`);
  }
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, blocks.join('\n'), 'utf-8');
  logger.info('Explanations written', { filePath, documents: blocks.length });
}
