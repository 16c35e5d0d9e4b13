/**
 * Cumulative Refinement Table
 *
 * Append-only CSV of every (iteration, document) result of the refinement
 * loop. Existing rows are never rewritten.
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import { ConfigurationError } from '../errors';
import type { ConfusionLabel, OutcomeLabel, RefinementRow } from '../types';
import { readCsvFile, toCsv, type TableRow } from './tabular';

export const REFINEMENT_COLUMNS: Array<keyof RefinementRow> = [
  'prompt_text',
  'model_name',
  'parameter_name',
  'document_id',
  'extracted_value',
  'true_value',
  'outcome_label',
  'confusion_label',
  'iteration',
];

function asConfusionLabel(value: string): ConfusionLabel | '' {
  return value === 'TP' || value === 'TN' || value === 'FP' || value === 'FN' ? value : '';
}

function asOutcomeLabel(value: string): OutcomeLabel | '' {
  return value === 'Success' || value === 'Fail' ? value : '';
}

function toTableRow(row: RefinementRow): TableRow {
  return {
    prompt_text: row.prompt_text,
    model_name: row.model_name,
    parameter_name: row.parameter_name,
    document_id: row.document_id,
    extracted_value: row.extracted_value,
    true_value: row.true_value,
    outcome_label: row.outcome_label,
    confusion_label: row.confusion_label,
    iteration: row.iteration,
  };
}

export class CumulativeTable {
  constructor(readonly filePath: string) {}

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * All recorded rows. Rows whose iteration is not an integer are skipped.
   */
  async read(): Promise<RefinementRow[]> {
    if (!this.exists()) {
      return [];
    }
    const table = await readCsvFile(this.filePath);
    if (table.columns.length === 0) {
      return [];
    }
    const missing = REFINEMENT_COLUMNS.filter((c) => !table.columns.includes(c));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `${this.filePath} is missing columns: ${missing.join(', ')}`
      );
    }

    const rows: RefinementRow[] = [];
    for (const raw of table.rows) {
      const iteration = raw.iteration.trim() === '' ? Number.NaN : Number(raw.iteration);
      if (!Number.isInteger(iteration)) {
        logger.warn('Skipping refinement row without an iteration', {
          filePath: this.filePath,
          documentId: raw.document_id,
        });
        continue;
      }
      rows.push({
        prompt_text: raw.prompt_text,
        model_name: raw.model_name,
        parameter_name: raw.parameter_name,
        document_id: raw.document_id,
        extracted_value: raw.extracted_value,
        true_value: raw.true_value,
        outcome_label: asOutcomeLabel(raw.outcome_label),
        confusion_label: asConfusionLabel(raw.confusion_label),
        iteration,
      });
    }
    return rows;
  }

  async append(rows: RefinementRow[]): Promise<void> {
    if (rows.length === 0) return;

    const fresh = !this.exists() || fs.statSync(this.filePath).size === 0;
    const sheet = { name: 'refinement', columns: REFINEMENT_COLUMNS, rows: rows.map(toTableRow) };
    let text = `${toCsv(sheet, !fresh)}\n`;

    if (fresh) {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    } else {
      const existing = await fs.promises.readFile(this.filePath, 'utf-8');
      if (!existing.endsWith('\n')) {
        text = `\n${text}`;
      }
    }

    await fs.promises.appendFile(this.filePath, text, 'utf-8');
    logger.info('Refinement rows appended', { filePath: this.filePath, rows: rows.length });
  }
}
