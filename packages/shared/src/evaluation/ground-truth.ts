/**
 * Ground Truth
 *
 * CSV with one row per document: a `document_id` (or `PDF`) column and one
 * column per parameter. "NA" or an empty cell means the value is absent.
 */

import { ConfigurationError } from '../errors';
import { documentIdFromPath } from '../documents/pdf-text-provider';
import { readCsvFile, type CsvTable } from '../output/tabular';
import { TRUE_VALUE_ABSENT, type GroundTruthRecord, type TrueValue } from '../types';
import { isAbsent } from './confusion';

export const DOCUMENT_COLUMNS = ['document_id', 'PDF', 'Paper'];

export interface TruthColumn {
  parameterName: string;
  /** CSV column; defaults to the parameter name */
  column?: string;
}

export function normalizeDocumentId(value: string): string {
  const trimmed = value.trim();
  return trimmed.toLowerCase().endsWith('.pdf') ? documentIdFromPath(trimmed) : trimmed;
}

export function parseTrueValue(cell: string): TrueValue {
  const text = cell.trim();
  if (isAbsent(text)) {
    return TRUE_VALUE_ABSENT;
  }
  const numeric = Number(text);
  return Number.isFinite(numeric) ? numeric : text;
}

function findDocumentColumn(table: CsvTable, label: string): string {
  const column = DOCUMENT_COLUMNS.find((c) => table.columns.includes(c));
  if (!column) {
    throw new ConfigurationError(
      `${label} has no document column (expected one of ${DOCUMENT_COLUMNS.join(', ')})`
    );
  }
  return column;
}

export function groundTruthFromTable(
  table: CsvTable,
  columns: readonly TruthColumn[],
  label = 'ground truth'
): GroundTruthRecord[] {
  const documentColumn = findDocumentColumn(table, label);
  for (const { parameterName, column = parameterName } of columns) {
    if (!table.columns.includes(column)) {
      throw new ConfigurationError(`${label} has no column "${column}" for ${parameterName}`);
    }
  }

  const records: GroundTruthRecord[] = [];
  for (const row of table.rows) {
    const documentId = normalizeDocumentId(row[documentColumn] ?? '');
    if (!documentId) continue;
    for (const { parameterName, column = parameterName } of columns) {
      records.push({ documentId, parameterName, trueValue: parseTrueValue(row[column] ?? '') });
    }
  }
  return records;
}

export async function loadGroundTruth(
  filePath: string,
  columns: readonly TruthColumn[]
): Promise<GroundTruthRecord[]> {
  return groundTruthFromTable(await readCsvFile(filePath), columns, filePath);
}

/**
 * Lookup by (document, parameter).
 */
export class GroundTruthIndex {
  private readonly values = new Map<string, TrueValue>();

  constructor(records: readonly GroundTruthRecord[]) {
    for (const record of records) {
      this.values.set(GroundTruthIndex.key(record.documentId, record.parameterName), record.trueValue);
    }
  }

  private static key(documentId: string, parameterName: string): string {
    return `${documentId}\u0000${parameterName}`;
  }

  get(documentId: string, parameterName: string): TrueValue | undefined {
    return this.values.get(GroundTruthIndex.key(documentId, parameterName));
  }
}
