/**
 * Tabular Sinks
 *
 * Result tables are written through a sink so that the file format stays out
 * of the aggregator. Both sinks use SheetJS.
 */

import fs from 'fs';
import path from 'path';
import * as XLSX from 'xlsx';
import { logger } from '../logger';

export type CellValue = string | number;

export type TableRow = Record<string, CellValue>;

export interface Sheet {
  name: string;
  columns: string[];
  rows: TableRow[];
}

export type TabularFormat = 'csv' | 'xlsx';

export interface TabularSink {
  readonly format: TabularFormat;
  /**
   * Write sheets under `basePath` (no extension). Returns the files written.
   */
  write(basePath: string, sheets: Sheet[]): Promise<string[]>;
}

export function toWorksheet(sheet: Sheet, skipHeader = false): XLSX.WorkSheet {
  if (sheet.rows.length === 0) {
    return XLSX.utils.aoa_to_sheet(skipHeader ? [] : [sheet.columns]);
  }
  return XLSX.utils.json_to_sheet(sheet.rows, { header: sheet.columns, skipHeader });
}

export function toCsv(sheet: Sheet, skipHeader = false): string {
  return XLSX.utils.sheet_to_csv(toWorksheet(sheet, skipHeader));
}

/**
 * First sheet goes to `<base>.csv`, every other sheet to `<base>_<name>.csv`.
 */
export class CsvSink implements TabularSink {
  readonly format = 'csv' as const;

  async write(basePath: string, sheets: Sheet[]): Promise<string[]> {
    await fs.promises.mkdir(path.dirname(basePath), { recursive: true });
    const written: string[] = [];
    for (const [i, sheet] of sheets.entries()) {
      const filePath = i === 0 ? `${basePath}.csv` : `${basePath}_${sheet.name}.csv`;
      await fs.promises.writeFile(filePath, `${toCsv(sheet)}\n`, 'utf-8');
      written.push(filePath);
      logger.info('CSV written', { filePath, rows: sheet.rows.length });
    }
    return written;
  }
}

/**
 * One workbook with a worksheet per sheet.
 */
export class XlsxSink implements TabularSink {
  readonly format = 'xlsx' as const;

  async write(basePath: string, sheets: Sheet[]): Promise<string[]> {
    await fs.promises.mkdir(path.dirname(basePath), { recursive: true });
    const workbook = XLSX.utils.book_new();
    for (const sheet of sheets) {
      XLSX.utils.book_append_sheet(workbook, toWorksheet(sheet), sheet.name);
    }
    const filePath = `${basePath}.xlsx`;
    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    await fs.promises.writeFile(filePath, buffer);
    logger.info('Workbook written', { filePath, sheets: sheets.map((s) => s.name) });
    return [filePath];
  }
}

export function createSink(format: TabularFormat): TabularSink {
  return format === 'xlsx' ? new XlsxSink() : new CsvSink();
}

export interface CsvTable {
  columns: string[];
  rows: Array<Record<string, string>>;
}

/**
 * Parse CSV text. Every cell comes back as the text it was written with.
 */
export function parseCsv(text: string): CsvTable {
  if (!text.trim()) {
    return { columns: [], rows: [] };
  }
  const workbook = XLSX.read(text, { type: 'string', raw: true });
  const firstSheet = workbook.SheetNames[0];
  const worksheet = firstSheet ? workbook.Sheets[firstSheet] : undefined;
  if (!worksheet) {
    return { columns: [], rows: [] };
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    defval: '',
    raw: false,
    blankrows: false,
  });
  const [header = [], ...body] = matrix;
  const columns = header.map((cell) => String(cell ?? '').trim());

  const rows = body.map((cells) => {
    const row: Record<string, string> = {};
    columns.forEach((column, i) => {
      row[column] = String(cells[i] ?? '');
    });
    return row;
  });

  return { columns, rows };
}

export async function readCsvFile(filePath: string): Promise<CsvTable> {
  const text = await fs.promises.readFile(filePath, 'utf-8');
  return parseCsv(text);
}
