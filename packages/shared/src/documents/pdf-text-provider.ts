/**
 * PDF Text Extraction
 *
 * Extracts text from PDF files using pdfjs-dist. Text items are grouped by
 * Y position so that each visual line becomes one text line.
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import { DocumentReadError, errorMessage } from '../errors';
import type { DocumentText } from '../types';
import { composeFullText, segmentSections } from './sections';
import type { TextProvider } from './types';

export interface PositionedText {
  x: number;
  y: number;
  str: string;
}

/**
 * Group text items into lines, top to bottom, left to right.
 */
export function groupIntoLines(items: PositionedText[]): string[] {
  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of items) {
    if (!item.str || item.str.trim() === '') continue;

    // Text on the same visual line may have slight Y variations
    const y = Math.round(item.y);
    const line = itemsByY.get(y) ?? [];
    line.push({ x: Math.round(item.x), str: item.str });
    itemsByY.set(y, line);
  }

  // PDF coordinates grow upwards
  const sortedY = [...itemsByY.keys()].sort((a, b) => b - a);

  const lines: string[] = [];
  for (const y of sortedY) {
    const lineText = (itemsByY.get(y) ?? [])
      .sort((a, b) => a.x - b.x)
      .map((item) => item.str)
      .join(' ')
      .replace(/\s+/g, ' ')
      .trim();
    if (lineText) {
      lines.push(lineText);
    }
  }
  return lines;
}

export function documentIdFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

type PdfJs = typeof import('pdfjs-dist');

let pdfjsPromise: Promise<PdfJs> | null = null;

function loadPdfJs(): Promise<PdfJs> {
  if (!pdfjsPromise) {
    pdfjsPromise = import('pdfjs-dist').then((pdfjsLib) => {
      // Configure worker for Node.js environment
      pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');
      return pdfjsLib;
    });
  }
  return pdfjsPromise;
}

/** The parts of a pdf.js document the provider reads */
export interface PdfPageHandle {
  getTextContent(): Promise<{ items: readonly object[] }>;
}

export interface PdfDocumentHandle {
  readonly numPages: number;
  getPage(pageNumber: number): Promise<PdfPageHandle>;
  destroy(): Promise<void>;
}

export type PdfOpener = (data: Uint8Array) => Promise<PdfDocumentHandle>;

interface PdfTextItem {
  str: string;
  transform: unknown[];
}

function isTextItem(item: object): item is PdfTextItem {
  return 'str' in item && typeof item.str === 'string' && 'transform' in item && Array.isArray(item.transform);
}

async function openWithPdfJs(data: Uint8Array): Promise<PdfDocumentHandle> {
  const pdfjsLib = await loadPdfJs();
  return pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;
}

export interface PdfTextProviderOptions {
  /** Defaults to pdfjs-dist */
  openDocument?: PdfOpener;
}

export class PdfTextProvider implements TextProvider {
  private readonly openDocument: PdfOpener;

  constructor(options: PdfTextProviderOptions = {}) {
    this.openDocument = options.openDocument ?? openWithPdfJs;
  }

  async getText(filePath: string): Promise<DocumentText> {
    logger.info('Extracting text from PDF', { filePath });

    let data: Uint8Array;
    try {
      data = new Uint8Array(await fs.promises.readFile(filePath));
    } catch (error) {
      throw new DocumentReadError(filePath, `Cannot read ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const lines: string[] = [];
    let totalPages = 0;
    try {
      const pdf = await this.openDocument(data);
      try {
        totalPages = pdf.numPages;
        for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
          const page = await pdf.getPage(pageNum);
          const textContent = await page.getTextContent();

          const items: PositionedText[] = [];
          for (const item of textContent.items) {
            if (isTextItem(item)) {
              items.push({ x: Number(item.transform[4]), y: Number(item.transform[5]), str: item.str });
            }
          }
          lines.push(...groupIntoLines(items));
        }
      } finally {
        await pdf.destroy();
      }
    } catch (error) {
      throw new DocumentReadError(filePath, `Cannot parse ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const text = lines.join('\n');
    if (!text.trim()) {
      throw new DocumentReadError(filePath, `No extractable text in ${filePath}`);
    }

    const tables: string[] = [];
    const sections = segmentSections(lines);

    logger.info('PDF text extraction complete', {
      filePath,
      totalPages,
      totalChars: text.length,
      sectionCount: sections.length,
    });

    return {
      sourceId: documentIdFromPath(filePath),
      fullText: composeFullText(text, tables),
      sections,
      tables,
    };
  }
}
