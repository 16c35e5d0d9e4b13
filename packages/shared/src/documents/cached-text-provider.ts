/**
 * On-disk cache of extracted document text, one JSON file per document.
 * Failed extractions are not cached.
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import type { DocumentSection, DocumentText } from '../types';
import { documentIdFromPath } from './pdf-text-provider';
import type { TextProvider } from './types';

function isSection(value: unknown): value is DocumentSection {
  return (
    typeof value === 'object' &&
    value !== null &&
    'heading' in value &&
    typeof value.heading === 'string' &&
    'body' in value &&
    typeof value.body === 'string'
  );
}

export function isDocumentText(value: unknown): value is DocumentText {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sourceId' in value &&
    typeof value.sourceId === 'string' &&
    'fullText' in value &&
    typeof value.fullText === 'string' &&
    'sections' in value &&
    Array.isArray(value.sections) &&
    value.sections.every(isSection) &&
    'tables' in value &&
    Array.isArray(value.tables) &&
    value.tables.every((t: unknown) => typeof t === 'string')
  );
}

export class CachedTextProvider implements TextProvider {
  constructor(
    private readonly inner: TextProvider,
    private readonly cacheDir: string
  ) {}

  cachePath(filePath: string): string {
    return path.join(this.cacheDir, `${documentIdFromPath(filePath)}.json`);
  }

  async getText(filePath: string): Promise<DocumentText> {
    const cacheFile = this.cachePath(filePath);

    if (fs.existsSync(cacheFile)) {
      try {
        const cached: unknown = JSON.parse(await fs.promises.readFile(cacheFile, 'utf-8'));
        if (isDocumentText(cached)) {
          logger.debug('Using cached document text', { filePath, cacheFile });
          return cached;
        }
        logger.warn('Ignoring malformed text cache entry', { cacheFile });
      } catch (error) {
        logger.warn('Ignoring unreadable text cache entry', {
          cacheFile,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const text = await this.inner.getText(filePath);
    await fs.promises.mkdir(this.cacheDir, { recursive: true });
    await fs.promises.writeFile(cacheFile, JSON.stringify(text), 'utf-8');
    return text;
  }
}
