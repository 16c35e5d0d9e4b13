import type { DocumentText } from '../types';

/**
 * Turns one PDF into text. Implementations throw DocumentReadError when the
 * file cannot be read or parsed.
 */
export interface TextProvider {
  getText(filePath: string): Promise<DocumentText>;
}
