import fs from 'fs';
import path from 'path';
import { ConfigurationError } from '../errors';

/**
 * PDF files directly inside `folder`, in lexicographic filename order.
 */
export function listPdfFiles(folder: string): string[] {
  if (!fs.existsSync(folder) || !fs.statSync(folder).isDirectory()) {
    throw new ConfigurationError(`Input folder not found: ${folder}`);
  }
  return fs
    .readdirSync(folder)
    .filter((name) => name.toLowerCase().endsWith('.pdf'))
    .sort()
    .map((name) => path.join(folder, name));
}
