/**
 * Section Segmentation
 *
 * Splits layout lines into {heading, body} sections. Headings are found
 * heuristically: standard article headings, numbered headings and short
 * all-caps lines.
 */

import type { DocumentSection } from '../types';

const ARTICLE_HEADINGS = [
  'abstract',
  'summary',
  'background',
  'introduction',
  'methods',
  'method',
  'materials and methods',
  'methods and materials',
  'patients and methods',
  'study design',
  'results',
  'findings',
  'discussion',
  'conclusion',
  'conclusions',
  'limitations',
  'acknowledgements',
  'acknowledgments',
  'references',
];

const MAX_HEADING_CHARS = 80;
const NUMBERED_HEADING = /^\d+(\.\d+)*\.?\s+[A-Z][^.!?:;]*$/;

export function isHeading(line: string): boolean {
  const text = line.trim();
  if (!text || text.length > MAX_HEADING_CHARS) {
    return false;
  }

  const normalized = text.replace(/[:.]$/, '').toLowerCase();
  if (ARTICLE_HEADINGS.includes(normalized)) {
    return true;
  }

  const words = text.split(/\s+/).length;
  if (NUMBERED_HEADING.test(text) && words <= 6) {
    return true;
  }

  const letters = text.replace(/[^A-Za-z]/g, '');
  return letters.length >= 4 && letters === letters.toUpperCase() && words <= 8;
}

export function segmentSections(lines: string[]): DocumentSection[] {
  const sections: DocumentSection[] = [];
  let heading = '';
  let body: string[] = [];

  const flush = () => {
    const text = body.join('\n').trim();
    if (text) {
      sections.push({ heading, body: text });
    }
  };

  for (const line of lines) {
    if (isHeading(line)) {
      flush();
      heading = line.trim();
      body = [];
    } else {
      body.push(line);
    }
  }
  flush();

  return sections;
}

/**
 * Retrieval chunk for a section: heading line followed by the body.
 */
export function sectionToChunk(section: DocumentSection): string {
  return section.heading ? `${section.heading}\n${section.body}` : section.body;
}

/**
 * Full document text with tables appended after a "Tables:" marker.
 */
export function composeFullText(text: string, tables: string[]): string {
  if (tables.length === 0) {
    return text;
  }
  return `${text}\n\n\nTables:\n${tables.join('\n\n\n')}`;
}
