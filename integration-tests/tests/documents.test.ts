/**
 * Document text: line grouping, section segmentation, caching
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  CachedTextProvider,
  ConfigurationError,
  DocumentReadError,
  PdfTextProvider,
  composeFullText,
  documentIdFromPath,
  groupIntoLines,
  isHeading,
  listPdfFiles,
  sectionToChunk,
  segmentSections,
  type PdfDocumentHandle,
  type PdfPageHandle,
} from '@epiparam/shared';
import { documentText, FakeTextProvider, makeTempDir, removeDir, touchPdfs } from './helpers';

describe('isHeading', () => {
  it.each([
    ['Results', true],
    ['Results:', true],
    ['MATERIALS AND METHODS', true],
    ['1. Introduction', true],
    ['2.1 Study population', true],
    ['TABLE 1', true],
    ['CFR', false],
    ['12 cases died.', false],
    ['3 Patients died.', false],
    ['The patients were enrolled in 2020.', false],
    ['', false],
  ])('%p -> %p', (line, expected) => {
    expect(isHeading(line)).toBe(expected);
  });

  it('rejects long lines', () => {
    expect(isHeading('RESULTS '.repeat(11))).toBe(false);
  });
});

describe('segmentSections', () => {
  it('groups body lines under the preceding heading', () => {
    const sections = segmentSections([
      'Title line here',
      'Abstract',
      'We studied X.',
      '',
      'Results',
      '80 of 398 died.',
      'Second line.',
      'Discussion',
      'REFERENCES',
    ]);

    expect(sections).toEqual([
      { heading: '', body: 'Title line here' },
      { heading: 'Abstract', body: 'We studied X.' },
      { heading: 'Results', body: '80 of 398 died.\nSecond line.' },
    ]);
  });

  it('builds retrieval chunks with the heading on its own line', () => {
    expect(sectionToChunk({ heading: 'Results', body: '80 died.' })).toBe('Results\n80 died.');
    expect(sectionToChunk({ heading: '', body: 'Preamble' })).toBe('Preamble');
  });
});

describe('groupIntoLines', () => {
  it('orders items top to bottom and left to right', () => {
    const lines = groupIntoLines([
      { x: 100, y: 700.2, str: 'world' },
      { x: 10, y: 699.8, str: 'Hello' },
      { x: 10, y: 650, str: 'Next   line' },
      { x: 50, y: 650, str: ' ' },
    ]);

    expect(lines).toEqual(['Hello world', 'Next line']);
  });
});

describe('composeFullText', () => {
  it('leaves text without tables untouched', () => {
    expect(composeFullText('body', [])).toBe('body');
  });

  it('appends tables after a marker', () => {
    expect(composeFullText('body', ['T1', 'T2'])).toBe('body\n\n\nTables:\nT1\n\n\nT2');
  });
});

describe('listPdfFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('lists PDFs in filename order', () => {
    touchPdfs(dir, ['b.pdf', 'a.PDF', 'notes.txt']);

    expect(listPdfFiles(dir)).toEqual([path.join(dir, 'a.PDF'), path.join(dir, 'b.pdf')]);
  });

  it('rejects a missing folder', () => {
    expect(() => listPdfFiles(path.join(dir, 'missing'))).toThrow(ConfigurationError);
  });

  it('derives document ids from file names', () => {
    expect(documentIdFromPath('/data/papers/paper1.pdf')).toBe('paper1');
  });
});

describe('CachedTextProvider', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('extracts once and serves later reads from the cache', async () => {
    const text = documentText('paper1', [{ heading: 'Results', body: '80 died.' }]);
    const inner = new FakeTextProvider({ paper1: text });
    const cached = new CachedTextProvider(inner, path.join(dir, 'cache'));

    const first = await cached.getText('/papers/paper1.pdf');
    const second = await cached.getText('/papers/paper1.pdf');

    expect(first).toEqual(text);
    expect(second).toEqual(text);
    expect(inner.requests).toEqual(['/papers/paper1.pdf']);
    expect(fs.existsSync(path.join(dir, 'cache', 'paper1.json'))).toBe(true);
  });

  it('re-extracts when the cache entry is malformed', async () => {
    const text = documentText('paper1', [{ heading: '', body: 'body' }]);
    const inner = new FakeTextProvider({ paper1: text });
    fs.writeFileSync(path.join(dir, 'paper1.json'), '{"sourceId": 3}');
    const cached = new CachedTextProvider(inner, dir);

    await expect(cached.getText('/papers/paper1.pdf')).resolves.toEqual(text);
    expect(inner.requests).toHaveLength(1);
  });

  it('does not cache failed extractions', async () => {
    const cached = new CachedTextProvider(new FakeTextProvider({}), dir);

    await expect(cached.getText('/papers/broken.pdf')).rejects.toThrow('Invalid PDF structure');
    expect(fs.existsSync(path.join(dir, 'broken.json'))).toBe(false);
  });
});

describe('PdfTextProvider', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = makeTempDir();
    [filePath] = touchPdfs(dir, ['paper1.pdf']);
  });

  afterEach(() => {
    removeDir(dir);
  });

  function fakeDocument(getPage: (pageNumber: number) => Promise<PdfPageHandle>) {
    const destroy = jest.fn(async (): Promise<void> => {});
    const document: PdfDocumentHandle = { numPages: 2, getPage, destroy };
    return { document, destroy };
  }

  it('reads text items page by page and releases the document', async () => {
    const pages: Record<number, object[]> = {
      1: [
        { str: 'Results', transform: [1, 0, 0, 1, 72, 700] },
        { type: 'beginMarkedContent' },
      ],
      2: [{ str: '80 died.', transform: [1, 0, 0, 1, 72, 700] }],
    };
    const { document, destroy } = fakeDocument(async (n) => ({
      getTextContent: async () => ({ items: pages[n] ?? [] }),
    }));
    const provider = new PdfTextProvider({ openDocument: async () => document });

    const text = await provider.getText(filePath);

    expect(text.sourceId).toBe('paper1');
    expect(text.fullText).toBe('Results\n80 died.');
    expect(text.tables).toEqual([]);
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it('releases the document when a page fails to load', async () => {
    const { document, destroy } = fakeDocument(async (n) => {
      throw new Error(`page ${n} is damaged`);
    });
    const provider = new PdfTextProvider({ openDocument: async () => document });

    const failure = provider.getText(filePath);

    await expect(failure).rejects.toBeInstanceOf(DocumentReadError);
    await expect(failure).rejects.toThrow(`Cannot parse ${filePath}: page 1 is damaged`);
    expect(destroy).toHaveBeenCalledTimes(1);
  });
});
