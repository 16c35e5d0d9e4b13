/**
 * Test Helpers
 *
 * In-process stand-ins for the chat, embedding and PDF services.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DocumentReadError,
  documentIdFromPath,
  type ChatCompleter,
  type ChatCompletionOptions,
  type ChatMessage,
  type DocumentText,
  type Embedder,
  type TextProvider,
} from '@epiparam/shared';

export type ChatHandler = (
  messages: ChatMessage[],
  options?: ChatCompletionOptions
) => string | Promise<string>;

export class FakeChatCompleter implements ChatCompleter {
  readonly model: string;
  readonly calls: Array<{ messages: ChatMessage[]; options?: ChatCompletionOptions }> = [];

  constructor(
    private readonly handler: ChatHandler,
    model = 'fake-model'
  ) {
    this.model = model;
  }

  async complete(messages: ChatMessage[], options?: ChatCompletionOptions): Promise<string> {
    this.calls.push({ messages, options });
    return this.handler(messages, options);
  }
}

/** Stage 2 requests carry the Stage 1 text in their first user message */
export function isStage2(messages: ChatMessage[]): boolean {
  return messages[1]?.content.startsWith('This is the text:') ?? false;
}

/**
 * Bag-of-words vectors over a fixed vocabulary.
 */
export class FakeEmbedder implements Embedder {
  readonly model = 'fake-embedding';
  readonly batches: string[][] = [];

  constructor(private readonly vocabulary: string[]) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    return texts.map((text) => {
      const tokens = text.toLowerCase().match(/[a-z]+/g) ?? [];
      return this.vocabulary.map((word) => tokens.filter((t) => t === word).length);
    });
  }
}

/**
 * Serves DocumentText by document id; unknown documents fail to read.
 */
export class FakeTextProvider implements TextProvider {
  readonly requests: string[] = [];

  constructor(private readonly documents: Record<string, DocumentText>) {}

  async getText(filePath: string): Promise<DocumentText> {
    this.requests.push(filePath);
    const documentId = documentIdFromPath(filePath);
    const document = this.documents[documentId];
    if (!document) {
      throw new DocumentReadError(filePath, `Cannot parse ${filePath}: Invalid PDF structure`);
    }
    return document;
  }
}

export function documentText(
  sourceId: string,
  sections: Array<{ heading: string; body: string }>
): DocumentText {
  return {
    sourceId,
    fullText: sections.map((s) => (s.heading ? `${s.heading}\n${s.body}` : s.body)).join('\n'),
    sections,
    tables: [],
  };
}

export function makeTempDir(prefix = 'epiparam-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Placeholder PDF files; the fake text provider never opens them */
export function touchPdfs(folder: string, names: string[]): string[] {
  fs.mkdirSync(folder, { recursive: true });
  return names.map((name) => {
    const filePath = path.join(folder, name);
    fs.writeFileSync(filePath, '');
    return filePath;
  });
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
