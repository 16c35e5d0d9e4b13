/**
 * Pipeline Run
 *
 * Reads every PDF of a folder, optionally indexes their sections for
 * retrieval, runs the two-stage extraction per document and exports the
 * result table. Only configuration problems abort the run.
 */

import path from 'path';
import {
  logger,
  config,
  withChildContext,
  errorMessage,
  ConfigurationError,
  documentsProcessedCounter,
  extractionDurationHistogram,
  recoveredErrorsCounter,
  writeMetricsFile,
  listPdfFiles,
  documentIdFromPath,
  sectionToChunk,
  InMemoryVectorIndex,
  ExtractionEngine,
  FullTextContextSource,
  RetrievalContextSource,
  ResultAggregator,
  createSink,
  NOT_FOUND,
  type ChatCompleter,
  type ContextSource,
  type ContextUnit,
  type DocumentText,
  type Embedder,
  type ExtractionMode,
  type PromptLibrary,
  type TabularFormat,
  type TextProvider,
} from '@epiparam/shared';

export interface PipelineOptions {
  folder: string;
  output: string;
  rag: boolean;
  ragN: number;
  explanations: boolean;
  format: TabularFormat;
  metrics: boolean;
  structuredOutput?: boolean;
  maxContextChars?: number;
}

export interface PipelineDependencies {
  chat: ChatCompleter;
  textProvider: TextProvider;
  /** Required with rag */
  embedder?: Embedder;
}

export interface PipelineSummary {
  mode: ExtractionMode;
  documents: number;
  unreadable: number;
  rows: number;
  files: string[];
}

interface LoadedDocument {
  documentId: string;
  filePath: string;
  text: DocumentText | null;
  note?: string;
}

async function readDocuments(files: string[], textProvider: TextProvider): Promise<LoadedDocument[]> {
  const documents: LoadedDocument[] = [];
  for (const filePath of files) {
    const documentId = documentIdFromPath(filePath);
    try {
      const text = await textProvider.getText(filePath);
      documents.push({ documentId, filePath, text: { ...text, sourceId: documentId } });
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      recoveredErrorsCounter.inc({ kind: 'document_read' });
      logger.warn('Document text unavailable, recording Not found', {
        documentId,
        filePath,
        error: errorMessage(error),
      });
      documents.push({
        documentId,
        filePath,
        text: null,
        note: `Document could not be read: ${errorMessage(error)}`,
      });
    }
  }
  return documents;
}

async function buildContextSource(
  options: PipelineOptions,
  documents: LoadedDocument[],
  embedder: Embedder | undefined
): Promise<ContextSource> {
  if (!options.rag) {
    return new FullTextContextSource();
  }
  if (!embedder) {
    throw new ConfigurationError('Retrieval mode needs an embedder');
  }

  const index = new InMemoryVectorIndex(embedder, { batchSize: config.embeddingBatchSize });
  for (const document of documents) {
    if (!document.text) continue;
    try {
      await index.add(document.documentId, document.text.sections.map(sectionToChunk));
    } catch (error) {
      recoveredErrorsCounter.inc({ kind: 'service_call' });
      logger.warn('Indexing failed for document', {
        documentId: document.documentId,
        error: errorMessage(error),
      });
    }
  }
  logger.info('Vector index built', { chunks: index.size, ragN: options.ragN });
  return new RetrievalContextSource(index, options.ragN);
}

export async function runPipeline(
  options: PipelineOptions,
  library: PromptLibrary,
  deps: PipelineDependencies
): Promise<PipelineSummary> {
  const mode: ExtractionMode = options.rag ? 'rag' : 'twostage';
  const files = listPdfFiles(options.folder);
  logger.info('Pipeline starting', {
    mode,
    folder: options.folder,
    documents: files.length,
    parameters: library.parameters.length,
  });
  if (files.length === 0) {
    logger.warn('No PDF files found', { folder: options.folder });
  }

  const documents = await readDocuments(files, deps.textProvider);
  const source = await buildContextSource(options, documents, deps.embedder);

  const engine = new ExtractionEngine({
    chat: deps.chat,
    prompts: {
      systemPrompt: options.rag ? library.ragSystemPrompt : library.systemPrompt,
      refinePrompt: library.refinePrompt,
    },
    structuredOutput: options.structuredOutput ?? config.structuredOutput,
    maxContextChars: options.maxContextChars ?? config.maxContextChars,
    mode,
  });
  const aggregator = new ResultAggregator(library.parameters);

  for (const document of documents) {
    await withChildContext({ documentId: document.documentId }, async () => {
      const startTime = Date.now();
      const units: ContextUnit[] = document.text
        ? await source.buildUnits(document.text, library.parameters)
        : [{ context: '', parameters: library.parameters, note: document.note }];

      const outcome = await engine.extract(
        { documentId: document.documentId, units },
        library.parameters
      );
      aggregator.add(outcome);

      extractionDurationHistogram.observe({ mode }, (Date.now() - startTime) / 1000);
      documentsProcessedCounter.inc({ mode, status: document.text ? 'extracted' : 'unreadable' });
      logger.info('Document processed', {
        filePath: document.filePath,
        found: outcome.results.filter((r) => r.extractedValue !== NOT_FOUND).length,
        parameters: outcome.results.length,
      });
    });
  }

  const written = await aggregator.export(createSink(options.format), options.output, mode);

  if (options.explanations) {
    const explanationsPath = path.join(options.output, 'explanations.txt');
    await aggregator.writeExplanations(explanationsPath);
    written.push(explanationsPath);
  }
  if (options.metrics) {
    const metricsPath = path.join(options.output, 'metrics.prom');
    await writeMetricsFile(metricsPath);
    written.push(metricsPath);
  }

  const summary: PipelineSummary = {
    mode,
    documents: documents.length,
    unreadable: documents.filter((d) => !d.text).length,
    rows: aggregator.results.length,
    files: written,
  };
  logger.info('Pipeline complete', { ...summary });
  return summary;
}
