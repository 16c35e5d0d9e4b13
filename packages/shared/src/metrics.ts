/**
 * Prometheus Metrics
 *
 * Counters for external calls and per-document outcomes. The CLIs dump the
 * registry to a text file at the end of a run (there is no scrape endpoint).
 */

import fs from 'fs';
import * as promClient from 'prom-client';
import { logger } from './logger';

export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// External Service Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'epiparam_llm_requests_total',
  help: 'Total number of chat completion requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'epiparam_llm_request_duration_seconds',
  help: 'Duration of chat completion requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const embeddingRequestsCounter = new promClient.Counter({
  name: 'epiparam_embedding_requests_total',
  help: 'Total number of embedding requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'epiparam_documents_processed_total',
  help: 'Total number of documents processed through the pipeline',
  labelNames: ['mode', 'status'],
  registers: [register],
});

export const extractionResultsCounter = new promClient.Counter({
  name: 'epiparam_extraction_results_total',
  help: 'Extraction results by outcome',
  labelNames: ['mode', 'outcome'],
  registers: [register],
});

export const recoveredErrorsCounter = new promClient.Counter({
  name: 'epiparam_recovered_errors_total',
  help: 'Errors recovered without aborting the batch',
  labelNames: ['kind'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'epiparam_extraction_duration_seconds',
  help: 'Duration of a full two-stage extraction for one document',
  labelNames: ['mode'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

/**
 * Get the metrics in Prometheus text format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Write the current registry to a file
 */
export async function writeMetricsFile(filePath: string): Promise<void> {
  const text = await getMetrics();
  await fs.promises.writeFile(filePath, text, 'utf-8');
  logger.info('Metrics written', { filePath });
}
