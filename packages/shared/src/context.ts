/**
 * AsyncLocalStorage Context Management
 *
 * Carries the run id and the document/parameter currently being processed
 * so that every log line emitted below a pipeline step is attributable.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RunContext {
  correlationId: string;
  runId?: string;
  documentId?: string;
  parameterName?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RunContext>();

/**
 * Get the current run context
 */
export function getContext(): RunContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Create a fresh context for a pipeline run
 */
export function createRunContext(runId: string = ulid()): RunContext {
  return { correlationId: ulid(), runId };
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RunContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function in a child context that inherits the current run.
 * Used when descending from a run into a document or parameter step.
 */
export async function withChildContext<T>(
  overrides: Partial<RunContext>,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  const child: RunContext = {
    ...parent,
    ...overrides,
    correlationId: overrides.correlationId || parent?.correlationId || ulid(),
  };
  return asyncLocalStorage.run(child, fn);
}

export { asyncLocalStorage };
