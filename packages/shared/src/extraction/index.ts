export type {
  ContextUnit,
  ContextSource,
  ExtractionRequest,
  ExtractionOutcome,
} from './types';
export { ExtractionEngine, type ExtractionEngineOptions } from './engine';
export {
  parseStructuredResponse,
  extractJsonText,
  isNotFoundToken,
  type ParsedValue,
} from './structured-response';
export { FullTextContextSource, RetrievalContextSource, retrievalQuery } from './context-sources';
