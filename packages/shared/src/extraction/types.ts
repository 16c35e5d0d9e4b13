import type {
  DocumentText,
  ExtractionPrompts,
  ExtractionResult,
  ParameterSpec,
  RetrievedContext,
} from '../types';

/**
 * One Stage 1 context and the parameters it is asked about. The full-text
 * path sends one unit per document; the retrieval path sends one per parameter.
 */
export interface ContextUnit {
  context: string;
  parameters: readonly ParameterSpec[];
  /** Recorded on every result of the unit when the context is blank */
  note?: string;
  retrieved?: RetrievedContext;
}

export interface ExtractionRequest {
  documentId: string;
  units: ContextUnit[];
}

export interface ExtractionOutcome {
  documentId: string;
  /** Exactly one result per requested parameter, in parameter order */
  results: readonly ExtractionResult[];
  /** Stage 1 responses, one per unit that reached Stage 2 */
  explanations: string[];
}

/**
 * Builds the context units for one document.
 */
export interface ContextSource {
  buildUnits(document: DocumentText, parameters: readonly ParameterSpec[]): Promise<ContextUnit[]>;
}

export type { ExtractionPrompts };
