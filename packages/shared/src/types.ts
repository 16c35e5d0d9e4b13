/**
 * Shared TypeScript Types
 *
 * Data model for the parameter extraction pipeline. Shapes of the files under
 * config/ are validated against the JSON schemas in packages/shared/schemas/.
 */

// ============================================================================
// Parameters & Prompts
// ============================================================================

export interface ParameterSpec {
  readonly name: string;
  readonly description: string;
}

/** Prompts that drive one two-stage extraction */
export interface ExtractionPrompts {
  /** Stage 1 system prompt (discovery) */
  readonly systemPrompt: string;
  /** Stage 2 system prompt (formatting) */
  readonly refinePrompt: string;
}

// ============================================================================
// Documents
// ============================================================================

export interface DocumentSection {
  heading: string;
  body: string;
}

export interface DocumentText {
  sourceId: string;
  fullText: string;
  sections: DocumentSection[];
  tables: string[];
}

// ============================================================================
// Retrieval
// ============================================================================

export interface ScoredChunk {
  documentId: string;
  chunkIndex: number;
  text: string;
  score: number;
}

export interface RetrievedContext {
  parameter: ParameterSpec;
  chunks: ScoredChunk[];
  k: number;
}

// ============================================================================
// Extraction Results
// ============================================================================

export const NOT_FOUND = 'Not found';

export type ExtractedValue = string;

export interface ExtractionResult {
  readonly documentId: string;
  readonly parameterName: string;
  /** Stage 1 free-text reasoning that produced this value */
  readonly rawExplanation: string | null;
  /** The formatted value, or "Not found" */
  readonly extractedValue: ExtractedValue;
  /** Errors recovered while producing the value */
  readonly confidenceNotes: string | null;
}

export type ExtractionMode = 'twostage' | 'rag';

// ============================================================================
// Evaluation
// ============================================================================

/** Absent ground truth */
export const TRUE_VALUE_ABSENT = 'NA';

export type TrueValue = number | string | typeof TRUE_VALUE_ABSENT;

export interface GroundTruthRecord {
  documentId: string;
  parameterName: string;
  trueValue: TrueValue;
}

export type ConfusionLabel = 'TP' | 'TN' | 'FP' | 'FN';

export type OutcomeLabel = 'Success' | 'Fail';

export interface ConfusionCounts {
  TP: number;
  TN: number;
  FP: number;
  FN: number;
}

/** A metric is null when its formula has a zero denominator */
export type MetricValue = number | null;

export interface EvaluationMetrics {
  counts: ConfusionCounts;
  sensitivity: MetricValue;
  specificity: MetricValue;
  accuracy: MetricValue;
  precision: MetricValue;
  f1: MetricValue;
  mcc: MetricValue;
}

// ============================================================================
// Prompt Refinement
// ============================================================================

export interface IterationRecord {
  iteration: number;
  metrics: EvaluationMetrics;
}

export interface PromptState {
  parameterName: string;
  promptText: string;
  iteration: number;
  history: IterationRecord[];
}

/** One row of the cumulative refinement table */
export interface RefinementRow {
  prompt_text: string;
  model_name: string;
  parameter_name: string;
  document_id: string;
  extracted_value: string;
  true_value: string;
  outcome_label: OutcomeLabel | '';
  confusion_label: ConfusionLabel | '';
  iteration: number;
}
