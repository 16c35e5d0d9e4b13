/**
 * Pipeline Error Taxonomy
 *
 * Only ConfigurationError is fatal. The other kinds are recovered where they
 * occur and surface as "Not found" rows with a note.
 */

export type PipelineErrorCode =
  | 'configuration'
  | 'document_read'
  | 'service_call'
  | 'parse';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed prompts, parameter list or CLI arguments */
export class ConfigurationError extends PipelineError {
  readonly code = 'configuration' as const;
}

/** A PDF could not be read or parsed */
export class DocumentReadError extends PipelineError {
  readonly code = 'document_read' as const;

  constructor(
    readonly filePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A chat, embedding or similarity call failed */
export class ServiceCallError extends PipelineError {
  readonly code = 'service_call' as const;

  constructor(
    readonly service: 'chat' | 'embedding',
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A Stage 2 response did not have the expected structured shape */
export class ParseError extends PipelineError {
  readonly code = 'parse' as const;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
