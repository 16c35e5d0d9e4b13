/**
 * Context sources decide what text Stage 1 sees.
 */

import { logger } from '../logger';
import { errorMessage } from '../errors';
import { recoveredErrorsCounter } from '../metrics';
import type { DocumentText, ParameterSpec } from '../types';
import type { VectorIndex } from '../retrieval/types';
import type { ContextSource, ContextUnit } from './types';

/**
 * The whole document text, all parameters in one joint unit.
 */
export class FullTextContextSource implements ContextSource {
  async buildUnits(document: DocumentText, parameters: readonly ParameterSpec[]): Promise<ContextUnit[]> {
    return [{ context: document.fullText, parameters }];
  }
}

export function retrievalQuery(parameter: ParameterSpec): string {
  return `${parameter.name} ${parameter.description}`.trim();
}

/**
 * The top-k indexed chunks of the document, one unit per parameter.
 */
export class RetrievalContextSource implements ContextSource {
  constructor(
    private readonly index: VectorIndex,
    private readonly ragN: number
  ) {}

  async buildUnits(document: DocumentText, parameters: readonly ParameterSpec[]): Promise<ContextUnit[]> {
    const units: ContextUnit[] = [];

    for (const parameter of parameters) {
      try {
        const chunks = await this.index.query(retrievalQuery(parameter), this.ragN, {
          documentId: document.sourceId,
        });
        units.push({
          context: chunks.map((c) => c.text).join('\n\n'),
          parameters: [parameter],
          note: 'No indexed chunks for this document',
          retrieved: { parameter, chunks, k: this.ragN },
        });
      } catch (error) {
        recoveredErrorsCounter.inc({ kind: 'service_call' });
        logger.warn('Retrieval failed, recording Not found', {
          documentId: document.sourceId,
          parameterName: parameter.name,
          error: errorMessage(error),
        });
        units.push({
          context: '',
          parameters: [parameter],
          note: `Retrieval failed: ${errorMessage(error)}`,
        });
      }
    }

    return units;
  }
}
