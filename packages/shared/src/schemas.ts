/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for the configuration files under config/.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import { ConfigurationError } from './errors';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

// ============================================================================
// File shapes
// ============================================================================

export interface PromptsFile {
  sys_prompt: string;
  rag_sys_prompt?: string;
  refine_prompt: string;
}

export interface ParametersFile {
  parameters: Array<string | { name: string; description?: string }>;
}

export interface RefinerParameterEntry {
  name: string;
  description?: string;
  truth_column: string;
  base_prompt?: string;
}

export interface RefinerParametersFile {
  parameters: RefinerParameterEntry[];
}

// ============================================================================
// Schema loading - lazy loaded on first use
// ============================================================================

let promptsValidator: ValidateFunction<PromptsFile> | null = null;
let parametersValidator: ValidateFunction<ParametersFile> | null = null;
let refinerParametersValidator: ValidateFunction<RefinerParametersFile> | null = null;

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Relative to the shared package sources
    path.join(__dirname, '../schemas', schemaName),
    // Relative to compiled output under dist/packages/shared/src
    path.join(__dirname, '../../../packages/shared/schemas', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'packages/shared/schemas', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  throw new ConfigurationError(`Schema file not found: ${schemaName}`);
}

function getPromptsValidator(): ValidateFunction<PromptsFile> {
  if (!promptsValidator) {
    promptsValidator = ajv.compile<PromptsFile>(loadSchema('prompts.schema.json'));
  }
  return promptsValidator;
}

function getParametersValidator(): ValidateFunction<ParametersFile> {
  if (!parametersValidator) {
    parametersValidator = ajv.compile<ParametersFile>(loadSchema('parameters.schema.json'));
  }
  return parametersValidator;
}

function getRefinerParametersValidator(): ValidateFunction<RefinerParametersFile> {
  if (!refinerParametersValidator) {
    refinerParametersValidator = ajv.compile<RefinerParametersFile>(
      loadSchema('refiner_parameters.schema.json')
    );
  }
  return refinerParametersValidator;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Validate data against a named schema, throwing ConfigurationError on failure.
 * `label` names the file being validated in the error message.
 */
function assertValid<T>(validate: ValidateFunction<T>, data: unknown, label: string): T {
  if (validate(data)) {
    return data;
  }
  const errors = formatErrors(validate.errors);
  logger.warn('Configuration validation failed', { file: label, errors });
  throw new ConfigurationError(`${label} is invalid: ${errors.join('; ')}`);
}

export function validatePromptsFile(data: unknown, label = 'prompts.json'): PromptsFile {
  return assertValid(getPromptsValidator(), data, label);
}

export function validateParametersFile(data: unknown, label = 'parameters.json'): ParametersFile {
  return assertValid(getParametersValidator(), data, label);
}

export function validateRefinerParametersFile(
  data: unknown,
  label = 'refiner_parameters.json'
): RefinerParametersFile {
  return assertValid(getRefinerParametersValidator(), data, label);
}
