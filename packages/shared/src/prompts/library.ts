/**
 * Prompt Library
 *
 * Loads the extraction prompts and target parameters from the config
 * directory. The returned objects are frozen and passed to the engine and
 * the refinement loop at construction time.
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import { ConfigurationError, errorMessage } from '../errors';
import {
  validateParametersFile,
  validatePromptsFile,
  validateRefinerParametersFile,
} from '../schemas';
import type { ParameterSpec } from '../types';

export const PROMPTS_FILE = 'prompts.json';
export const PARAMETERS_FILE = 'parameters.json';
export const REFINER_PARAMETERS_FILE = 'refiner_parameters.json';
export const REFINER_INSTRUCTIONS_FILE = 'refiner_prompt.txt';

export interface PromptLibrary {
  readonly systemPrompt: string;
  /** Stage 1 system prompt for retrieved excerpts; defaults to systemPrompt */
  readonly ragSystemPrompt: string;
  readonly refinePrompt: string;
  readonly parameters: readonly ParameterSpec[];
}

export interface RefinerParameter extends ParameterSpec {
  /** Ground-truth CSV column holding this parameter's true values */
  readonly truthColumn: string;
  readonly basePrompt: string | null;
}

export interface RefinerConfig {
  /** Instructions that prefix every generated candidate prompt */
  readonly retrievalInstructions: string;
  readonly parameters: readonly RefinerParameter[];
}

function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Configuration file not found: ${filePath}`);
  }
  const raw = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`${filePath} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function assertUniqueNames(names: string[], label: string): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new ConfigurationError(`${label} declares parameter "${name}" more than once`);
    }
    seen.add(name);
  }
}

/**
 * Parameters may be listed as bare names or as {name, description} objects.
 */
export function normalizeParameters(
  entries: Array<string | { name: string; description?: string }>
): ParameterSpec[] {
  return entries.map((entry) =>
    typeof entry === 'string'
      ? Object.freeze({ name: entry.trim(), description: '' })
      : Object.freeze({ name: entry.name.trim(), description: (entry.description ?? '').trim() })
  );
}

export function loadPromptLibrary(configDir: string): PromptLibrary {
  const promptsPath = path.join(configDir, PROMPTS_FILE);
  const parametersPath = path.join(configDir, PARAMETERS_FILE);

  const prompts = validatePromptsFile(readJsonFile(promptsPath), promptsPath);
  const parameterFile = validateParametersFile(readJsonFile(parametersPath), parametersPath);

  const parameters = normalizeParameters(parameterFile.parameters);
  assertUniqueNames(
    parameters.map((p) => p.name),
    parametersPath
  );

  logger.info('Prompt library loaded', {
    configDir,
    parameterCount: parameters.length,
    hasRagPrompt: prompts.rag_sys_prompt !== undefined,
  });

  return Object.freeze({
    systemPrompt: prompts.sys_prompt,
    ragSystemPrompt: prompts.rag_sys_prompt ?? prompts.sys_prompt,
    refinePrompt: prompts.refine_prompt,
    parameters: Object.freeze(parameters),
  });
}

export function loadRefinerConfig(configDir: string): RefinerConfig {
  const parametersPath = path.join(configDir, REFINER_PARAMETERS_FILE);
  const instructionsPath = path.join(configDir, REFINER_INSTRUCTIONS_FILE);

  const file = validateRefinerParametersFile(readJsonFile(parametersPath), parametersPath);
  assertUniqueNames(
    file.parameters.map((p) => p.name.trim()),
    parametersPath
  );

  if (!fs.existsSync(instructionsPath)) {
    throw new ConfigurationError(`Configuration file not found: ${instructionsPath}`);
  }
  const retrievalInstructions = fs.readFileSync(instructionsPath, 'utf-8').trim();
  if (!retrievalInstructions) {
    throw new ConfigurationError(`${instructionsPath} is empty`);
  }

  const parameters = file.parameters.map((entry) =>
    Object.freeze({
      name: entry.name.trim(),
      description: (entry.description ?? '').trim(),
      truthColumn: entry.truth_column,
      basePrompt: entry.base_prompt ?? null,
    })
  );

  return Object.freeze({
    retrievalInstructions,
    parameters: Object.freeze(parameters),
  });
}
