/**
 * @epiparam/shared
 *
 * Extraction protocol, scoring and refinement loop shared by the CLIs.
 */

// Types
export * from './types';

// Errors
export * from './errors';

// Context
export * from './context';

// Logger
export * from './logger';

// Configuration
export * from './config';

// Metrics
export * from './metrics';

// JSON Schema validation
export * from './schemas';

// Prompts and templates
export * from './prompts';
export * from './templates';

// External service adapters
export * from './llm';
export * from './documents';
export * from './retrieval';

// Core
export * from './extraction';
export * from './evaluation';
export * from './output';
export * from './refinement';
