/**
 * Parsing of the Stage 2 response: a JSON object mapping parameter names to
 * string values.
 */

import { ParseError, errorMessage } from '../errors';
import { NOT_FOUND, type ParameterSpec } from '../types';

export interface ParsedValue {
  value: string;
  /** Why the value fell back to "Not found", when it did */
  note: string | null;
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;
const NOT_FOUND_TOKEN = /^not\s+found\.?$/i;

export function isNotFoundToken(value: string): boolean {
  return NOT_FOUND_TOKEN.test(value.trim());
}

function normalizeKey(key: string): string {
  return key.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Extract the JSON object text, tolerating markdown fences and prose around it.
 */
export function extractJsonText(text: string): string {
  const fenced = FENCED_BLOCK.exec(text);
  const candidate = fenced ? fenced[1] : text;
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new ParseError('Stage 2 response contains no JSON object');
  }
  return candidate.slice(start, end + 1);
}

function parseObject(text: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonText(text));
  } catch (error) {
    if (error instanceof ParseError) throw error;
    throw new ParseError(`Stage 2 response is not valid JSON: ${errorMessage(error)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ParseError('Stage 2 response is not a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function toParsedValue(name: string, raw: unknown): ParsedValue {
  if (raw === undefined) {
    return { value: NOT_FOUND, note: `"${name}" missing from structured response` };
  }
  if (raw === null) {
    return { value: NOT_FOUND, note: `"${name}" is null in structured response` };
  }
  if (typeof raw === 'number' || typeof raw === 'boolean') {
    return { value: String(raw), note: null };
  }
  if (typeof raw !== 'string') {
    return { value: NOT_FOUND, note: `"${name}" has a non-scalar value` };
  }
  const value = raw.trim();
  if (!value) {
    return { value: NOT_FOUND, note: `"${name}" is empty in structured response` };
  }
  if (isNotFoundToken(value)) {
    return { value: NOT_FOUND, note: null };
  }
  return { value, note: null };
}

/**
 * Map every requested parameter to a value. Keys match exactly first, then
 * ignoring case and whitespace. Throws ParseError only when the response as
 * a whole is not a JSON object.
 */
export function parseStructuredResponse(
  text: string,
  parameters: readonly ParameterSpec[]
): Map<string, ParsedValue> {
  const object = parseObject(text);

  const normalized = new Map<string, unknown>();
  for (const [key, value] of Object.entries(object)) {
    const nkey = normalizeKey(key);
    if (!normalized.has(nkey)) {
      normalized.set(nkey, value);
    }
  }

  const values = new Map<string, ParsedValue>();
  for (const { name } of parameters) {
    const raw = Object.prototype.hasOwnProperty.call(object, name)
      ? object[name]
      : normalized.get(normalizeKey(name));
    values.set(name, toParsedValue(name, raw));
  }
  return values;
}
