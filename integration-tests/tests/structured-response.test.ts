/**
 * Stage 2 response parsing
 */

import {
  extractJsonText,
  parseStructuredResponse,
  ParseError,
  NOT_FOUND,
  type ParameterSpec,
} from '@epiparam/shared';

const PARAMETERS: ParameterSpec[] = [
  { name: 'Case fatality rate', description: 'Deaths among cases' },
  { name: 'Incubation period', description: 'Days to onset' },
];

describe('parseStructuredResponse', () => {
  it('reads a plain JSON object', () => {
    const values = parseStructuredResponse(
      '{"Case fatality rate": "20.10%", "Incubation period": "Not found"}',
      PARAMETERS
    );

    expect(values.get('Case fatality rate')).toEqual({ value: '20.10%', note: null });
    expect(values.get('Incubation period')).toEqual({ value: NOT_FOUND, note: null });
  });

  it('tolerates markdown fences and surrounding prose', () => {
    const text = 'Here are the values:\n```json\n{"Case fatality rate": "3%", "Incubation period": "12 days"}\n```\nDone.';
    const values = parseStructuredResponse(text, PARAMETERS);

    expect(values.get('Case fatality rate')?.value).toBe('3%');
    expect(values.get('Incubation period')?.value).toBe('12 days');
  });

  it('matches keys ignoring case and whitespace when no exact key exists', () => {
    const values = parseStructuredResponse(
      '{"case  fatality RATE": "4%", "Incubation period": "9 days"}',
      PARAMETERS
    );

    expect(values.get('Case fatality rate')?.value).toBe('4%');
  });

  it('records a missing parameter as Not found with a note', () => {
    const values = parseStructuredResponse('{"Case fatality rate": "4%"}', PARAMETERS);

    expect(values.get('Incubation period')).toEqual({
      value: NOT_FOUND,
      note: '"Incubation period" missing from structured response',
    });
  });

  it('canonicalizes Not found spellings', () => {
    const values = parseStructuredResponse(
      '{"Case fatality rate": "not found.", "Incubation period": "NOT FOUND"}',
      PARAMETERS
    );

    expect(values.get('Case fatality rate')?.value).toBe(NOT_FOUND);
    expect(values.get('Incubation period')?.value).toBe(NOT_FOUND);
  });

  it('stringifies numbers and rejects non-scalar values', () => {
    const values = parseStructuredResponse(
      '{"Case fatality rate": 12.5, "Incubation period": ["5", "7"]}',
      PARAMETERS
    );

    expect(values.get('Case fatality rate')).toEqual({ value: '12.5', note: null });
    expect(values.get('Incubation period')).toEqual({
      value: NOT_FOUND,
      note: '"Incubation period" has a non-scalar value',
    });
  });

  it('records empty strings as Not found with a note', () => {
    const values = parseStructuredResponse(
      '{"Case fatality rate": "  ", "Incubation period": null}',
      PARAMETERS
    );

    expect(values.get('Case fatality rate')).toEqual({
      value: NOT_FOUND,
      note: '"Case fatality rate" is empty in structured response',
    });
    expect(values.get('Incubation period')?.value).toBe(NOT_FOUND);
  });

  it('throws ParseError when there is no JSON object', () => {
    expect(() => parseStructuredResponse('The rate was 20%.', PARAMETERS)).toThrow(ParseError);
    expect(() => parseStructuredResponse('{"unterminated": ', PARAMETERS)).toThrow(ParseError);
  });

  it('throws ParseError for malformed JSON', () => {
    expect(() => parseStructuredResponse('{rate: 20}', PARAMETERS)).toThrow(ParseError);
  });
});

describe('extractJsonText', () => {
  it('cuts the outermost braces', () => {
    expect(extractJsonText('Answer: {"a": {"b": 1}} thanks')).toBe('{"a": {"b": 1}}');
  });
});
