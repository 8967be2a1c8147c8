import { z } from 'zod';
import {
  optionalChoice,
  optionalNumber,
  optionalText,
  parseArguments,
  requiredText,
  toInputSchema,
} from '../src/presentation/schema/ToolArguments.js';
import { queryPerplexitySchema } from '../src/presentation/tools/index.js';

const schema = z.object({
  message: requiredText('The question'),
  size: optionalChoice(['small', 'large'], 'Size'),
  limit: optionalNumber({ integer: true, minimum: 1, maximum: 10 }, 'Limit'),
  ratio: optionalNumber({ minimum: 0, maximum: 2 }, 'Ratio'),
  note: optionalText('Note'),
});

describe('toInputSchema', () => {
  test('should describe every field with its constraints', () => {
    const inputSchema = toInputSchema(queryPerplexitySchema);

    expect(inputSchema.type).toBe('object');
    expect(inputSchema.required).toEqual(['message']);
    expect(inputSchema.properties).toEqual({
      message: { type: 'string', description: 'The question or prompt to send to Perplexity AI' },
      model: {
        type: 'string',
        enum: ['sonar', 'sonar-pro', 'sonar-reasoning'],
        description: 'Model to use (default: sonar)',
      },
      max_tokens: {
        type: 'integer',
        minimum: 1,
        maximum: 4000,
        description: 'Maximum tokens in response (default: 1000)',
      },
      temperature: {
        type: 'number',
        minimum: 0,
        maximum: 2,
        description: 'Response randomness 0-2 (default: 0.7)',
      },
      system_message: { type: 'string', description: 'Optional system message to set context' },
    });
  });
});

describe('parseArguments', () => {
  test('should accept valid arguments', () => {
    expect(parseArguments(schema, { message: 'hello', size: 'large', limit: 3, ratio: 1.5 })).toEqual({
      ok: true,
      data: { message: 'hello', size: 'large', limit: 3, ratio: 1.5 },
    });
  });

  test('should keep surrounding whitespace of text values', () => {
    const outcome = parseArguments(schema, { message: '  spaced out  ' });

    expect(outcome).toEqual({ ok: true, data: { message: '  spaced out  ' } });
  });

  test('should treat null as an omitted optional field', () => {
    const outcome = parseArguments(schema, { message: 'hello', size: null, limit: null });

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.data.size).toBeUndefined();
      expect(outcome.data.limit).toBeUndefined();
    }
  });

  test('should coerce numeric strings', () => {
    const outcome = parseArguments(schema, { message: 'hello', limit: '7', ratio: '0.25' });

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.data.limit).toBe(7);
      expect(outcome.data.ratio).toBe(0.25);
    }
  });

  test('should report a missing required field', () => {
    expect(parseArguments(schema, {})).toEqual({
      ok: false,
      issues: [{ field: 'message', reason: 'is required' }],
    });
    expect(parseArguments(schema, undefined)).toEqual({
      ok: false,
      issues: [{ field: 'message', reason: 'is required' }],
    });
  });

  test('should reject a blank required string', () => {
    expect(parseArguments(schema, { message: '   ' })).toEqual({
      ok: false,
      issues: [{ field: 'message', reason: 'must not be empty' }],
    });
  });

  test('should report every offending field in declaration order', () => {
    const outcome = parseArguments(schema, {
      message: 42,
      size: 'huge',
      limit: 2.5,
      ratio: 3,
      note: false,
    });

    expect(outcome).toEqual({
      ok: false,
      issues: [
        { field: 'message', reason: 'must be a string' },
        { field: 'size', reason: 'must be one of small, large' },
        { field: 'limit', reason: 'must be an integer' },
        { field: 'ratio', reason: 'must be <= 2' },
        { field: 'note', reason: 'must be a string' },
      ],
    });
  });

  test('should reject values that are not numbers', () => {
    expect(parseArguments(schema, { message: 'hi', limit: 'many', ratio: -1 })).toEqual({
      ok: false,
      issues: [
        { field: 'limit', reason: 'must be a number' },
        { field: 'ratio', reason: 'must be >= 0' },
      ],
    });
  });
});
