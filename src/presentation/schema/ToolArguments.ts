import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ToolInputSchema } from '../../core/entities/Descriptors.js';

export interface ArgumentIssue {
  field: string;
  reason: string;
}

export type ArgumentsOutcome<T> = { ok: true; data: T } | { ok: false; issues: ArgumentIssue[] };

// Clients send null for "not set"
const nullToUndefined = (value: unknown): unknown => (value === null ? undefined : value);

// Numeric strings such as "0.5" are accepted for number fields
const toNumber = (value: unknown): unknown => {
  if (value === null) return undefined;
  return typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
};

/**
 * Required, non-blank string. The value is passed on untrimmed.
 */
export function requiredText(description: string) {
  return z
    .preprocess(
      nullToUndefined,
      z
        .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
        .refine((value) => value.trim().length > 0, 'must not be empty')
    )
    .describe(description);
}

export function optionalText(description: string) {
  return z
    .preprocess(nullToUndefined, z.string({ invalid_type_error: 'must be a string' }).optional())
    .describe(description);
}

export function optionalChoice<T extends string>(values: readonly [T, ...T[]], description: string) {
  return z
    .preprocess(
      nullToUndefined,
      z.enum(values, { errorMap: () => ({ message: `must be one of ${values.join(', ')}` }) }).optional()
    )
    .describe(description);
}

export interface NumberBounds {
  integer?: boolean;
  minimum: number;
  maximum: number;
}

export function optionalNumber(bounds: NumberBounds, description: string) {
  let schema = z.number({ invalid_type_error: 'must be a number' });
  if (bounds.integer) {
    schema = schema.int('must be an integer');
  }
  schema = schema
    .min(bounds.minimum, `must be >= ${bounds.minimum}`)
    .max(bounds.maximum, `must be <= ${bounds.maximum}`);
  return z.preprocess(toNumber, schema.optional()).describe(description);
}

const InputSchemaShape = z
  .object({
    type: z.literal('object'),
    properties: z.record(z.record(z.unknown())),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

/**
 * JSON Schema advertised in the tool descriptor
 */
export function toInputSchema(schema: z.ZodTypeAny): ToolInputSchema {
  return InputSchemaShape.parse(zodToJsonSchema(schema, { $refStrategy: 'none' }));
}

/**
 * Check raw arguments against a tool schema.
 * One issue per offending field, in declaration order.
 */
export function parseArguments<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  args: Record<string, unknown> | undefined
): ArgumentsOutcome<T> {
  const parsed = schema.safeParse(args ?? {});
  if (parsed.success) {
    return { ok: true, data: parsed.data };
  }

  const issues: ArgumentIssue[] = [];
  for (const issue of parsed.error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : 'arguments';
    if (!issues.some((existing) => existing.field === field)) {
      issues.push({ field, reason: issue.message });
    }
  }
  return { ok: false, issues };
}
