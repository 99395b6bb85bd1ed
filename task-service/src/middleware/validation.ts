import type { z } from 'zod';
import { ValidationError } from '../../../src/errors.js';
import { formatZodIssues } from '../schemas/task.js';

const LABELS = {
  body: 'Invalid request body',
  query: 'Invalid query parameters',
  params: 'Invalid path parameters',
} as const;

/** Parses one part of a request; failures become a 400 with the zod issues attached. */
export function parseRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  part: keyof typeof LABELS,
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(LABELS[part], { details: { issues: formatZodIssues(parsed.error) } });
  }
  return parsed.data;
}
