import { z } from 'zod';
import { InvalidInputError } from './errors';

export const nonNegativeNumber = z.number().finite().nonnegative();
export const positiveNumber = z.number().finite().positive();
export const finiteNumber = z.number().finite();

/**
 * Parse `value` against `schema`; the first zod issue becomes an InvalidInputError
 * whose field is `context` plus the issue path (e.g. "stages.1.cycleTimeSeconds").
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, context: string): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const path = issue ? issue.path.map(String) : [];
  const field = [context, ...path].join('.');
  const message = issue ? `${field}: ${issue.message}` : `${field}: invalid value`;
  throw new InvalidInputError(message, field, result.error.issues);
}
