import { z } from 'zod';
import { ValidationError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Parse input against a schema or throw a ValidationError
 *
 * The error message is the first issue's message; all issues are attached
 * as `errors`. Raw input is never logged, it may hold a password.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  subject: string
): z.output<S> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const details = result.error.flatten();
    logger.warn({ subject, errors: details }, 'Zod validation failed');
    throw new ValidationError(result.error.issues[0]?.message ?? `Invalid ${subject}`, details);
  }

  return result.data;
}
