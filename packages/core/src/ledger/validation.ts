import type { z } from 'zod';
import { InvalidArgumentError } from './ledger-errors.js';

/**
 * Parse operation input, reporting schema failures as InvalidArgumentError
 * The first issue becomes the message; the ZodError is kept as the cause.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidArgumentError(`${field}${issue?.message ?? 'Invalid input'}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
