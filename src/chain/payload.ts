import type { z } from 'zod';

import { ChainDecodeError } from './errors.js';

/**
 * Validate a raw backend payload against its schema.
 *
 * @throws ChainDecodeError listing the offending paths
 */
export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  operation: string
): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join(', ');
    throw new ChainDecodeError(operation, issues);
  }
  return result.data;
}
