import { AppError } from '@callgate/core';
import type { z } from 'zod';

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

/**
 * Parses a request message, failing with `INVALID_ARGUMENT` and a
 * `validation failed: ...` message listing every issue.
 */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  request: unknown,
): z.output<S> {
  const result = schema.safeParse(request);
  if (!result.success) {
    throw new AppError(
      'INVALID_ARGUMENT',
      `validation failed: ${formatIssues(result.error)}`,
      { cause: result.error },
    );
  }
  return result.data;
}
