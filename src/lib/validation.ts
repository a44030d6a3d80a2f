import type { z } from '@hono/zod-openapi';
import { validationFailed } from '../schemas/response.js';

export interface IssueDetail {
  path: string;
  message: string;
}

/**
 * Flatten zod issues into `{ path, message }` pairs for error details
 */
export function toIssueDetails(issues: z.ZodIssue[]): IssueDetail[] {
  return issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validate input against a schema, throwing a VALIDATION_ERROR APIError on failure
 *
 * @example
 * const doc = parseOrThrow(CreateBookSchema, body, 'Invalid book');
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, message: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw validationFailed(message, { issues: toIssueDetails(result.error.issues) });
  }
  return result.data;
}
