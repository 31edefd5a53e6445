import type { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../../core/errors.js';

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parse `input` with `schema`, throwing a ValidationError listing every issue
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    throw new ValidationError(`Invalid ${label}: ${issues.length} issue(s)`, issues);
  }
  return result.data;
}
