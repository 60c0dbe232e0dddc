import * as v from 'valibot';
import { ValidationError } from './errors.js';

/**
 * Describe the first valibot issue as `path: message` (or just the message
 * when the issue has no path).
 */
export function describeFirstIssue(issues: readonly v.BaseIssue<unknown>[]): string {
  const firstIssue = issues[0];
  const path = firstIssue?.path
    ?.map((p) => ('key' in p ? String(p.key) : ''))
    .filter(Boolean)
    .join('.') || '';
  return path
    ? `${path}: ${firstIssue?.message}`
    : firstIssue?.message || 'Validation failed';
}

/**
 * Validate input against a schema, throwing ValidationError on failure.
 */
export function parseOrThrow<TSchema extends v.GenericSchema>(
  schema: TSchema,
  input: unknown
): v.InferOutput<TSchema> {
  const result = v.safeParse(schema, input);
  if (!result.success) {
    throw new ValidationError(describeFirstIssue(result.issues));
  }
  return result.output;
}
