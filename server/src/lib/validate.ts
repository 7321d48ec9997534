import type { z } from 'zod';

/** One failed check, keyed by the dotted path of the offending field. */
export interface FieldIssue {
  field: string;
  message: string;
}

export type Validated<T> = { success: true; data: T } | { success: false; details: FieldIssue[] };

/** Label for issues about the body as a whole (wrong type, not JSON). */
export const BODY_FIELD = '(body)';

export function toFieldIssues(issues: readonly z.ZodIssue[]): FieldIssue[] {
  return issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : BODY_FIELD,
    message: issue.message,
  }));
}

/**
 * Checks a parsed request body against `schema`. Failures come back as
 * field issues ready for a 400 response's `details`.
 */
export function validateBody<T extends z.ZodType>(schema: T, body: unknown): Validated<z.infer<T>> {
  const result = schema.safeParse(body);
  if (!result.success) {
    return { success: false, details: toFieldIssues(result.error.issues) };
  }
  return { success: true, data: result.data };
}
