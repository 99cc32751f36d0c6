// ============================================================================
// Validation Helpers
// ============================================================================
// Bridges zod schemas onto the SDK's ValidationError so callers only ever see
// one error type for bad input.
// ============================================================================

import type { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Parse `value` with `schema`, throwing a ValidationError for the first issue.
 * zod reports issues in schema key order, so "first" follows field order.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  fieldPrefix?: string,
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const pathParts = [fieldPrefix, ...(issue?.path ?? []).map(String)].filter(
    (part): part is string => Boolean(part),
  );
  const field = pathParts.length > 0 ? pathParts.join('.') : undefined;
  throw new ValidationError(issue?.message ?? 'Invalid value', { field });
}
