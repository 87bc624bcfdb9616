import { z } from 'zod';
import { ReviewableItemSchema, type ReviewableItem } from '../domain/review';
import { InvalidItemStateError } from '../errors';

export type SchemaValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationIssue[] };

export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
  expected?: string;
  received?: string;
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || '(root)',
    message: issue.message,
    code: issue.code,
    expected: 'expected' in issue ? String(issue.expected) : undefined,
    received: 'received' in issue ? String(issue.received) : undefined,
  }));
}

export function validateSchema<Output, Input = Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  data: unknown
): SchemaValidationResult<Output> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { valid: true, data: result.data };
  }

  return { valid: false, errors: toValidationIssues(result.error) };
}

export function readItemId(value: unknown): string | null {
  if (typeof value === 'object' && value !== null && 'id' in value) {
    const { id } = value;
    return typeof id === 'string' && id.length > 0 ? id : null;
  }
  return null;
}

/**
 * Parses an item snapshot, throwing `InvalidItemStateError` for negative
 * intervals, non-positive ease factors or missing fields.
 */
export function assertReviewableItem(value: unknown): ReviewableItem {
  const result = validateSchema(ReviewableItemSchema, value);
  if (!result.valid) {
    throw new InvalidItemStateError(readItemId(value), result.errors);
  }
  return result.data;
}
