import type { ValidationIssue } from './validation/validator';

export type RejectionCode =
  | 'INVALID_ITEM_STATE'
  | 'UNKNOWN_QUALITY_SIGNAL'
  | 'ITEM_NOT_FOUND'
  | 'DUPLICATE_ITEM';

/**
 * An input (item or event) left out of a batch, with the reason.
 */
export interface RejectedInput {
  id: string;
  code: RejectionCode;
  reason: string;
}

/**
 * Base class for errors that reject a single item or event.
 * `statusCode` is what the HTTP layer answers with.
 */
export class SchedulingError extends Error {
  readonly code: RejectionCode | 'INVALID_CONFIGURATION';
  readonly statusCode: number;

  constructor(message: string, code: RejectionCode | 'INVALID_CONFIGURATION', statusCode = 400) {
    super(message);
    this.name = 'SchedulingError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class InvalidItemStateError extends SchedulingError {
  readonly itemId: string | null;
  readonly issues: ValidationIssue[];

  constructor(itemId: string | null, issues: ValidationIssue[]) {
    const detail = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    super(`Invalid state for item ${itemId ?? '<unknown>'}: ${detail}`, 'INVALID_ITEM_STATE', 422);
    this.name = 'InvalidItemStateError';
    this.itemId = itemId;
    this.issues = issues;
  }
}

export class UnknownQualitySignalError extends SchedulingError {
  readonly received: unknown;

  constructor(received: unknown) {
    super(`Unknown quality signal: ${JSON.stringify(received) ?? String(received)}`, 'UNKNOWN_QUALITY_SIGNAL');
    this.name = 'UnknownQualitySignalError';
    this.received = received;
  }
}

export class ItemNotFoundError extends SchedulingError {
  readonly itemId: string;

  constructor(itemId: string) {
    super(`Item ${itemId} was not found`, 'ITEM_NOT_FOUND', 404);
    this.name = 'ItemNotFoundError';
    this.itemId = itemId;
  }
}

export class DuplicateItemError extends SchedulingError {
  readonly itemId: string;

  constructor(itemId: string) {
    super(`Item ${itemId} already exists`, 'DUPLICATE_ITEM', 409);
    this.name = 'DuplicateItemError';
    this.itemId = itemId;
  }
}

export class InvalidConfigurationError extends SchedulingError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const detail = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    super(`Invalid scheduling configuration: ${detail}`, 'INVALID_CONFIGURATION');
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
