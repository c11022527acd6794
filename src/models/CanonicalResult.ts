/**
 * Canonical result value constructors
 * Every normalized write outcome is built here, so the success/errors invariant holds in one place
 */

import {
  CanonicalError,
  CanonicalResult,
  ErrorCategory,
  FAILURE_WITHOUT_DETAIL_MESSAGE,
  NO_MESSAGE,
  StatusCode,
  UNKNOWN_STATUS_CODE,
  UNRECOGNIZED_OUTCOME_STATUS_CODE,
} from '../types/results';

export interface CanonicalErrorInput {
  fields?: readonly string[];
  message?: string;
  statusCode?: StatusCode;
}

export interface CanonicalResultInput {
  recordId?: string;
  success: boolean;
  errors?: readonly CanonicalError[];
}

const CATEGORY_BY_STATUS_CODE = new Map<StatusCode, ErrorCategory>([
  ['REQUIRED_FIELD_MISSING', 'FieldValidationError'],
  ['FIELD_CUSTOM_VALIDATION_EXCEPTION', 'FieldValidationError'],
  ['INVALID_FIELD', 'FieldValidationError'],
  ['INVALID_CROSS_REFERENCE_KEY', 'FieldValidationError'],
  ['STRING_TOO_LONG', 'FieldValidationError'],
  ['DUPLICATE_VALUE', 'DuplicateValueError'],
  ['DUPLICATES_DETECTED', 'DuplicateValueError'],
  ['INSUFFICIENT_ACCESS_OR_READONLY', 'PermissionError'],
  ['INSUFFICIENT_ACCESS_ON_CROSS_REFERENCE_ENTITY', 'PermissionError'],
  [UNRECOGNIZED_OUTCOME_STATUS_CODE, 'UnknownOutcomeShapeError'],
]);

export function createCanonicalError(input: CanonicalErrorInput = {}): CanonicalError {
  const message = input.message && input.message.trim() ? input.message : NO_MESSAGE;

  return Object.freeze({
    fields: Object.freeze([...(input.fields ?? [])]),
    message,
    statusCode: input.statusCode || UNKNOWN_STATUS_CODE,
  });
}

/**
 * A result is successful only when it was reported as such and carries no errors.
 * A failure reported without detail gets a single UNKNOWN error.
 */
export function createCanonicalResult(input: CanonicalResultInput): CanonicalResult {
  const reportedErrors = input.errors ?? [];
  const success = input.success && reportedErrors.length === 0;
  const errors =
    success || reportedErrors.length > 0
      ? reportedErrors
      : [createCanonicalError({ message: FAILURE_WITHOUT_DETAIL_MESSAGE })];

  return Object.freeze({
    ...(input.recordId !== undefined ? { recordId: input.recordId } : {}),
    success,
    errors: Object.freeze([...errors]),
  });
}

export function categorizeStatusCode(statusCode: StatusCode): ErrorCategory {
  return CATEGORY_BY_STATUS_CODE.get(statusCode) ?? 'UncategorizedError';
}

export function categorizeError(error: CanonicalError): ErrorCategory {
  return categorizeStatusCode(error.statusCode);
}
