/**
 * Canonical write-result type definitions
 */

export const UNKNOWN_STATUS_CODE = 'UNKNOWN';
export const UNRECOGNIZED_OUTCOME_STATUS_CODE = 'UNRECOGNIZED_OUTCOME';

export const NO_MESSAGE = 'No error message provided';
export const UNRECOGNIZED_OUTCOME_MESSAGE =
  'Write outcome has an unrecognized shape: no success flag, id or errors could be read';
export const UNREADABLE_OUTCOME_MEMBER_MESSAGE = 'Write outcome members could not be read';
export const FAILURE_WITHOUT_DETAIL_MESSAGE = 'Write reported failure without error detail';

/**
 * Symbolic error code. Store codes are kept verbatim; the two sentinels
 * cover raw errors without a code and outcomes that could not be read.
 */
export type StatusCode =
  | typeof UNKNOWN_STATUS_CODE
  | typeof UNRECOGNIZED_OUTCOME_STATUS_CODE
  | (string & {});

export type ErrorCategory =
  | 'FieldValidationError'
  | 'DuplicateValueError'
  | 'PermissionError'
  | 'UnknownOutcomeShapeError'
  | 'UncategorizedError';

export interface CanonicalError {
  readonly fields: readonly string[];
  readonly message: string;
  readonly statusCode: StatusCode;
}

export interface CanonicalResult {
  readonly recordId?: string;
  readonly success: boolean;
  readonly errors: readonly CanonicalError[];
}

export interface BulkWriteSummary {
  totalProcessed: number;
  successCount: number;
  failureCount: number;
  failures: Array<{ index: number; result: CanonicalResult }>;
}
