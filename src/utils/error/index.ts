export class DatabaseError extends Error {
  public code?: string;
  public originalError?: Error;

  constructor(message: string, code?: string, originalError?: Error) {
    super(message);
    this.name = 'DatabaseError';
    this.code = code;
    this.originalError = originalError;
    Error.captureStackTrace(this, DatabaseError);
  }
}

export class ValidationError extends Error {
  details?: unknown;
  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * The store refused or broke a bulk write as a whole.
 * Per-record failures are never reported this way.
 */
export class BulkWriteError extends Error {
  public code: string;
  public operationKind: string;
  public recordCount: number;
  public originalError?: Error;

  constructor(
    message: string,
    details: {
      operationKind: string;
      recordCount: number;
      code?: string;
      originalError?: Error;
      cause?: unknown;
    }
  ) {
    super(message, { cause: details.cause });
    this.name = 'BulkWriteError';
    this.code = details.code ?? 'BULK_WRITE_FAILED';
    this.operationKind = details.operationKind;
    this.recordCount = details.recordCount;
    this.originalError = details.originalError;
    Error.captureStackTrace(this, BulkWriteError);
  }
}
