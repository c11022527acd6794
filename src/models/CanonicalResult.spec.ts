import {
  categorizeError,
  categorizeStatusCode,
  createCanonicalError,
  createCanonicalResult,
} from './CanonicalResult';
import {
  FAILURE_WITHOUT_DETAIL_MESSAGE,
  NO_MESSAGE,
  UNKNOWN_STATUS_CODE,
  UNRECOGNIZED_OUTCOME_STATUS_CODE,
} from '../types/results';

describe('createCanonicalError', () => {
  it('keeps the provided detail verbatim', () => {
    expect(
      createCanonicalError({
        fields: ['Name'],
        message: 'Required',
        statusCode: 'REQUIRED_FIELD_MISSING',
      })
    ).toEqual({ fields: ['Name'], message: 'Required', statusCode: 'REQUIRED_FIELD_MISSING' });
  });

  it('fills in defaults for missing detail', () => {
    expect(createCanonicalError()).toEqual({
      fields: [],
      message: NO_MESSAGE,
      statusCode: UNKNOWN_STATUS_CODE,
    });
  });

  it('replaces a blank message with the sentinel', () => {
    expect(createCanonicalError({ message: '   ' }).message).toBe(NO_MESSAGE);
  });

  it('copies and freezes the field list', () => {
    const fields = ['Email'];
    const error = createCanonicalError({ fields });
    fields.push('Phone');

    expect(error.fields).toEqual(['Email']);
    expect(Object.isFrozen(error)).toBe(true);
    expect(Object.isFrozen(error.fields)).toBe(true);
  });
});

describe('createCanonicalResult', () => {
  it('builds a successful result', () => {
    expect(createCanonicalResult({ recordId: '1', success: true })).toEqual({
      recordId: '1',
      success: true,
      errors: [],
    });
  });

  it('marks a result with errors as failed even when reported successful', () => {
    const result = createCanonicalResult({
      recordId: '7',
      success: true,
      errors: [createCanonicalError({ message: 'Duplicate', statusCode: 'DUPLICATE_VALUE' })],
    });

    expect(result.success).toBe(false);
    expect(result.errors).toHaveLength(1);
  });

  it('synthesizes an error for a failure reported without one', () => {
    expect(createCanonicalResult({ recordId: '3', success: false })).toEqual({
      recordId: '3',
      success: false,
      errors: [
        { fields: [], message: FAILURE_WITHOUT_DETAIL_MESSAGE, statusCode: UNKNOWN_STATUS_CODE },
      ],
    });
  });

  it('leaves recordId absent rather than defaulted', () => {
    const result = createCanonicalResult({ success: true });

    expect('recordId' in result).toBe(false);
  });

  it('keeps an empty-string id as a present id', () => {
    const result = createCanonicalResult({ recordId: '', success: true });

    expect('recordId' in result).toBe(true);
    expect(result.recordId).toBe('');
  });

  it('is frozen', () => {
    const result = createCanonicalResult({ success: true });

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.errors)).toBe(true);
  });
});

describe('categorizeStatusCode', () => {
  it.each([
    ['REQUIRED_FIELD_MISSING', 'FieldValidationError'],
    ['FIELD_CUSTOM_VALIDATION_EXCEPTION', 'FieldValidationError'],
    ['DUPLICATE_VALUE', 'DuplicateValueError'],
    ['INSUFFICIENT_ACCESS_OR_READONLY', 'PermissionError'],
    [UNRECOGNIZED_OUTCOME_STATUS_CODE, 'UnknownOutcomeShapeError'],
    [UNKNOWN_STATUS_CODE, 'UncategorizedError'],
    ['STORAGE_LIMIT_EXCEEDED', 'UncategorizedError'],
    ['constructor', 'UncategorizedError'],
  ])('maps %s to %s', (statusCode, category) => {
    expect(categorizeStatusCode(statusCode)).toBe(category);
  });

  it('categorizes a canonical error by its status code', () => {
    expect(categorizeError(createCanonicalError({ statusCode: 'DUPLICATES_DETECTED' }))).toBe(
      'DuplicateValueError'
    );
  });
});
