import {
  DeleteOutcome,
  RawWriteError,
  SaveOutcome,
  StoreWriteError,
  UpsertOutcome,
} from '../models/outcomes';
import {
  FAILURE_WITHOUT_DETAIL_MESSAGE,
  NO_MESSAGE,
  UNKNOWN_STATUS_CODE,
  UNRECOGNIZED_OUTCOME_MESSAGE,
  UNRECOGNIZED_OUTCOME_STATUS_CODE,
  UNREADABLE_OUTCOME_MEMBER_MESSAGE,
} from '../types/results';
import { DeleteOutcomeStrategy } from './DeleteOutcomeStrategy';
import { GenericOutcomeStrategy } from './GenericOutcomeStrategy';
import { SaveOutcomeStrategy } from './SaveOutcomeStrategy';
import { UpsertOutcomeStrategy } from './UpsertOutcomeStrategy';

describe('SaveOutcomeStrategy', () => {
  const strategy = new SaveOutcomeStrategy();

  it('matches only save outcomes', () => {
    expect(strategy.matches(new SaveOutcome({ success: true }))).toBe(true);
    expect(strategy.matches(new UpsertOutcome({ success: true }))).toBe(false);
    expect(strategy.matches(new DeleteOutcome({ success: true }))).toBe(false);
    expect(strategy.matches({ success: true })).toBe(false);
  });

  it('normalizes a successful save', () => {
    expect(strategy.normalize(new SaveOutcome({ success: true, id: '001' }))).toEqual({
      recordId: '001',
      success: true,
      errors: [],
    });
  });

  it('normalizes a failed save with its errors', () => {
    const outcome = new SaveOutcome({
      success: false,
      errors: [
        new StoreWriteError({
          fields: ['Name'],
          message: 'Required',
          statusCode: 'REQUIRED_FIELD_MISSING',
        }),
      ],
    });

    expect(strategy.normalize(outcome)).toEqual({
      success: false,
      errors: [{ fields: ['Name'], message: 'Required', statusCode: 'REQUIRED_FIELD_MISSING' }],
    });
  });

  it('lets errors win over a reported success', () => {
    const outcome = new SaveOutcome({
      success: true,
      id: '002',
      errors: [new StoreWriteError({ message: 'Trigger rejected the row' })],
    });

    const result = strategy.normalize(outcome);

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      { fields: [], message: 'Trigger rejected the row', statusCode: UNKNOWN_STATUS_CODE },
    ]);
  });

  it('defaults detail for errors that expose no accessors', () => {
    const bare: RawWriteError = {};
    const outcome = new SaveOutcome({ success: false, id: '003', errors: [bare] });

    expect(strategy.normalize(outcome).errors).toEqual([
      { fields: [], message: NO_MESSAGE, statusCode: UNKNOWN_STATUS_CODE },
    ]);
  });
});

describe('UpsertOutcomeStrategy', () => {
  const strategy = new UpsertOutcomeStrategy();

  it('drops the created flag', () => {
    const created = strategy.normalize(new UpsertOutcome({ success: true, id: 'u1', created: true }));
    const updated = strategy.normalize(new UpsertOutcome({ success: true, id: 'u1', created: false }));

    expect(created).toEqual({ recordId: 'u1', success: true, errors: [] });
    expect(updated).toEqual(created);
  });
});

describe('DeleteOutcomeStrategy', () => {
  const strategy = new DeleteOutcomeStrategy();

  it('synthesizes an error for a failure without detail', () => {
    expect(strategy.normalize(new DeleteOutcome({ success: false, id: 'd1' }))).toEqual({
      recordId: 'd1',
      success: false,
      errors: [
        { fields: [], message: FAILURE_WITHOUT_DETAIL_MESSAGE, statusCode: UNKNOWN_STATUS_CODE },
      ],
    });
  });
});

describe('GenericOutcomeStrategy', () => {
  const strategy = new GenericOutcomeStrategy();

  it('matches anything', () => {
    expect(strategy.matches(undefined)).toBe(true);
    expect(strategy.matches(new SaveOutcome({ success: true }))).toBe(true);
  });

  it('normalizes a plain object outcome', () => {
    expect(
      strategy.normalize({
        success: false,
        id: '2',
        errors: [{ fields: ['Name'], message: 'Required', statusCode: 'REQUIRED_FIELD_MISSING' }],
      })
    ).toEqual({
      recordId: '2',
      success: false,
      errors: [{ fields: ['Name'], message: 'Required', statusCode: 'REQUIRED_FIELD_MISSING' }],
    });
  });

  it('reports an unrecognized shape as a single failure', () => {
    expect(strategy.normalize({ status: 'done' })).toEqual({
      success: false,
      errors: [
        {
          fields: [],
          message: UNRECOGNIZED_OUTCOME_MESSAGE,
          statusCode: UNRECOGNIZED_OUTCOME_STATUS_CODE,
        },
      ],
    });
  });

  it('treats a missing success flag as failure', () => {
    expect(strategy.normalize({ id: '5', errors: [] })).toEqual({
      recordId: '5',
      success: false,
      errors: [
        { fields: [], message: FAILURE_WITHOUT_DETAIL_MESSAGE, statusCode: UNKNOWN_STATUS_CODE },
      ],
    });
  });

  it('fails an outcome whose error list cannot be read', () => {
    const outcome = {
      isSuccess: () => true,
      getId: () => '7',
      getErrors: () => {
        throw new Error('error list unavailable');
      },
    };

    expect(strategy.normalize(outcome)).toEqual({
      recordId: '7',
      success: false,
      errors: [
        {
          fields: [],
          message: `${UNREADABLE_OUTCOME_MEMBER_MESSAGE}: errors`,
          statusCode: UNRECOGNIZED_OUTCOME_STATUS_CODE,
        },
      ],
    });
  });

  it('fails an outcome whose error list has the wrong type', () => {
    const result = strategy.normalize({ success: true, id: '8', errors: 'none' });

    expect(result).toEqual({
      recordId: '8',
      success: false,
      errors: [
        {
          fields: [],
          message: `${UNREADABLE_OUTCOME_MEMBER_MESSAGE}: errors`,
          statusCode: UNRECOGNIZED_OUTCOME_STATUS_CODE,
        },
      ],
    });
  });

  it('treats a missing error list as no errors', () => {
    expect(strategy.normalize({ success: true, id: '6' })).toEqual({
      recordId: '6',
      success: true,
      errors: [],
    });
  });
});
