/**
 * Base strategy for outcome classes the store produces
 * Concrete strategies only declare which class they accept
 */

import { OutcomeStrategy } from '../interfaces/OutcomeStrategy';
import { RawOutcome, RawWriteError } from '../models/outcomes';
import { createCanonicalError, createCanonicalResult } from '../models/CanonicalResult';
import { CanonicalError, CanonicalResult } from '../types/results';

export abstract class TypedOutcomeStrategy<TRaw extends RawOutcome> implements OutcomeStrategy<TRaw> {
  public abstract readonly name: string;

  public abstract matches(raw: unknown): raw is TRaw;

  public normalize(raw: TRaw): CanonicalResult {
    const errors = raw.getErrors().map(error => this.normalizeError(error));

    // errors-present wins over the reported flag
    return createCanonicalResult({
      recordId: raw.getId(),
      success: raw.isSuccess() && errors.length === 0,
      errors,
    });
  }

  protected normalizeError(error: RawWriteError): CanonicalError {
    return createCanonicalError({
      fields: error.getFields?.() ?? [],
      message: error.getMessage?.(),
      statusCode: error.getStatusCode?.(),
    });
  }
}
