/**
 * Fallback strategy for outcomes of any other shape
 * Matches everything, so it must stay last in the registry
 */

import { OutcomeStrategy } from '../interfaces/OutcomeStrategy';
import { createCanonicalError, createCanonicalResult } from '../models/CanonicalResult';
import { probeOutcome } from '../utils/outcomeProbe';
import {
  CanonicalResult,
  UNRECOGNIZED_OUTCOME_MESSAGE,
  UNRECOGNIZED_OUTCOME_STATUS_CODE,
  UNREADABLE_OUTCOME_MEMBER_MESSAGE,
} from '../types/results';

export class GenericOutcomeStrategy implements OutcomeStrategy<unknown> {
  public readonly name = 'generic';

  public matches(raw: unknown): raw is unknown {
    return true;
  }

  public normalize(raw: unknown): CanonicalResult {
    const probed = probeOutcome(raw);

    if (!probed.readable) {
      return createCanonicalResult({
        success: false,
        errors: [
          createCanonicalError({
            message: UNRECOGNIZED_OUTCOME_MESSAGE,
            statusCode: UNRECOGNIZED_OUTCOME_STATUS_CODE,
          }),
        ],
      });
    }

    const errors = (probed.errors ?? []).map(error => createCanonicalError(error));
    if (probed.brokenMembers.length > 0) {
      errors.push(
        createCanonicalError({
          message: `${UNREADABLE_OUTCOME_MEMBER_MESSAGE}: ${probed.brokenMembers.join(', ')}`,
          statusCode: UNRECOGNIZED_OUTCOME_STATUS_CODE,
        })
      );
    }

    // A missing or broken success flag counts as failure
    return createCanonicalResult({
      recordId: probed.id,
      success: probed.success === true && errors.length === 0,
      errors,
    });
  }
}
