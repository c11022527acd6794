import { UpsertOutcome } from '../models/outcomes';
import { TypedOutcomeStrategy } from './TypedOutcomeStrategy';

/**
 * The insert-vs-update flag of an upsert is not carried into the canonical result
 */
export class UpsertOutcomeStrategy extends TypedOutcomeStrategy<UpsertOutcome> {
  public readonly name = 'upsert';

  public matches(raw: unknown): raw is UpsertOutcome {
    return raw instanceof UpsertOutcome;
  }
}
