import { SaveOutcome } from '../models/outcomes';
import { TypedOutcomeStrategy } from './TypedOutcomeStrategy';

export class SaveOutcomeStrategy extends TypedOutcomeStrategy<SaveOutcome> {
  public readonly name = 'save';

  public matches(raw: unknown): raw is SaveOutcome {
    return raw instanceof SaveOutcome;
  }
}
