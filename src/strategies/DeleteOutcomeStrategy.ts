import { DeleteOutcome } from '../models/outcomes';
import { TypedOutcomeStrategy } from './TypedOutcomeStrategy';

export class DeleteOutcomeStrategy extends TypedOutcomeStrategy<DeleteOutcome> {
  public readonly name = 'delete';

  public matches(raw: unknown): raw is DeleteOutcome {
    return raw instanceof DeleteOutcome;
  }
}
