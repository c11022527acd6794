import { CanonicalResult } from '../types/results';

export interface OutcomeStrategy<TRaw = unknown> {
  readonly name: string;
  matches(raw: unknown): raw is TRaw;
  normalize(raw: TRaw): CanonicalResult;
}
