import { OutcomeStrategy } from '../interfaces/OutcomeStrategy';
import { SaveOutcomeStrategy } from '../strategies/SaveOutcomeStrategy';
import { UpsertOutcomeStrategy } from '../strategies/UpsertOutcomeStrategy';
import { DeleteOutcomeStrategy } from '../strategies/DeleteOutcomeStrategy';
import { GenericOutcomeStrategy } from '../strategies/GenericOutcomeStrategy';

export class StrategyRegistry {
  private static readonly fallback: OutcomeStrategy = new GenericOutcomeStrategy();
  private static readonly strategies: readonly OutcomeStrategy[] = Object.freeze([
    // Checked in this order; a strategy is only handed outcomes it matched
    new SaveOutcomeStrategy(),
    new UpsertOutcomeStrategy(),
    new DeleteOutcomeStrategy(),
    // new BatchOutcomeStrategy(), // a new shape goes here, before the fallback
    StrategyRegistry.fallback,
  ]);

  static resolve(raw: unknown): OutcomeStrategy {
    return this.strategies.find(strategy => strategy.matches(raw)) ?? this.fallback;
  }

  static getFallback(): OutcomeStrategy {
    return this.fallback;
  }

  static getSupportedOutcomes(): string[] {
    return this.strategies.map(strategy => strategy.name);
  }
}
