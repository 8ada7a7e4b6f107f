import type { HealingConfig, Locator, PageHandle, StrategyName } from '../../types/index.js';

export interface StrategyContext {
  signal: AbortSignal;
  config: HealingConfig;
}

/** One fallback technique. Returns a replacement locator or null for "no match". */
export interface ResolutionStrategy {
  readonly name: StrategyName;
  attempt(locator: Locator, page: PageHandle, context: StrategyContext): Promise<Locator | null>;
}
