import type { ModelSuggester } from '../../types/index.js';
import type { BudgetGuard } from '../../runner/budget-guard.js';
import { createExactCheckStrategy } from './exact-check.js';
import { createIdVariationStrategy } from './id-variation.js';
import { createTextSimilarityStrategy } from './text-similarity.js';
import { createStructuralRelativeStrategy } from './structural-relative.js';
import { createModelAssistedStrategy } from './model-assisted.js';
import type { ResolutionStrategy } from './types.js';

export type { ResolutionStrategy, StrategyContext } from './types.js';
export {
  createExactCheckStrategy,
  createIdVariationStrategy,
  createTextSimilarityStrategy,
  createStructuralRelativeStrategy,
  createModelAssistedStrategy,
};

export interface DefaultStrategyOptions {
  suggester?: ModelSuggester;
  budget?: BudgetGuard;
}

/**
 * Chain in priority order, cheapest first. The model-assisted strategy is only
 * present when a suggester is available.
 */
export function createDefaultStrategies(options: DefaultStrategyOptions = {}): ResolutionStrategy[] {
  const strategies = [
    createExactCheckStrategy(),
    createIdVariationStrategy(),
    createTextSimilarityStrategy(),
    createStructuralRelativeStrategy(),
  ];
  if (options.suggester) {
    strategies.push(
      createModelAssistedStrategy({ suggester: options.suggester, budget: options.budget }),
    );
  }
  return strategies;
}
