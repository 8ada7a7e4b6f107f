import type { ModelSuggester } from '../../types/index.js';
import type { BudgetGuard } from '../../runner/budget-guard.js';
import type { ResolutionStrategy } from './types.js';

export interface ModelAssistedOptions {
  suggester: ModelSuggester;
  budget?: BudgetGuard;
}

/** Last resort. Each call may hit a remote model, so calls are budgeted per run. */
export function createModelAssistedStrategy(options: ModelAssistedOptions): ResolutionStrategy {
  const { suggester, budget } = options;
  return {
    name: 'model_assisted',
    async attempt(locator, page, { signal }) {
      if (budget && !budget.canCallModel()) return null;
      budget?.recordModelCall();

      const suggestion = await suggester.suggest(locator, page, signal);
      const trimmed = suggestion?.trim();
      return trimmed ? trimmed : null;
    },
  };
}
