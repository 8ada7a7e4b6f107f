import { bestMatch } from '../similarity.js';
import type { ResolutionStrategy } from './types.js';

export function createStructuralRelativeStrategy(): ResolutionStrategy {
  return {
    name: 'structural_relative',
    async attempt(locator, page, { signal, config }) {
      const siblings = (await page.structuralSiblings(locator, signal)).filter(
        (s) => s !== locator,
      );
      const match = bestMatch(locator, siblings, config.structuralCutoff);
      return match ? match.candidate : null;
    },
  };
}
