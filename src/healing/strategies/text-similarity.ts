import { bestMatch } from '../similarity.js';
import { humanizeLocator, textLocator, uniqueTexts } from '../locator-text.js';
import type { ResolutionStrategy } from './types.js';

/**
 * Scores the page's visible texts against the element's recorded label (or,
 * lacking one, the words in the locator) and wraps the best one as `text=`.
 * Comparison is case-insensitive.
 */
export function createTextSimilarityStrategy(): ResolutionStrategy {
  return {
    name: 'text_similarity',
    async attempt(locator, page, { signal, config }) {
      const label = Object.hasOwn(config.labels, locator) ? config.labels[locator] : undefined;
      const reference = (label ?? humanizeLocator(locator)).trim().toLowerCase();
      if (!reference) return null;

      const texts = uniqueTexts(await page.allText(signal));
      const match = bestMatch(
        reference,
        texts.map((t) => t.toLowerCase()),
        config.similarityCutoff,
      );
      return match ? textLocator(texts[match.index]) : null;
    },
  };
}
