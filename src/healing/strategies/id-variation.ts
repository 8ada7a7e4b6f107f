import { bestMatch } from '../similarity.js';
import { idLocator, identifierToken, normalizeIdentifier } from '../locator-text.js';
import type { ResolutionStrategy } from './types.js';

/**
 * Looks for an identifier on the page that is a variant of the one the locator
 * names: same after case folding and dropping `-`/`_`, or else similar enough.
 */
export function createIdVariationStrategy(): ResolutionStrategy {
  return {
    name: 'id_variation',
    async attempt(locator, page, { signal, config }) {
      const token = identifierToken(locator);
      if (!token) return null;

      const identifiers = [...new Set(await page.allIdentifiers(signal))].filter(
        (id) => id.length > 0 && idLocator(id) !== locator,
      );

      const normalized = normalizeIdentifier(token);
      const variant = identifiers.find((id) => normalizeIdentifier(id) === normalized);
      if (variant) return idLocator(variant);

      const match = bestMatch(token, identifiers, config.similarityCutoff);
      return match ? idLocator(match.candidate) : null;
    },
  };
}
