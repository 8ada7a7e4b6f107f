import type { ResolutionStrategy } from './types.js';

/** Step 0: the recorded locator still works. */
export function createExactCheckStrategy(): ResolutionStrategy {
  return {
    name: 'exact_check',
    async attempt(locator, page, { signal, config }) {
      const element = await page.find(locator, {
        timeoutMs: config.exactCheckTimeoutMs,
        signal,
      });
      return element ? locator : null;
    },
  };
}
