import type { HealingStats, PageHandle, Step, TestCase } from '../types/index.js';
import type { LocatorResolutionEngine, ResolveOptions } from '../healing/resolution-engine.js';
import type { RunLogger } from '../logging/run-logger.js';
import { extractLocator, replaceLocator } from './step-parser.js';

export type LocatorResolver = Pick<LocatorResolutionEngine, 'resolve'>;

export interface HealingOrchestratorOptions {
  /** Receives a `pass_through` entry for every step without a locator. */
  logger?: RunLogger;
}

/**
 * Rewrites a test case's broken locators through the resolution engine.
 * One orchestrator serves one page session; its stats cover every
 * `healTest` call made on it.
 */
export class HealingOrchestrator {
  private stats: HealingStats = { healed: 0, failed: 0 };
  private passedThrough = 0;
  private logger?: RunLogger;

  constructor(
    private engine: LocatorResolver,
    private page: PageHandle,
    options: HealingOrchestratorOptions = {},
  ) {
    this.logger = options.logger;
  }

  /**
   * Resolve the locator of every recognizable step and return a new test case
   * with resolved locators substituted. Steps keep their order; steps without a
   * recognizable locator are copied as-is and counted as pass-throughs only.
   */
  async healTest(testCase: TestCase, options: ResolveOptions = {}): Promise<TestCase> {
    const steps: Step[] = [];

    for (const [index, step] of testCase.steps.entries()) {
      const locator = extractLocator(step);
      if (locator === null) {
        steps.push(step);
        this.passedThrough++;
        await this.logger?.logPassThrough(testCase.id, index, step);
        continue;
      }

      const outcome = await this.engine.resolve(locator, this.page, options);
      if (outcome.healed !== null) {
        steps.push(outcome.healed === locator ? step : replaceLocator(step, outcome.healed));
        this.stats.healed++;
      } else {
        steps.push(step);
        this.stats.failed++;
      }
    }

    return Object.freeze({ ...testCase, steps: Object.freeze(steps) });
  }

  getStats(): HealingStats {
    return { ...this.stats };
  }

  /** Steps copied unchanged because no locator could be read from them. */
  getPassThroughCount(): number {
    return this.passedThrough;
  }
}
