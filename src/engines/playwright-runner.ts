import type { ExecutionResult, Step, TestCase, TestRunner } from '../types/index.js';
import { parseStep } from '../runner/step-parser.js';
import { extractMessage } from '../exception/classifier.js';
import type { PlaywrightPage } from './playwright-page.js';

export interface PlaywrightRunnerOptions {
  actionTimeoutMs?: number;
}

const GOTO_PATTERN = /^\s*goto\s+"(.+)"\s*$/i;

/**
 * Executes test steps against a Playwright page. Stops at the first failing
 * step and reports it; never throws for a step failure.
 */
export class PlaywrightTestRunner implements TestRunner {
  private actionTimeoutMs: number;

  constructor(
    private page: PlaywrightPage,
    options: PlaywrightRunnerOptions = {},
  ) {
    this.actionTimeoutMs = options.actionTimeoutMs ?? 5000;
  }

  async run(testCase: TestCase): Promise<ExecutionResult> {
    for (let i = 0; i < testCase.steps.length; i++) {
      const step = testCase.steps[i];
      try {
        await this.executeStep(step);
      } catch (error) {
        return {
          status: 'fail',
          failedStep: i,
          detail: `Step ${i + 1} (${step}): ${extractMessage(error)}`,
        };
      }
    }
    return { status: 'pass' };
  }

  private async executeStep(step: Step): Promise<void> {
    const goto = step.match(GOTO_PATTERN);
    if (goto) {
      await this.page.goto(goto[1], { waitUntil: 'domcontentloaded' });
      return;
    }

    const parsed = parseStep(step);
    if (!parsed) {
      throw new Error(`Unsupported step: ${step}`);
    }

    const target = this.page.locator(parsed.locator).first();
    const timeout = this.actionTimeoutMs;
    switch (parsed.action) {
      case 'click':
        await target.click({ timeout });
        break;
      case 'type':
        await target.fill(parsed.value ?? '', { timeout });
        break;
      case 'select':
        await target.selectOption(parsed.value ?? '', { timeout });
        break;
    }
  }
}
