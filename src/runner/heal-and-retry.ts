import type {
  AttemptRecord,
  HealingRunResult,
  HealingStats,
  TestCase,
  TestRunner,
} from '../types/index.js';
import type { RunLogger } from '../logging/run-logger.js';
import type { ResolveOptions } from '../healing/resolution-engine.js';
import type { HealingOrchestrator } from './healing-orchestrator.js';

export interface HealAndRetryOptions extends ResolveOptions {
  runner: TestRunner;
  orchestrator: Pick<HealingOrchestrator, 'healTest' | 'getStats'>;
  logger?: RunLogger;
}

/**
 * Run a test; if it fails, heal it and run the healed version exactly once more.
 *
 *   initial --pass--> PASS
 *   initial --fail--> heal --> healed --pass--> PASS (Healed)
 *                                     --fail--> FAIL
 */
export async function runWithHealing(
  testCase: TestCase,
  options: HealAndRetryOptions,
): Promise<HealingRunResult> {
  const { runner, orchestrator, logger, signal } = options;
  const start = Date.now();
  const attempts: AttemptRecord[] = [];

  const initial: AttemptRecord = {
    phase: 'initial',
    testCase,
    result: await runner.run(testCase),
  };
  attempts.push(initial);
  await logger?.logAttempt(testCase.id, initial);

  if (initial.result.status === 'pass') {
    return finish(testCase, logger, {
      status: 'PASS',
      outcome: 'passed',
      attempts,
      testCase,
      durationMs: Date.now() - start,
    });
  }

  // The orchestrator's stats span every test it healed; keep only this one's share.
  const before = orchestrator.getStats();
  const healedCase = await orchestrator.healTest(testCase, { signal });
  const after = orchestrator.getStats();
  const stats: HealingStats = {
    healed: after.healed - before.healed,
    failed: after.failed - before.failed,
  };

  const healed: AttemptRecord = {
    phase: 'healed',
    testCase: healedCase,
    result: await runner.run(healedCase),
  };
  attempts.push(healed);
  await logger?.logAttempt(testCase.id, healed);

  if (healed.result.status === 'pass') {
    return finish(testCase, logger, {
      status: 'PASS (Healed)',
      outcome: 'healed_passing',
      attempts,
      testCase: healedCase,
      stats,
      durationMs: Date.now() - start,
    });
  }

  return finish(testCase, logger, {
    status: 'FAIL',
    outcome: stats.failed > 0 ? 'unresolved' : 'healed_failing',
    attempts,
    testCase: healedCase,
    stats,
    durationMs: Date.now() - start,
  });
}

async function finish(
  original: TestCase,
  logger: RunLogger | undefined,
  result: HealingRunResult,
): Promise<HealingRunResult> {
  await logger?.logRun(original.id, result);
  return result;
}
