/**
 * CLI: heal a test case from stdin JSON -> JSONL events on stdout.
 *
 * Usage: echo '{"testCase":{"id":"t1","steps":["goto \"https://example.com\"","click \"#buy\""]}}' \
 *   | npx tsx src/cli/heal-test.ts
 *
 * Runs the test in a headless Chromium page; on failure heals its locators
 * against that page, runs the healed test once more and reports the verdict.
 */

import { chromium, type Browser, type Page } from 'playwright';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { mkdtemp } from 'node:fs/promises';
import { z } from 'zod';

import { PlaywrightPageHandle } from '../engines/playwright-page.js';
import { PlaywrightTestRunner } from '../engines/playwright-runner.js';
import { HealingHistory } from '../memory/healing-history.js';
import { LocatorResolutionEngine } from '../healing/resolution-engine.js';
import { createDefaultStrategies } from '../healing/strategies/index.js';
import { HealingOrchestrator } from '../runner/healing-orchestrator.js';
import { runWithHealing } from '../runner/heal-and-retry.js';
import { BudgetGuard } from '../runner/budget-guard.js';
import { RunLogger } from '../logging/run-logger.js';
import { writeSummary } from '../logging/summary-writer.js';
import { MetricsCollector } from '../metrics/collector.js';
import { HttpClient } from '../suggestion-client/http-client.js';
import { HttpModelSuggester } from '../suggestion-client/suggest-locator.js';
import { loadHealingConfig, resolveHealingConfig } from '../config/healing-config.js';
import { extractMessage } from '../exception/classifier.js';
import { HealingConfigSchema, TestCaseSchema } from '../schemas/index.js';

const CliInputSchema = z.object({
  testCase: TestCaseSchema,
  configPath: z.string().optional(),
  config: HealingConfigSchema.partial().optional(),
  options: z
    .object({
      headless: z.boolean().optional(),
      timeout: z.number().int().positive().optional(),
      runDir: z.string().optional(),
      actionTimeoutMs: z.number().int().positive().optional(),
    })
    .optional(),
});

// ── helpers ────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function closeQuietly(label: string, close: () => Promise<void>): Promise<void> {
  try {
    await close();
  } catch (err) {
    emit({ type: 'warning', error: `Closing ${label} failed: ${extractMessage(err)}` });
  }
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  // 1. Read input from stdin
  const raw = await readStdin();
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    emit({ type: 'run_error', error: 'Invalid JSON on stdin' });
    process.exitCode = 1;
    return;
  }

  const parsed = CliInputSchema.safeParse(json);
  if (!parsed.success) {
    emit({ type: 'run_error', error: `Invalid input: ${parsed.error.message}` });
    process.exitCode = 1;
    return;
  }

  const { testCase, configPath, options } = parsed.data;
  const config = configPath
    ? await loadHealingConfig(configPath)
    : resolveHealingConfig(parsed.data.config);
  const headless = options?.headless ?? true;
  const timeoutMs = options?.timeout ?? 120_000;
  const runDir = options?.runDir ?? (await mkdtemp(join(tmpdir(), 'heal-test-')));

  emit({ type: 'run_start', testId: testCase.id, totalSteps: testCase.steps.length, runDir });

  // 2. Launch browser
  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless,
      args: ['--no-sandbox', '--disable-setuid-sandbox'],
    });
  } catch (err) {
    emit({ type: 'run_error', error: `Browser launch failed: ${extractMessage(err)}` });
    process.exitCode = 1;
    return;
  }

  // Enforce global timeout: cancel healing, then give up on the process.
  const controller = new AbortController();
  const timer = setTimeout(() => {
    emit({ type: 'run_error', error: `Run timed out after ${timeoutMs}ms` });
    controller.abort();
    void closeQuietly('browser', () => browser.close()).then(() => process.exit(1));
  }, timeoutMs);

  let page: Page | undefined;
  try {
    page = await browser.newPage();

    const history = await HealingHistory.open(config.historyPath);
    const metrics = new MetricsCollector();
    const logger = new RunLogger(runDir);
    const budget = new BudgetGuard({ maxModelCallsPerRun: config.maxModelCallsPerRun });
    const suggester = config.suggestionService
      ? new HttpModelSuggester(
          new HttpClient({
            baseUrl: config.suggestionService.baseUrl,
            apiKey: config.suggestionService.apiKey,
            defaultTimeoutMs: config.suggestionService.timeoutMs,
          }),
          { timeoutMs: config.suggestionService.timeoutMs },
        )
      : undefined;

    const engine = new LocatorResolutionEngine({
      history,
      strategies: createDefaultStrategies({ suggester, budget }),
      config,
      metrics,
      logger,
    });
    const orchestrator = new HealingOrchestrator(engine, new PlaywrightPageHandle(page), { logger });
    const runner = new PlaywrightTestRunner(page, { actionTimeoutMs: options?.actionTimeoutMs });

    // 3. Run, heal on failure, run once more
    const result = await runWithHealing(testCase, {
      runner,
      orchestrator,
      logger,
      signal: controller.signal,
    });

    for (const attempt of result.attempts) {
      emit({
        type: 'attempt_end',
        phase: attempt.phase,
        status: attempt.result.status,
        ...(attempt.result.detail ? { detail: attempt.result.detail } : {}),
      });
    }

    await history.save();
    await writeSummary({ runDir, original: testCase, result, metrics: metrics.snapshot() });

    emit({
      type: 'run_complete',
      status: result.status,
      outcome: result.outcome,
      steps: result.testCase.steps,
      ...(result.stats ? { stats: result.stats } : {}),
      metrics: metrics.snapshot(),
      totalDurationMs: result.durationMs,
    });
    if (result.status === 'FAIL') process.exitCode = 1;
  } catch (err) {
    emit({ type: 'run_error', error: extractMessage(err) });
    process.exitCode = 1;
  } finally {
    clearTimeout(timer);
    const openPage = page;
    if (openPage) await closeQuietly('page', () => openPage.close());
    await closeQuietly('browser', () => browser.close());
  }
}

main().catch((err: unknown) => {
  emit({ type: 'run_error', error: extractMessage(err) });
  process.exitCode = 1;
});
