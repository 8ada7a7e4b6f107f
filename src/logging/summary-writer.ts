import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { HealingRunResult, TestCase } from '../types/index.js';
import type { ResolutionMetrics } from '../metrics/collector.js';

export interface SummaryOptions {
  runDir: string;
  original: TestCase;
  result: HealingRunResult;
  metrics?: ResolutionMetrics;
}

/**
 * Write a human-readable `summary.md` for one heal-and-retry run.
 */
export async function writeSummary(options: SummaryOptions): Promise<void> {
  const { runDir, original, result, metrics } = options;
  const md = buildSummaryMarkdown(original, result, metrics);
  await writeFile(join(runDir, 'summary.md'), md, 'utf-8');
}

export function buildSummaryMarkdown(
  original: TestCase,
  result: HealingRunResult,
  metrics?: ResolutionMetrics,
): string {
  const lines: string[] = [
    '# Heal Summary',
    `- Test: ${original.title ?? original.id} (${original.id})`,
    `- Result: ${result.status}`,
    `- Duration: ${formatDuration(result.durationMs)}`,
    `- Attempts: ${result.attempts.length}`,
  ];

  if (result.stats) {
    lines.push(`- Locators healed: ${result.stats.healed}`);
    lines.push(`- Locators unresolved: ${result.stats.failed}`);
  }

  const changed = original.steps
    .map((step, i) => ({ before: step, after: result.testCase.steps[i] }))
    .filter(({ before, after }) => after !== undefined && before !== after);

  lines.push('');
  lines.push('## Rewritten Steps');
  if (changed.length === 0) {
    lines.push('- No steps changed');
  } else {
    changed.forEach(({ before, after }, i) => {
      lines.push(`${i + 1}. \`${before}\` -> \`${after}\``);
    });
  }

  const failures = result.attempts.filter((a) => a.result.status === 'fail');
  if (failures.length > 0) {
    lines.push('');
    lines.push('## Failures');
    for (const attempt of failures) {
      lines.push(`- ${attempt.phase}: ${attempt.result.detail ?? 'no details'}`);
    }
  }

  if (metrics) {
    lines.push('');
    lines.push('## Resolution');
    lines.push(`- Resolutions: ${metrics.resolutions}`);
    lines.push(`- Cache hits: ${metrics.cacheHits}`);
    lines.push(`- Unresolved: ${metrics.unresolved}`);
    for (const [strategy, wins] of Object.entries(metrics.strategyWins)) {
      lines.push(`- Healed by ${strategy}: ${wins}`);
    }
  }

  return lines.join('\n') + '\n';
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
