import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  AttemptRecord,
  HealingRunResult,
  ResolutionOutcome,
} from '../types/index.js';

export type LogEntry =
  | ({ kind: 'resolution' } & ResolutionOutcome)
  | {
      kind: 'attempt';
      phase: AttemptRecord['phase'];
      testId: string;
      status: AttemptRecord['result']['status'];
      detail?: string;
      failedStep?: number;
    }
  | {
      kind: 'pass_through';
      testId: string;
      stepIndex: number;
      step: string;
    }
  | {
      kind: 'run';
      testId: string;
      status: HealingRunResult['status'];
      outcome: HealingRunResult['outcome'];
      healed?: number;
      failed?: number;
      durationMs: number;
    };

/** Appends one JSON line per event to `<runDir>/logs.jsonl`. */
export class RunLogger {
  private logPath: string;
  private initialized = false;

  constructor(private runDir: string) {
    this.logPath = join(runDir, 'logs.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  private async append(entry: LogEntry): Promise<void> {
    await this.ensureDir();
    const line = { timestamp: new Date().toISOString(), ...entry };
    await appendFile(this.logPath, JSON.stringify(line) + '\n', 'utf-8');
  }

  async logResolution(outcome: ResolutionOutcome): Promise<void> {
    await this.append({ kind: 'resolution', ...outcome });
  }

  async logAttempt(testId: string, attempt: AttemptRecord): Promise<void> {
    await this.append({
      kind: 'attempt',
      phase: attempt.phase,
      testId,
      status: attempt.result.status,
      ...(attempt.result.detail !== undefined ? { detail: attempt.result.detail } : {}),
      ...(attempt.result.failedStep !== undefined ? { failedStep: attempt.result.failedStep } : {}),
    });
  }

  async logPassThrough(testId: string, stepIndex: number, step: string): Promise<void> {
    await this.append({ kind: 'pass_through', testId, stepIndex, step });
  }

  async logRun(testId: string, result: HealingRunResult): Promise<void> {
    await this.append({
      kind: 'run',
      testId,
      status: result.status,
      outcome: result.outcome,
      ...(result.stats ? { healed: result.stats.healed, failed: result.stats.failed } : {}),
      durationMs: result.durationMs,
    });
  }

  getRunDir(): string {
    return this.runDir;
  }

  getLogPath(): string {
    return this.logPath;
  }
}
