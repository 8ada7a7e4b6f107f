export type Step = string;

export interface TestCase {
  id: string;
  title?: string;
  steps: readonly Step[];
}

export interface HealingStats {
  healed: number;
  failed: number;
}

export interface ExecutionResult {
  status: 'pass' | 'fail';
  detail?: string;
  failedStep?: number;
}

export interface TestRunner {
  run(testCase: TestCase): Promise<ExecutionResult>;
}

export type AttemptPhase = 'initial' | 'healed';

export interface AttemptRecord {
  phase: AttemptPhase;
  testCase: TestCase;
  result: ExecutionResult;
}

export type RunStatus = 'PASS' | 'PASS (Healed)' | 'FAIL';

export type RunOutcome = 'passed' | 'healed_passing' | 'healed_failing' | 'unresolved';

export interface HealingRunResult {
  status: RunStatus;
  outcome: RunOutcome;
  attempts: AttemptRecord[];
  /** The test case as last executed: the healed one when a heal ran. */
  testCase: TestCase;
  /** Locators healed and missed while healing this test case. */
  stats?: HealingStats;
  durationMs: number;
}
