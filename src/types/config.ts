import type { Locator } from './locator.js';

export interface SuggestionServiceConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

export interface HealingConfig {
  similarityCutoff: number;
  structuralCutoff: number;
  exactCheckTimeoutMs: number;
  strategyTimeoutMs: number;
  modelTimeoutMs: number;
  verifyCandidates: boolean;
  maxModelCallsPerRun: number;
  /** Text each locator's element showed when the test was recorded. */
  labels: Record<Locator, string>;
  historyPath?: string;
  suggestionService?: SuggestionServiceConfig;
}
